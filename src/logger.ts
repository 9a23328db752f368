/**
 * Minimal logging surface shared by the core components.
 * Inside Node-RED the node itself satisfies it; elsewhere the console logger is used.
 */
export interface Logger {
    log(msg: string): void;
    warn(msg: string): void;
    error(msg: string): void;
    debug(msg: string): void;
}

export function createConsoleLogger(prefix = '[Sauna]'): Logger {
    return {
        log: (msg: string) => console.log(prefix, msg),
        warn: (msg: string) => console.warn(prefix, msg),
        error: (msg: string) => console.error(prefix, msg),
        debug: (msg: string) => console.debug(prefix, msg)
    };
}

export const silentLogger: Logger = {
    log() { },
    warn() { },
    error() { },
    debug() { }
};

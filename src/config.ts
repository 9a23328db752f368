import * as CONST from './constants';

/**
 * Raw node properties as the editor stores them (strings).
 */
export interface RawControllerConfig {
    host?: string;
    port?: string | number;
    unitId?: string | number;
    pollInterval?: string | number;
    timeout?: string | number;
    controllerModel?: string | number;
}

export interface ControllerConfig {
    host: string;
    port: number;
    unitId: number;
    /** Seconds between polls */
    pollInterval: number;
    /** Connect and per-operation timeout in ms */
    timeout: number;
    controllerModel: number;
}

export interface ParsedConfig {
    config: ControllerConfig;
    warnings: string[];
}

function toInt(value: string | number | undefined): number {
    if (value === undefined) return NaN;
    return typeof value === 'number' ? Math.trunc(value) : parseInt(value, 10);
}

/**
 * Apply defaults and limits to node properties. Values pulled into range
 * are reported in `warnings` so the node can tell the user.
 */
export function parseControllerConfig(raw: RawControllerConfig): ParsedConfig {
    const warnings: string[] = [];

    const host = (raw.host || '').trim() || CONST.DEFAULT_HOST;

    let port = toInt(raw.port);
    if (isNaN(port) || port < 1 || port > 65535) port = CONST.DEFAULT_MODBUS_PORT;

    let unitId = toInt(raw.unitId);
    if (isNaN(unitId) || unitId < 0 || unitId > 247) unitId = CONST.DEFAULT_UNIT_ID;

    let pollInterval = toInt(raw.pollInterval);
    if (isNaN(pollInterval)) {
        pollInterval = CONST.DEFAULT_POLL_INTERVAL;
    } else if (pollInterval < CONST.MIN_POLL_INTERVAL) {
        warnings.push(`Poll interval ${pollInterval}s is too fast. Enforcing minimum ${CONST.MIN_POLL_INTERVAL}s.`);
        pollInterval = CONST.MIN_POLL_INTERVAL;
    } else if (pollInterval > CONST.MAX_POLL_INTERVAL) {
        warnings.push(`Poll interval ${pollInterval}s is too slow. Enforcing maximum ${CONST.MAX_POLL_INTERVAL}s.`);
        pollInterval = CONST.MAX_POLL_INTERVAL;
    }

    let timeout = toInt(raw.timeout);
    if (isNaN(timeout) || timeout <= 0) timeout = CONST.DEFAULT_TIMEOUT;

    let controllerModel = toInt(raw.controllerModel);
    if (isNaN(controllerModel)) controllerModel = CONST.DEFAULT_CONTROLLER_MODEL;

    return {
        config: { host, port, unitId, pollInterval, timeout, controllerModel },
        warnings
    };
}

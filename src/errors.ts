/**
 * Custom Error Classes for Sauna Controller Operations
 * One class per failure kind so callers can tell bad input from an unreachable device
 */

/**
 * Error thrown when a host identifier cannot be turned into an IPv4 address,
 * neither by a live lookup nor from the cache
 */
export class SaunaResolutionError extends Error {
    public host: string;

    constructor(host: string, message: string) {
        super(`Could not resolve ${host}: ${message}`);
        this.name = 'SaunaResolutionError';
        this.host = host;
    }
}

/**
 * Error thrown when the TCP connection to the controller cannot be opened
 */
export class SaunaConnectionError extends Error {
    public ip: string;
    public port: number;

    constructor(ip: string, port: number, message: string) {
        super(`Connection failed to ${ip}:${port}: ${message}`);
        this.name = 'SaunaConnectionError';
        this.ip = ip;
        this.port = port;
    }
}

/**
 * Error thrown when a register operation still fails after its retry
 */
export class SaunaTransportError extends Error {
    public operation: string;
    public ip: string;
    public port: number;
    public cause?: unknown;

    constructor(operation: string, ip: string, port: number, cause?: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
        super(`${operation} failed on ${ip}:${port}: ${detail}`);
        this.name = 'SaunaTransportError';
        this.operation = operation;
        this.ip = ip;
        this.port = port;
        this.cause = cause;
    }
}

/**
 * Error thrown when an operation does not complete in time
 */
export class SaunaTimeoutError extends Error {
    public operation: string;
    public timeout: number;

    constructor(operation: string, timeout: number) {
        super(`Operation "${operation}" timed out after ${timeout}ms`);
        this.name = 'SaunaTimeoutError';
        this.operation = operation;
        this.timeout = timeout;
    }
}

/**
 * Error thrown when a command parameter is rejected before any register is written
 */
export class SaunaValidationError extends Error {
    public field: string;
    public value: unknown;

    constructor(field: string, value: unknown, message: string) {
        super(`Invalid ${field} (${String(value)}): ${message}`);
        this.name = 'SaunaValidationError';
        this.field = field;
        this.value = value;
    }
}

/**
 * Error thrown for a well-formed command the controller has no register for
 */
export class SaunaUnsupportedError extends Error {
    public action: string;

    constructor(action: string, message: string) {
        super(`${action} is not supported: ${message}`);
        this.name = 'SaunaUnsupportedError';
        this.action = action;
    }
}

/**
 * Error describing a single register value that could not be decoded
 */
export class SaunaDecodeError extends Error {
    public field: string;
    public address: number;
    public raw: number;

    constructor(field: string, address: number, raw: number, message: string) {
        super(`Register ${address} (${field}) holds ${raw}: ${message}`);
        this.name = 'SaunaDecodeError';
        this.field = field;
        this.address = address;
        this.raw = raw;
    }
}

import ModbusRTU from "modbus-serial";
import * as CONST from './constants';
import { SaunaConnectionError, SaunaTimeoutError, SaunaTransportError } from './errors';
import { Logger, silentLogger } from './logger';
import { ModbusTarget } from './types/sauna';
import { errorMessage, withTimeout } from './utils';

interface PoolEntry {
    client: ModbusRTU | null;
    lastActive: number;
    queue: Promise<unknown>;
}

/**
 * Register-level access to a controller. The poll coordinator and the
 * command dispatcher only see this interface.
 */
export interface RegisterTransport {
    readRegisters(target: ModbusTarget, start: number, count: number): Promise<number[]>;
    writeRegister(target: ModbusTarget, address: number, value: number): Promise<void>;
    invalidate(ip: string, port: number): void;
}

export interface ConnectionManagerOptions {
    /** Connect and per-operation timeout in ms. Default: 10000 */
    timeout?: number;
    /** Pause after each operation in ms. Default: 100 */
    frameGap?: number;
    /** Close connections unused for this long, in ms. 0 disables the sweep. */
    idleTimeout?: number;
    logger?: Logger;
}

/**
 * Manages one persistent Modbus TCP connection per controller.
 *
 * Every operation for an ip:port is appended to that key's queue, so polls and
 * command writes never interleave on the wire. Connections are opened lazily
 * when an operation needs one; there is no background reconnect.
 */
export class ConnectionManager implements RegisterTransport {
    private pool: Map<string, PoolEntry>;
    private timeout: number;
    private frameGap: number;
    private idleTimeout: number;
    private log: Logger;
    public cleanupInterval: NodeJS.Timeout | null;

    constructor(options: ConnectionManagerOptions = {}) {
        this.pool = new Map();
        this.timeout = options.timeout ?? CONST.DEFAULT_TIMEOUT;
        this.frameGap = options.frameGap ?? CONST.FRAME_GAP;
        this.idleTimeout = options.idleTimeout ?? CONST.IDLE_TIMEOUT;
        this.log = options.logger ?? silentLogger;
        this.cleanupInterval = null;

        if (this.idleTimeout > 0) {
            this.startCleanupTask();
        }
    }

    async readRegisters(target: ModbusTarget, start: number, count: number): Promise<number[]> {
        const result = await this.request(target, `read ${count} registers at ${start}`, client =>
            client.readHoldingRegisters(start, count)
        );
        if (!Array.isArray(result.data) || result.data.length !== count) {
            throw new SaunaTransportError(`read ${count} registers at ${start}`, target.ip, target.port,
                new Error(`malformed response (${Array.isArray(result.data) ? result.data.length : 0} values)`));
        }
        return result.data;
    }

    async writeRegister(target: ModbusTarget, address: number, value: number): Promise<void> {
        const operation = `write ${value} to register ${address}`;
        await this.request(target, operation, async client => {
            const ack = await client.writeRegister(address, value);
            if (!ack || ack.address !== address || ack.value !== value) {
                throw new Error('write not acknowledged');
            }
            return ack;
        });
    }

    /**
     * Run an action with exclusive use of the controller's connection.
     * The action gets one retry; a connection-level failure closes the
     * client first so the retry starts on a fresh socket.
     *
     * @throws {SaunaTransportError} when both attempts fail
     */
    async request<T>(target: ModbusTarget, operation: string, action: (client: ModbusRTU) => Promise<T>): Promise<T> {
        const { ip, port } = target;
        const key = `${ip}:${port}`;
        const timeout = target.timeout ?? this.timeout;

        // 1. Get or Create Pool Entry
        let entry = this.pool.get(key);
        if (!entry) {
            entry = {
                client: null,
                lastActive: Date.now(),
                queue: Promise.resolve()
            };
            this.pool.set(key, entry);
        }
        const current = entry;
        current.lastActive = Date.now();

        // 2. Append Action to Queue
        const resultPromise = current.queue.then(async () => {
            let lastError: unknown;
            for (let attempt = 1; attempt <= 2; attempt++) {
                try {
                    const client = await this.acquire(current, target);
                    const res = await withTimeout(action(client), timeout, operation);
                    current.lastActive = Date.now();
                    if (this.frameGap > 0) {
                        await new Promise(r => setTimeout(r, this.frameGap));
                    }
                    return res;
                } catch (e) {
                    lastError = e;
                    const fatal = this._isFatalError(e);
                    if (fatal) {
                        this.closeClient(current);
                    }
                    this.log.debug(`${operation} on ${key} failed (attempt ${attempt}${fatal ? ', connection dropped' : ''}): ${errorMessage(e)}`);
                }
            }
            throw new SaunaTransportError(operation, ip, port, lastError);
        });

        // 3. Update Queue Head
        // Errors belong to the caller; the queue itself must keep moving
        current.queue = resultPromise.catch(() => undefined);

        return resultPromise;
    }

    private async acquire(entry: PoolEntry, target: ModbusTarget): Promise<ModbusRTU> {
        let client = entry.client;
        if (!client || !client.isOpen) {
            this.closeClient(entry);
            client = await this._connect(target.ip, target.port, target.timeout ?? this.timeout);
            entry.client = client;
        }
        client.setID(target.unitId);
        return client;
    }

    /**
     * Internal: Establish new connection
     */
    async _connect(ip: string, port: number, timeout: number = this.timeout): Promise<ModbusRTU> {
        const client = new ModbusRTU();
        client.setTimeout(timeout);
        this.log.debug(`Connecting to ${ip}:${port}...`);
        try {
            await withTimeout(client.connectTCP(ip, { port: port }), timeout, `connect ${ip}:${port}`);
        } catch (e) {
            this.safeClose(client);
            throw new SaunaConnectionError(ip, port, errorMessage(e));
        }
        return client;
    }

    _isFatalError(error: unknown): boolean {
        if (error instanceof SaunaConnectionError || error instanceof SaunaTimeoutError) return true;
        const fatalErrors = ['ECONNRESET', 'ECONNREFUSED', 'EPIPE', 'ETIMEDOUT', 'Port Not Open', 'Timed out', 'Transaction timed out'];
        const message = error instanceof Error ? error.message : '';
        return fatalErrors.some(e => message.includes(e));
    }

    private closeClient(entry: PoolEntry): void {
        if (entry.client) {
            this.safeClose(entry.client);
            entry.client = null;
        }
    }

    private safeClose(client: ModbusRTU): void {
        try {
            client.close(() => undefined);
        } catch (e) {
            this.log.debug(`Close failed: ${errorMessage(e)}`);
        }
    }

    /**
     * Drop the connection for a controller; the next operation reconnects.
     */
    invalidate(ip: string, port: number): void {
        const entry = this.pool.get(`${ip}:${port}`);
        if (entry) {
            this.closeClient(entry);
        }
    }

    startCleanupTask(): void {
        if (this.cleanupInterval) clearInterval(this.cleanupInterval);
        this.cleanupInterval = setInterval(() => {
            const now = Date.now();
            for (const [key, entry] of this.pool.entries()) {
                if (entry.client && now - entry.lastActive > this.idleTimeout) {
                    this.log.debug(`Closing idle connection ${key}`);
                    this.closeClient(entry);
                }
            }
        }, CONST.IDLE_SWEEP_INTERVAL);
        this.cleanupInterval.unref();
    }

    close(): void {
        if (this.cleanupInterval) {
            clearInterval(this.cleanupInterval);
            this.cleanupInterval = null;
        }
        for (const entry of this.pool.values()) {
            this.closeClient(entry);
        }
        this.pool.clear();
    }
}

export default ConnectionManager;

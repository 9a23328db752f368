import { EventEmitter } from 'events';
import * as CONST from './constants';
import { decodeRegisters, registersFromBlock } from './codec';
import { RegisterTransport } from './connection-manager';
import { HostResolver } from './discovery';
import { Logger, silentLogger } from './logger';
import { ModbusTarget, Snapshot } from './types/sauna';
import { clamp, errorMessage } from './utils';

export type PollOutcome = 'ok' | 'failed' | 'skipped';

export interface SaunaCoordinatorOptions {
    host: string;
    transport: RegisterTransport;
    resolver: HostResolver;
    port?: number;
    unitId?: number;
    /** Seconds between polls, clamped to 5-300. Default: 15 */
    pollInterval?: number;
    controllerModel?: number;
    /** Per-operation timeout in ms passed to the transport */
    timeout?: number;
    /** Consecutive failures that force a fresh address lookup. Default: 3 */
    reresolveAfter?: number;
    logger?: Logger;
    now?: () => Date;
}

export function initialSnapshot(controllerModel: number): Snapshot {
    return {
        controllerStatus: 'off',
        light: false,
        aux: false,
        controllerModel,
        actualTemp: 0,
        humidity: 0,
        lastUpdated: null,
        available: false
    };
}

/**
 * Polls one sauna controller and owns its snapshot.
 *
 * Healthy while the last poll succeeded, degraded (values kept, `available`
 * false) after a failure. Emits `snapshot` on every publish and
 * `availability` when the state flips.
 */
export class SaunaCoordinator extends EventEmitter {
    public readonly host: string;
    public readonly port: number;
    public readonly unitId: number;
    public readonly pollInterval: number;
    public readonly timeout?: number;

    private transport: RegisterTransport;
    private resolver: HostResolver;
    private reresolveAfter: number;
    private log: Logger;
    private now: () => Date;

    private snapshot: Snapshot;
    private address: string | null = null;
    private addressConfirmed = false;
    private failures = 0;
    private inFlight: Promise<PollOutcome> | null = null;
    private timer: NodeJS.Timeout | null = null;

    constructor(options: SaunaCoordinatorOptions) {
        super();
        this.host = options.host;
        this.port = options.port ?? CONST.DEFAULT_MODBUS_PORT;
        this.unitId = options.unitId ?? CONST.DEFAULT_UNIT_ID;
        this.pollInterval = clamp(options.pollInterval ?? CONST.DEFAULT_POLL_INTERVAL, CONST.MIN_POLL_INTERVAL, CONST.MAX_POLL_INTERVAL);
        this.timeout = options.timeout;
        this.transport = options.transport;
        this.resolver = options.resolver;
        this.reresolveAfter = Math.max(1, options.reresolveAfter ?? CONST.RERESOLVE_AFTER_FAILURES);
        this.log = options.logger ?? silentLogger;
        this.now = options.now ?? (() => new Date());
        this.snapshot = initialSnapshot(options.controllerModel ?? CONST.DEFAULT_CONTROLLER_MODEL);
    }

    get consecutiveFailures(): number {
        return this.failures;
    }

    get running(): boolean {
        return this.timer !== null;
    }

    getSnapshot(): Snapshot {
        const { lastUpdated } = this.snapshot;
        return { ...this.snapshot, lastUpdated: lastUpdated ? new Date(lastUpdated.getTime()) : null };
    }

    start(): void {
        if (this.timer) return;
        this.timer = setInterval(() => this.tick(), this.pollInterval * 1000);
        this.tick();
    }

    /**
     * Stop scheduling polls. A poll already on the wire is allowed to finish
     * or time out before this resolves.
     */
    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        if (this.inFlight) {
            await this.inFlight;
        }
    }

    /**
     * Run one poll cycle. Returns 'skipped' without touching the device when
     * a cycle is already in flight.
     */
    async poll(): Promise<PollOutcome> {
        if (this.inFlight) {
            this.log.debug('Previous poll still running, skipping this cycle');
            return 'skipped';
        }
        const cycle = this.runCycle();
        this.inFlight = cycle;
        try {
            return await cycle;
        } finally {
            this.inFlight = null;
        }
    }

    /**
     * Poll now, or wait for the poll already in flight.
     */
    async refresh(): Promise<PollOutcome> {
        if (this.inFlight) {
            return this.inFlight;
        }
        return this.poll();
    }

    /**
     * Address for command writes. Uses the current address when there is one.
     */
    async getTarget(): Promise<ModbusTarget> {
        if (this.address === null) {
            this.address = await this.resolver.resolve(this.host);
        }
        return this.targetFor(this.address);
    }

    private targetFor(ip: string): ModbusTarget {
        const target: ModbusTarget = { ip, port: this.port, unitId: this.unitId };
        if (this.timeout !== undefined) target.timeout = this.timeout;
        return target;
    }

    private tick(): void {
        this.poll().catch(e => this.log.error(`Poll loop error: ${errorMessage(e)}`));
    }

    private async ensureTarget(): Promise<ModbusTarget> {
        const forced = this.failures > 0 && this.failures % this.reresolveAfter === 0;
        if (this.address === null || !this.addressConfirmed || forced) {
            if (forced) {
                this.log.log(`Re-resolving ${this.host} after ${this.failures} consecutive failures`);
            }
            const ip = await this.resolver.resolve(this.host);
            if (this.address !== null && ip !== this.address) {
                this.log.log(`${this.host} moved from ${this.address} to ${ip}`);
                this.transport.invalidate(this.address, this.port);
                this.addressConfirmed = false;
            }
            this.address = ip;
        }
        return this.targetFor(this.address);
    }

    private async runCycle(): Promise<PollOutcome> {
        let next: Snapshot;
        let outcome: PollOutcome;
        try {
            const target = await this.ensureTarget();
            const values = await this.transport.readRegisters(target, CONST.BULK_READ_START, CONST.BULK_READ_COUNT);
            const { fields, errors } = decodeRegisters(registersFromBlock(CONST.BULK_READ_START, values));
            for (const err of errors) {
                this.log.warn(`${err.message}; keeping previous ${err.field}`);
            }
            this.addressConfirmed = true;
            this.failures = 0;
            next = { ...this.snapshot, ...fields, lastUpdated: this.now(), available: true };
            outcome = 'ok';
        } catch (e) {
            this.failures++;
            this.log.warn(`Poll of ${this.host} failed (${this.failures} in a row): ${errorMessage(e)}`);
            next = { ...this.snapshot, available: false };
            outcome = 'failed';
        }
        this.publish(next);
        return outcome;
    }

    private publish(next: Snapshot): void {
        const wasAvailable = this.snapshot.available;
        this.snapshot = next;
        this.emit('snapshot', this.getSnapshot());
        if (wasAvailable !== next.available) {
            this.emit('availability', next.available);
        }
    }
}

export default SaunaCoordinator;

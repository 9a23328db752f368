import dns, { LookupAddress } from 'dns';
import net from 'net';
import * as CONST from './constants';
import { decodeRegisters, registersFromBlock } from './codec';
import { RegisterTransport } from './connection-manager';
import { SaunaResolutionError } from './errors';
import { Logger, silentLogger } from './logger';
import { ControllerStatus } from './types/sauna';
import { errorMessage, isIPv4, withTimeout } from './utils';

export interface ResolvedAddress {
    hostname: string;
    ip: string;
    resolvedAt: number;
}

export type LookupFn = (hostname: string) => Promise<LookupAddress[]>;

const systemLookup: LookupFn = hostname => dns.promises.lookup(hostname, { all: true });

export interface AddressResolverOptions {
    /** Name lookup; defaults to the system resolver, which handles .local names where mDNS is set up. */
    lookup?: LookupFn;
    /** Lookup timeout in ms. Default: 5000 */
    timeout?: number;
    logger?: Logger;
    now?: () => number;
}

function pickIPv4(addresses: LookupAddress[]): string {
    const v4 = addresses.find(a => a.family === 4 && isIPv4(a.address));
    if (!v4) {
        throw new Error('no IPv4 address in lookup result');
    }
    return v4.address;
}

export interface HostResolver {
    resolve(host: string): Promise<string>;
}

/**
 * Turns a configured host identifier into an IPv4 address.
 *
 * Literal addresses pass straight through, ordinary hostnames go to the system
 * resolver, and .local names are looked up with a timeout. Successful .local
 * lookups are cached per resolver instance; when a later lookup fails the
 * cached address is returned, however old it is.
 */
export class AddressResolver implements HostResolver {
    private cache: Map<string, ResolvedAddress>;
    private inFlight: Map<string, Promise<string>>;
    private lookup: LookupFn;
    private timeout: number;
    private log: Logger;
    private now: () => number;

    constructor(options: AddressResolverOptions = {}) {
        this.cache = new Map();
        this.inFlight = new Map();
        this.lookup = options.lookup ?? systemLookup;
        this.timeout = options.timeout ?? CONST.RESOLVE_TIMEOUT;
        this.log = options.logger ?? silentLogger;
        this.now = options.now ?? Date.now;
    }

    /**
     * @throws {SaunaResolutionError} when no address can be found, cache included
     */
    async resolve(host: string): Promise<string> {
        const hostname = host.trim();
        if (isIPv4(hostname)) {
            return hostname;
        }

        const key = hostname.toLowerCase();
        const pending = this.inFlight.get(key);
        if (pending) {
            return pending;
        }

        const resolution = this._resolve(hostname, key).finally(() => {
            this.inFlight.delete(key);
        });
        this.inFlight.set(key, resolution);
        return resolution;
    }

    getCached(host: string): ResolvedAddress | undefined {
        return this.cache.get(host.trim().toLowerCase());
    }

    private async _resolve(hostname: string, key: string): Promise<string> {
        if (!key.endsWith(CONST.LOCAL_SUFFIX)) {
            try {
                const ip = pickIPv4(await withTimeout(this.lookup(hostname), this.timeout, `resolve ${hostname}`));
                this.log.debug(`Resolved ${hostname} to ${ip}`);
                return ip;
            } catch (e) {
                throw new SaunaResolutionError(hostname, errorMessage(e));
            }
        }

        try {
            const ip = pickIPv4(await withTimeout(this.lookup(hostname), this.timeout, `resolve ${hostname}`));
            this.cache.set(key, { hostname, ip, resolvedAt: this.now() });
            this.log.debug(`Resolved ${hostname} to ${ip} via multicast lookup`);
            return ip;
        } catch (e) {
            const cached = this.cache.get(key);
            if (cached) {
                const ageSeconds = Math.round((this.now() - cached.resolvedAt) / 1000);
                this.log.warn(`Lookup of ${hostname} failed (${errorMessage(e)}), using cached ${cached.ip} from ${ageSeconds}s ago`);
                return cached.ip;
            }
            throw new SaunaResolutionError(hostname, errorMessage(e));
        }
    }
}

/**
 * Helper to check a single IP for an open Modbus port
 */
export async function checkPort(ip: string, port = CONST.DEFAULT_MODBUS_PORT, timeout = CONST.DEFAULT_PORT_CHECK_TIMEOUT): Promise<boolean> {
    return new Promise((resolve) => {
        const socket = new net.Socket();
        socket.setTimeout(timeout);

        socket.on('connect', () => {
            socket.destroy();
            resolve(true);
        });

        socket.on('timeout', () => {
            socket.destroy();
            resolve(false);
        });

        socket.on('error', () => {
            socket.destroy();
            resolve(false);
        });

        socket.connect(port, ip);
    });
}

export interface DiscoveredSauna {
    host: string;
    ip: string;
    controllerStatus: ControllerStatus;
    actualTemp: number;
}

export interface DiscoverOptions {
    resolver: HostResolver;
    transport: RegisterTransport;
    /** Hosts to try, in order. Default: DISCOVERY_CANDIDATES */
    candidates?: readonly string[];
    port?: number;
    unitId?: number;
    portCheck?: (ip: string, port: number) => Promise<boolean>;
    shouldStop?: () => boolean;
    statusCallback?: (msg: string) => void;
    logger?: Logger;
}

/**
 * Try candidate hosts until one answers like a sauna controller: its Modbus
 * port is open and the status and actual temperature registers decode.
 */
export async function discoverSauna(options: DiscoverOptions): Promise<DiscoveredSauna | null> {
    const candidates = options.candidates ?? CONST.DISCOVERY_CANDIDATES;
    const port = options.port ?? CONST.DEFAULT_MODBUS_PORT;
    const unitId = options.unitId ?? CONST.DEFAULT_UNIT_ID;
    const portCheck = options.portCheck ?? ((ip: string, p: number) => checkPort(ip, p));
    const log = options.logger ?? silentLogger;

    for (const host of candidates) {
        if (options.shouldStop && options.shouldStop()) break;
        if (options.statusCallback) options.statusCallback(`Checking ${host}...`);

        let ip: string;
        try {
            ip = await options.resolver.resolve(host);
        } catch (e) {
            log.debug(`Discovery skipped ${host}: ${errorMessage(e)}`);
            continue;
        }

        if (!await portCheck(ip, port)) continue;

        try {
            const values = await options.transport.readRegisters({ ip, port, unitId }, CONST.BULK_READ_START, CONST.BULK_READ_COUNT);
            const { fields } = decodeRegisters(registersFromBlock(CONST.BULK_READ_START, values));
            if (fields.controllerStatus !== undefined && fields.actualTemp !== undefined) {
                log.log(`Discovered sauna controller at ${host} (${ip})`);
                return { host, ip, controllerStatus: fields.controllerStatus, actualTemp: fields.actualTemp };
            }
            log.debug(`${host} answered but does not look like a sauna controller`);
        } catch (e) {
            log.debug(`Discovery probe of ${host} failed: ${errorMessage(e)}`);
        }
    }
    return null;
}

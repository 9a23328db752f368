import fs from 'fs-extra';
import path from 'path';
import crypto from 'crypto';
import * as CONST from './constants';
import { Logger, createConsoleLogger } from './logger';
import { errorMessage } from './utils';

export interface SavedSauna {
    id: string;
    name: string;
    host: string;
    port: number;
    unitId: number;
    pollInterval: number;
    addedAt: string;
}

export type SaunaInput = Partial<Omit<SavedSauna, 'port' | 'unitId' | 'pollInterval'>> & {
    port?: number | string;
    unitId?: number | string;
    pollInterval?: number | string;
};

function toInt(value: number | string | undefined, fallback: number): number {
    if (value === undefined || value === '') return fallback;
    const n = parseInt(value.toString(), 10);
    return isNaN(n) ? fallback : n;
}

function isSavedSauna(value: unknown): value is SavedSauna {
    if (value === null || typeof value !== 'object') return false;
    return typeof Reflect.get(value, 'id') === 'string' && typeof Reflect.get(value, 'host') === 'string';
}

/**
 * Saunas the user has configured or discovery has found, kept in a JSON
 * file in the Node-RED user directory.
 */
export class DeviceManager {
    private filePath: string;
    private devices: SavedSauna[];
    private log: Logger;

    constructor(userDir: string, logger: Logger = createConsoleLogger()) {
        this.filePath = path.join(userDir, 'sauna-devices.json');
        this.devices = [];
        this.log = logger;
        this.load();
    }

    load(): void {
        try {
            if (fs.existsSync(this.filePath)) {
                const stored: unknown = fs.readJsonSync(this.filePath);
                this.devices = Array.isArray(stored) ? stored.filter(isSavedSauna) : [];
            }
        } catch (e) {
            this.log.error(`Failed to load saunas: ${errorMessage(e)}`);
            this.devices = [];
        }
    }

    save(): void {
        try {
            fs.writeJsonSync(this.filePath, this.devices, { spaces: 2 });
        } catch (e) {
            this.log.error(`Failed to save saunas: ${errorMessage(e)}`);
        }
    }

    list(): SavedSauna[] {
        return this.devices;
    }

    /**
     * Add a new sauna
     * @param {Object} device { name, host, port, unitId, pollInterval }
     */
    add(device: SaunaInput): SavedSauna {
        const host = (device.host || '').trim();
        if (!host) throw new Error("Host is required");

        const newDevice: SavedSauna = {
            id: crypto.randomUUID(),
            name: device.name || `Sauna ${host}`,
            host,
            port: toInt(device.port, CONST.DEFAULT_MODBUS_PORT),
            unitId: toInt(device.unitId, CONST.DEFAULT_UNIT_ID),
            pollInterval: toInt(device.pollInterval, CONST.DEFAULT_POLL_INTERVAL),
            addedAt: new Date().toISOString()
        };

        this.devices.push(newDevice);
        this.save();
        return newDevice;
    }

    /**
     * Add or return existing sauna based on host/port
     */
    upsert(device: SaunaInput): SavedSauna {
        const host = (device.host || '').trim().toLowerCase();
        const port = toInt(device.port, CONST.DEFAULT_MODBUS_PORT);

        const existing = this.devices.find(d => d.host.toLowerCase() === host && d.port === port);

        if (existing) return existing;
        return this.add(device);
    }

    update(id: string, data: SaunaInput): SavedSauna {
        const idx = this.devices.findIndex(d => d.id === id);
        if (idx === -1) throw new Error("Sauna not found");

        const current = this.devices[idx];
        const updated: SavedSauna = {
            ...current,
            name: data.name || current.name,
            host: (data.host || '').trim() || current.host,
            port: toInt(data.port, current.port),
            unitId: toInt(data.unitId, current.unitId),
            pollInterval: toInt(data.pollInterval, current.pollInterval)
        };

        this.devices[idx] = updated;
        this.save();
        return updated;
    }

    delete(id: string): boolean {
        const idx = this.devices.findIndex(d => d.id === id);
        if (idx === -1) return false;

        this.devices.splice(idx, 1);
        this.save();
        return true;
    }
}

export default DeviceManager;

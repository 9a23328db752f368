import { SaunaCoordinator, initialSnapshot } from '../src/coordinator';
import { SaunaResolutionError, SaunaTransportError } from '../src/errors';
import { Logger } from '../src/logger';
import * as CONST from '../src/constants';
import { ModbusTarget, Snapshot } from '../src/types/sauna';

const POLLED_AT = new Date('2026-01-01T10:00:00Z');

function block(overrides: Record<number, number> = {}): number[] {
    const values = new Array<number>(CONST.BULK_READ_COUNT).fill(0);
    values[CONST.REG_SET_TEMP] = 80;
    values[CONST.REG_ACTUAL_TEMP] = 65;
    values[CONST.REG_PROFILE] = 2;
    values[CONST.REG_SESSION_TIME] = 130;
    values[CONST.REG_VENTILATION_TIME] = 15;
    values[CONST.REG_AROMA] = 10;
    values[CONST.REG_HUMIDITY_SET] = 20;
    values[CONST.REG_HUMIDITY_ACTUAL] = 12;
    values[CONST.REG_CONTROLLER_STATUS] = 1;
    for (const [address, value] of Object.entries(overrides)) {
        values[Number(address)] = value;
    }
    return values;
}

const readFailure = () => new SaunaTransportError('read 21 registers at 0', '192.168.1.50', 502, new Error('ECONNRESET'));

describe('SaunaCoordinator', () => {
    let transport: {
        readRegisters: jest.Mock<Promise<number[]>, [ModbusTarget, number, number]>;
        writeRegister: jest.Mock<Promise<void>, [ModbusTarget, number, number]>;
        invalidate: jest.Mock<void, [string, number]>;
    };
    let resolver: { resolve: jest.Mock<Promise<string>, [string]> };
    let logger: { [K in keyof Logger]: jest.Mock<void, [string]> };
    let coordinator: SaunaCoordinator;

    beforeEach(() => {
        transport = {
            readRegisters: jest.fn().mockResolvedValue(block()),
            writeRegister: jest.fn(),
            invalidate: jest.fn()
        };
        resolver = { resolve: jest.fn().mockResolvedValue('192.168.1.50') };
        logger = { log: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
        coordinator = new SaunaCoordinator({
            host: 'ffes.local',
            transport,
            resolver,
            logger,
            now: () => POLLED_AT
        });
    });

    afterEach(async () => {
        await coordinator.stop();
    });

    test('starts with defaults and no data', () => {
        expect(coordinator.getSnapshot()).toEqual(initialSnapshot(CONST.DEFAULT_CONTROLLER_MODEL));
        expect(coordinator.getSnapshot()).toEqual({
            controllerStatus: 'off',
            light: false,
            aux: false,
            controllerModel: 2,
            actualTemp: 0,
            humidity: 0,
            lastUpdated: null,
            available: false
        });
    });

    test('publishes a snapshot from one bulk read', async () => {
        await expect(coordinator.poll()).resolves.toBe('ok');

        expect(resolver.resolve).toHaveBeenCalledWith('ffes.local');
        expect(transport.readRegisters).toHaveBeenCalledWith({ ip: '192.168.1.50', port: 502, unitId: 1 }, 0, 21);
        expect(coordinator.getSnapshot()).toEqual({
            controllerStatus: 'heating',
            light: false,
            aux: false,
            controllerModel: 2,
            actualTemp: 65,
            humidity: 12,
            setTemp: 80,
            profile: 2,
            sessionTime: '01:30',
            ventilationTime: '00:15',
            aromaValue: 10,
            humidityValue: 20,
            errorCode: 0,
            lastUpdated: POLLED_AT,
            available: true
        });
    });

    test('hands out copies of the timestamp', async () => {
        await coordinator.poll();

        const copy = coordinator.getSnapshot();
        copy.lastUpdated?.setFullYear(2000);

        expect(coordinator.getSnapshot().lastUpdated).toEqual(POLLED_AT);
        expect(coordinator.getSnapshot().lastUpdated).not.toBe(coordinator.getSnapshot().lastUpdated);
    });

    test('never reports light or aux as on', async () => {
        transport.readRegisters.mockResolvedValue(block({ 7: 1, 8: 1 }));

        await coordinator.poll();

        expect(coordinator.getSnapshot()).toMatchObject({ light: false, aux: false, available: true });
        expect(logger.warn).not.toHaveBeenCalled();
    });

    test('passes the configured timeout to the transport', async () => {
        const slow = new SaunaCoordinator({ host: '192.168.1.50', transport, resolver, timeout: 2500 });

        await slow.poll();

        expect(transport.readRegisters).toHaveBeenCalledWith({ ip: '192.168.1.50', port: 502, unitId: 1, timeout: 2500 }, 0, 21);
    });

    test('keeps the last values when a poll fails', async () => {
        await coordinator.poll();
        transport.readRegisters.mockRejectedValue(readFailure());

        await expect(coordinator.poll()).resolves.toBe('failed');

        const snapshot = coordinator.getSnapshot();
        expect(snapshot.available).toBe(false);
        expect(snapshot.actualTemp).toBe(65);
        expect(snapshot.controllerStatus).toBe('heating');
        expect(snapshot.lastUpdated).toBe(POLLED_AT);
        expect(coordinator.consecutiveFailures).toBe(1);
        expect(logger.warn).toHaveBeenCalledWith(
            'Poll of ffes.local failed (1 in a row): read 21 registers at 0 failed on 192.168.1.50:502: ECONNRESET'
        );
    });

    test('emits availability only on transitions', async () => {
        const transitions: boolean[] = [];
        const snapshots: Snapshot[] = [];
        coordinator.on('availability', (available: boolean) => transitions.push(available));
        coordinator.on('snapshot', (snapshot: Snapshot) => snapshots.push(snapshot));

        await coordinator.poll();
        await coordinator.poll();
        transport.readRegisters.mockRejectedValue(readFailure());
        await coordinator.poll();
        await coordinator.poll();
        transport.readRegisters.mockResolvedValue(block());
        await coordinator.poll();

        expect(transitions).toEqual([true, false, true]);
        expect(snapshots.map(s => s.available)).toEqual([true, true, false, false, true]);
        expect(coordinator.consecutiveFailures).toBe(0);
    });

    test('keeps the previous value of a field that fails to decode', async () => {
        await coordinator.poll();
        transport.readRegisters.mockResolvedValue(block({ [CONST.REG_CONTROLLER_STATUS]: 9, [CONST.REG_ACTUAL_TEMP]: 70 }));

        await expect(coordinator.poll()).resolves.toBe('ok');

        const snapshot = coordinator.getSnapshot();
        expect(snapshot.controllerStatus).toBe('heating');
        expect(snapshot.actualTemp).toBe(70);
        expect(snapshot.available).toBe(true);
        expect(logger.warn).toHaveBeenCalledWith(
            'Register 20 (controllerStatus) holds 9: unknown controller status; keeping previous controllerStatus'
        );
    });

    test('re-resolves the address on every third consecutive failure', async () => {
        const lookups: number[] = [];

        await coordinator.poll();
        lookups.push(resolver.resolve.mock.calls.length);

        transport.readRegisters.mockRejectedValue(readFailure());
        for (let i = 0; i < 7; i++) {
            await coordinator.poll();
            lookups.push(resolver.resolve.mock.calls.length);
        }

        // Failing cycles 1-3 reuse the address, cycle 4 (N+1) and cycle 7 (2N+1) look it up again
        expect(lookups).toEqual([1, 1, 1, 1, 2, 2, 2, 3]);
        expect(logger.log).toHaveBeenCalledWith('Re-resolving ffes.local after 3 consecutive failures');
    });

    test('resolves again on every cycle until the address is confirmed', async () => {
        resolver.resolve.mockRejectedValue(new SaunaResolutionError('ffes.local', 'lookup timed out'));

        await expect(coordinator.poll()).resolves.toBe('failed');
        await expect(coordinator.poll()).resolves.toBe('failed');

        expect(resolver.resolve).toHaveBeenCalledTimes(2);
        expect(transport.readRegisters).not.toHaveBeenCalled();
        expect(coordinator.getSnapshot().available).toBe(false);
    });

    test('drops the old connection when the address changes', async () => {
        await coordinator.poll();
        transport.readRegisters.mockRejectedValue(readFailure());
        await coordinator.poll();
        await coordinator.poll();
        await coordinator.poll();

        resolver.resolve.mockResolvedValue('192.168.1.51');
        transport.readRegisters.mockResolvedValue(block());
        await expect(coordinator.poll()).resolves.toBe('ok');

        expect(transport.invalidate).toHaveBeenCalledWith('192.168.1.50', 502);
        expect(transport.readRegisters).toHaveBeenLastCalledWith({ ip: '192.168.1.51', port: 502, unitId: 1 }, 0, 21);
        expect(logger.log).toHaveBeenCalledWith('ffes.local moved from 192.168.1.50 to 192.168.1.51');
    });

    test('skips a poll while one is in flight', async () => {
        let open: () => void = () => undefined;
        const gate = new Promise<void>(r => { open = r; });
        transport.readRegisters.mockImplementation(async () => {
            await gate;
            return block();
        });

        const first = coordinator.poll();
        await expect(coordinator.poll()).resolves.toBe('skipped');

        open();
        await expect(first).resolves.toBe('ok');
        expect(transport.readRegisters).toHaveBeenCalledTimes(1);
    });

    test('refresh joins the poll in flight', async () => {
        let open: () => void = () => undefined;
        const gate = new Promise<void>(r => { open = r; });
        transport.readRegisters.mockImplementation(async () => {
            await gate;
            return block();
        });

        const first = coordinator.poll();
        const refreshed = coordinator.refresh();
        open();

        await expect(Promise.all([first, refreshed])).resolves.toEqual(['ok', 'ok']);
        expect(transport.readRegisters).toHaveBeenCalledTimes(1);
    });

    test('stop waits for the poll in flight', async () => {
        let open: () => void = () => undefined;
        const gate = new Promise<void>(r => { open = r; });
        transport.readRegisters.mockImplementation(async () => {
            await gate;
            return block();
        });

        coordinator.start();
        expect(coordinator.running).toBe(true);

        const stopped = coordinator.stop();
        open();
        await stopped;

        expect(coordinator.running).toBe(false);
        expect(coordinator.getSnapshot().available).toBe(true);
        expect(transport.readRegisters).toHaveBeenCalledTimes(1);
    });

    test('getTarget resolves once and reuses the address', async () => {
        await expect(coordinator.getTarget()).resolves.toEqual({ ip: '192.168.1.50', port: 502, unitId: 1 });
        await coordinator.getTarget();

        expect(resolver.resolve).toHaveBeenCalledTimes(1);
    });

    test('clamps the poll interval', () => {
        expect(new SaunaCoordinator({ host: 'a', transport, resolver, pollInterval: 1 }).pollInterval).toBe(5);
        expect(new SaunaCoordinator({ host: 'a', transport, resolver, pollInterval: 1000 }).pollInterval).toBe(300);
        expect(new SaunaCoordinator({ host: 'a', transport, resolver }).pollInterval).toBe(15);
    });
});

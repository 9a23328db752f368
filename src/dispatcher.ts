import * as CONST from './constants';
import { encodeField, isSaunaProfile } from './codec';
import { RegisterTransport } from './connection-manager';
import { SaunaResolutionError, SaunaUnsupportedError, SaunaValidationError } from './errors';
import { Logger, silentLogger } from './logger';
import { ControllerStatus, ModbusTarget, SaunaProfile } from './types/sauna';
import { errorMessage } from './utils';

export interface StartSessionParams {
    profile: number;
    temperature: number;
    sessionTime: string;
    ventilationTime: string;
    aroma: number;
    humidity: number;
}

export type SaunaCommand =
    | { action: 'status'; value: number }
    | { action: 'light'; value: boolean }
    | { action: 'aux'; value: boolean }
    | ({ action: 'start_session' } & StartSessionParams)
    | { action: 'set_temp'; value: number }
    | { action: 'set_profile'; value: number }
    | { action: 'stop_session' };

export type SaunaAction = SaunaCommand['action'];

export interface PlannedWrite {
    step: string;
    address: number;
    value: number;
}

export type CommandFailureKind = 'validation' | 'unsupported' | 'resolution' | 'transport';

export type CommandResult =
    | { success: true; action: SaunaAction; writes: PlannedWrite[] }
    | {
        success: false;
        action: SaunaAction;
        kind: CommandFailureKind;
        reason: string;
        failedStep?: string;
        completedSteps: string[];
    };

const STATUS_BY_VALUE: readonly ControllerStatus[] = ['off', 'heating', 'ventilation', 'standby'];

function statusFromValue(value: number): ControllerStatus {
    const status = Number.isInteger(value) ? STATUS_BY_VALUE[value] : undefined;
    if (status === undefined) {
        throw new SaunaValidationError('status', value, `must be one of ${CONST.STATUS_OFF}-${CONST.STATUS_STANDBY}`);
    }
    return status;
}

function checkProfile(value: number): SaunaProfile {
    if (!isSaunaProfile(value)) {
        throw new SaunaValidationError('profile', value, `must be an integer between ${CONST.MIN_PROFILE} and ${CONST.MAX_PROFILE}`);
    }
    return value;
}

function checkFlag(field: string, value: unknown): boolean {
    if (typeof value !== 'boolean') {
        throw new SaunaValidationError(field, value, 'must be true or false');
    }
    return value;
}

/**
 * Validate a command and work out its register writes, in order.
 * Nothing is written here; the first invalid parameter throws.
 *
 * @throws {SaunaValidationError}
 * @throws {SaunaUnsupportedError} for light and aux
 */
export function validateCommand(command: SaunaCommand): PlannedWrite[] {
    switch (command.action) {
        case 'status':
            return [{ step: 'status', address: CONST.REG_CONTROLLER_STATUS, value: encodeField('controllerStatus', statusFromValue(command.value)) }];
        case 'light':
        case 'aux':
            checkFlag(command.action, command.value);
            throw new SaunaUnsupportedError(command.action, 'the controller has no Modbus register for it');
        case 'set_temp':
            return [{ step: 'temperature', address: CONST.REG_SET_TEMP, value: encodeField('setTemp', command.value) }];
        case 'set_profile':
            return [{ step: 'profile', address: CONST.REG_PROFILE, value: encodeField('profile', checkProfile(command.value)) }];
        case 'stop_session':
            return [{ step: 'status', address: CONST.REG_CONTROLLER_STATUS, value: encodeField('controllerStatus', 'off') }];
        case 'start_session':
            // Operating parameters first; the status write that starts heating goes last
            return [
                { step: 'profile', address: CONST.REG_PROFILE, value: encodeField('profile', checkProfile(command.profile)) },
                { step: 'temperature', address: CONST.REG_SET_TEMP, value: encodeField('setTemp', command.temperature) },
                { step: 'session_time', address: CONST.REG_SESSION_TIME, value: encodeField('sessionTime', command.sessionTime) },
                { step: 'ventilation_time', address: CONST.REG_VENTILATION_TIME, value: encodeField('ventilationTime', command.ventilationTime) },
                { step: 'aroma', address: CONST.REG_AROMA, value: encodeField('aromaValue', command.aroma) },
                { step: 'humidity', address: CONST.REG_HUMIDITY_SET, value: encodeField('humidityValue', command.humidity) },
                { step: 'status', address: CONST.REG_CONTROLLER_STATUS, value: encodeField('controllerStatus', 'heating') }
            ];
    }
}

export interface CommandDispatcherOptions {
    transport: RegisterTransport;
    /** Supplies the controller address, resolving it if needed. */
    target: () => Promise<ModbusTarget>;
    logger?: Logger;
}

/**
 * Turns actions into register writes. Each dispatch is resolved exactly
 * once and never retried here; a failure part-way through a sequence is
 * reported with the steps that did land, and nothing is rolled back.
 */
export class CommandDispatcher {
    private transport: RegisterTransport;
    private target: () => Promise<ModbusTarget>;
    private log: Logger;

    constructor(options: CommandDispatcherOptions) {
        this.transport = options.transport;
        this.target = options.target;
        this.log = options.logger ?? silentLogger;
    }

    async dispatch(command: SaunaCommand): Promise<CommandResult> {
        let writes: PlannedWrite[];
        try {
            writes = validateCommand(command);
        } catch (e) {
            if (e instanceof SaunaValidationError || e instanceof SaunaUnsupportedError) {
                this.log.warn(`Rejected ${command.action}: ${e.message}`);
                const kind: CommandFailureKind = e instanceof SaunaValidationError ? 'validation' : 'unsupported';
                return { success: false, action: command.action, kind, reason: e.message, completedSteps: [] };
            }
            throw e;
        }

        let target: ModbusTarget;
        try {
            target = await this.target();
        } catch (e) {
            const kind: CommandFailureKind = e instanceof SaunaResolutionError ? 'resolution' : 'transport';
            this.log.error(`Cannot send ${command.action}: ${errorMessage(e)}`);
            return { success: false, action: command.action, kind, reason: errorMessage(e), completedSteps: [] };
        }

        const completedSteps: string[] = [];
        for (const write of writes) {
            try {
                await this.transport.writeRegister(target, write.address, write.value);
                completedSteps.push(write.step);
            } catch (e) {
                const reason = `${write.step} (register ${write.address}) failed: ${errorMessage(e)}`;
                this.log.error(`${command.action} stopped after ${completedSteps.length} of ${writes.length} writes: ${reason}`);
                return {
                    success: false,
                    action: command.action,
                    kind: 'transport',
                    reason,
                    failedStep: write.step,
                    completedSteps
                };
            }
        }

        this.log.debug(`${command.action} applied (${writes.length} writes)`);
        return { success: true, action: command.action, writes };
    }
}

export default CommandDispatcher;

/**
 * Register Codec
 * Pure translation between raw holding register values and sauna domain values.
 * The register table is data: adding a register means adding an entry, not a branch.
 */

import * as CONST from './constants';
import { SaunaDecodeError, SaunaValidationError } from './errors';
import { ControllerStatus, RegisterField, RegisterFields, SaunaProfile } from './types/sauna';

export const UNKNOWN = 'unknown' as const;
export type Unknown = typeof UNKNOWN;

const STATUS_BY_CODE: Record<number, ControllerStatus> = {
    [CONST.STATUS_OFF]: 'off',
    [CONST.STATUS_HEATING]: 'heating',
    [CONST.STATUS_VENTILATION]: 'ventilation',
    [CONST.STATUS_STANDBY]: 'standby'
};

export const STATUS_CODES: Readonly<Record<ControllerStatus, number>> = {
    off: CONST.STATUS_OFF,
    heating: CONST.STATUS_HEATING,
    ventilation: CONST.STATUS_VENTILATION,
    standby: CONST.STATUS_STANDBY
};

export const PROFILE_NAMES: Readonly<Record<SaunaProfile, string>> = {
    1: 'Infrared Sauna',
    2: 'Dry Sauna',
    3: 'Wet Sauna',
    4: 'Ventilation',
    5: 'Steambath',
    6: 'Infrared CPIR',
    7: 'Infrared MIX'
};

export function isSaunaProfile(value: number): value is SaunaProfile {
    return Number.isInteger(value) && value >= CONST.MIN_PROFILE && value <= CONST.MAX_PROFILE;
}

export function profileFromName(name: string): SaunaProfile | undefined {
    const wanted = name.trim().toLowerCase();
    for (let id = CONST.MIN_PROFILE; id <= CONST.MAX_PROFILE; id++) {
        if (isSaunaProfile(id) && PROFILE_NAMES[id].toLowerCase() === wanted) return id;
    }
    return undefined;
}

/**
 * Map a raw status code to its name. Codes outside 0-3 give the UNKNOWN sentinel.
 */
export function decodeStatus(raw: number): ControllerStatus | Unknown {
    return STATUS_BY_CODE[raw] ?? UNKNOWN;
}

export function decodeProfile(raw: number): SaunaProfile | Unknown {
    return isSaunaProfile(raw) ? raw : UNKNOWN;
}

/**
 * Unpack an HHMM register value (130 = 01:30) into "HH:MM".
 * @throws {RangeError} when the minutes part is 60 or more
 */
export function decodePackedTime(raw: number): string {
    if (!Number.isInteger(raw) || raw < 0 || raw > CONST.MAX_PACKED_TIME) {
        throw new RangeError('packed time out of range');
    }
    const hours = Math.floor(raw / 100);
    const minutes = raw % 100;
    if (minutes >= 60) {
        throw new RangeError(`minutes part ${minutes} is not below 60`);
    }
    return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Pack an "HH:MM" duration into HHMM.
 * @throws {SaunaValidationError} for malformed input or minutes of 60 or more
 */
export function encodePackedTime(value: string, field = 'time'): number {
    const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
    if (!match) {
        throw new SaunaValidationError(field, value, 'expected HH:MM');
    }
    const hours = parseInt(match[1], 10);
    const minutes = parseInt(match[2], 10);
    if (minutes >= 60) {
        throw new SaunaValidationError(field, value, 'minutes must be below 60');
    }
    return hours * 100 + minutes;
}

function toSigned16(raw: number): number {
    return raw > 0x7fff ? raw - 0x10000 : raw;
}

function decodePercent(raw: number): number {
    if (raw < CONST.MIN_PERCENT || raw > CONST.MAX_PERCENT) {
        throw new RangeError('percentage out of range');
    }
    return raw;
}

function encodeBounded(field: string, value: number, min: number, max: number): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new SaunaValidationError(field, value, 'not a number');
    }
    if (value < min || value > max) {
        throw new SaunaValidationError(field, value, `must be between ${min} and ${max}`);
    }
    return Math.round(value);
}

export interface RegisterRange {
    readonly min: number;
    readonly max: number;
}

export interface RegisterDefinition<K extends RegisterField> {
    readonly address: number;
    readonly label: string;
    /** Raw register range accepted on write; present on every writable register. */
    readonly range?: RegisterRange;
    readonly decode: (raw: number) => RegisterFields[K];
    readonly encode?: (value: RegisterFields[K]) => number;
}

export type RegisterMap = { readonly [K in RegisterField]: RegisterDefinition<K> };

const TEMPERATURE_RANGE: RegisterRange = { min: CONST.MIN_TEMPERATURE, max: CONST.MAX_TEMPERATURE };
const PERCENT_RANGE: RegisterRange = { min: CONST.MIN_PERCENT, max: CONST.MAX_PERCENT };
const TIME_RANGE: RegisterRange = { min: 0, max: CONST.MAX_PACKED_TIME };

const REGISTER_DEFINITIONS: RegisterMap = {
    setTemp: {
        address: CONST.REG_SET_TEMP,
        label: 'Temperature set value',
        range: TEMPERATURE_RANGE,
        decode: (raw: number) => toSigned16(raw),
        encode: (value: number) => encodeBounded('temperature', value, TEMPERATURE_RANGE.min, TEMPERATURE_RANGE.max)
    },
    actualTemp: {
        address: CONST.REG_ACTUAL_TEMP,
        label: 'Actual temperature',
        decode: (raw: number) => toSigned16(raw)
    },
    profile: {
        address: CONST.REG_PROFILE,
        label: 'Sauna profile',
        range: { min: CONST.MIN_PROFILE, max: CONST.MAX_PROFILE },
        decode: (raw: number) => {
            const profile = decodeProfile(raw);
            if (profile === UNKNOWN) throw new RangeError('unknown profile');
            return profile;
        },
        encode: (value: SaunaProfile) => {
            if (!isSaunaProfile(value)) {
                throw new SaunaValidationError('profile', value, `must be an integer between ${CONST.MIN_PROFILE} and ${CONST.MAX_PROFILE}`);
            }
            return value;
        }
    },
    sessionTime: {
        address: CONST.REG_SESSION_TIME,
        label: 'Session time',
        range: TIME_RANGE,
        decode: decodePackedTime,
        encode: (value: string) => encodePackedTime(value, 'session_time')
    },
    ventilationTime: {
        address: CONST.REG_VENTILATION_TIME,
        label: 'Ventilation time',
        range: TIME_RANGE,
        decode: decodePackedTime,
        encode: (value: string) => encodePackedTime(value, 'ventilation_time')
    },
    aromaValue: {
        address: CONST.REG_AROMA,
        label: 'Aroma set value',
        range: PERCENT_RANGE,
        decode: decodePercent,
        encode: (value: number) => encodeBounded('aroma', value, PERCENT_RANGE.min, PERCENT_RANGE.max)
    },
    humidityValue: {
        address: CONST.REG_HUMIDITY_SET,
        label: 'Vaporizer humidity set value',
        range: PERCENT_RANGE,
        decode: decodePercent,
        encode: (value: number) => encodeBounded('humidity', value, PERCENT_RANGE.min, PERCENT_RANGE.max)
    },
    errorCode: {
        address: CONST.REG_ERROR_CODE,
        label: 'Error code',
        decode: (raw: number) => raw
    },
    humidity: {
        address: CONST.REG_HUMIDITY_ACTUAL,
        label: 'Actual humidity',
        decode: decodePercent
    },
    controllerStatus: {
        address: CONST.REG_CONTROLLER_STATUS,
        label: 'Controller status',
        range: { min: CONST.STATUS_OFF, max: CONST.STATUS_STANDBY },
        decode: (raw: number) => {
            const status = decodeStatus(raw);
            if (status === UNKNOWN) throw new RangeError('unknown controller status');
            return status;
        },
        encode: (value: ControllerStatus) => {
            const code = STATUS_CODES[value];
            if (code === undefined) {
                throw new SaunaValidationError('status', value, 'unknown controller status');
            }
            return code;
        }
    }
};

export const REGISTER_MAP: RegisterMap = Object.freeze(REGISTER_DEFINITIONS);

export const REGISTER_FIELDS: readonly RegisterField[] = [
    'setTemp',
    'actualTemp',
    'profile',
    'sessionTime',
    'ventilationTime',
    'aromaValue',
    'humidityValue',
    'errorCode',
    'humidity',
    'controllerStatus'
];

export interface DecodeResult {
    fields: Partial<RegisterFields>;
    errors: SaunaDecodeError[];
}

/**
 * Index a contiguous block of register values by address.
 */
export function registersFromBlock(start: number, values: readonly number[]): Record<number, number> {
    const registers: Record<number, number> = {};
    values.forEach((value, i) => {
        registers[start + i] = value;
    });
    return registers;
}

function decodeInto<K extends RegisterField>(field: K, registers: Readonly<Record<number, number>>, result: DecodeResult): void {
    const def = REGISTER_MAP[field];
    const raw = registers[def.address];
    if (raw === undefined) return;

    try {
        result.fields[field] = def.decode(raw);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        result.errors.push(new SaunaDecodeError(field, def.address, raw, reason));
    }
}

/**
 * Decode every mapped register present in `registers`. A malformed value is
 * reported in `errors` and left out of `fields`; the other fields still decode.
 */
export function decodeRegisters(registers: Readonly<Record<number, number>>): DecodeResult {
    const result: DecodeResult = { fields: {}, errors: [] };
    for (const field of REGISTER_FIELDS) {
        decodeInto(field, registers, result);
    }
    return result;
}

export function isWritable(field: RegisterField): boolean {
    return REGISTER_MAP[field].encode !== undefined;
}

/**
 * Encode a domain value for its register.
 * @throws {SaunaValidationError} for read-only fields or values out of range
 */
export function encodeField<K extends RegisterField>(field: K, value: RegisterFields[K]): number {
    const def: RegisterDefinition<K> = REGISTER_MAP[field];
    if (!def.encode || !def.range) {
        throw new SaunaValidationError(field, value, 'register is read-only');
    }
    const raw = def.encode(value);
    if (raw < def.range.min || raw > def.range.max) {
        throw new SaunaValidationError(field, value, `encodes to ${raw}, outside ${def.range.min}-${def.range.max}`);
    }
    return raw;
}

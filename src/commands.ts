/**
 * Command payload parsing
 *
 * Inbound messages carry loosely typed values ("1", "on", "Dry Sauna").
 * The schemas here only settle the shape and coerce types; range checks
 * belong to the codec and run when the command is dispatched.
 */
import { z } from 'zod';
import { STATUS_CODES, profileFromName } from './codec';
import { SaunaCommand } from './dispatcher';
import { SaunaValidationError } from './errors';
import { ControllerStatus, Snapshot } from './types/sauna';

// Defaults for a session started without explicit parameters
export const DEFAULT_SESSION_TEMPERATURE = 80;
export const DEFAULT_SESSION_TIME = '01:00';
export const DEFAULT_VENTILATION_TIME = '00:15';

function isStatusName(value: string): value is ControllerStatus {
    return Object.prototype.hasOwnProperty.call(STATUS_CODES, value);
}

const FlagSchema = z.preprocess((v) => {
    if (typeof v === 'number') {
        if (v === 1) return true;
        if (v === 0) return false;
    }
    if (typeof v === 'string') {
        const s = v.trim().toLowerCase();
        if (s === '1' || s === 'true' || s === 'on') return true;
        if (s === '0' || s === 'false' || s === 'off') return false;
    }
    return v;
}, z.boolean());

const StatusSchema = z.preprocess((v) => {
    if (typeof v === 'string') {
        const s = v.trim().toLowerCase();
        if (isStatusName(s)) return STATUS_CODES[s];
        return s === '' ? v : Number(s);
    }
    return v;
}, z.number());

const ProfileSchema = z.preprocess((v) => {
    if (typeof v === 'string') {
        const byName = profileFromName(v);
        if (byName !== undefined) return byName;
        const n = Number(v);
        return v.trim() === '' || Number.isNaN(n) ? v : n;
    }
    return v;
}, z.number());

// Numbers and numeric strings only; null, '' and arrays are not read as 0
const NumberSchema = z.preprocess((v) => {
    if (typeof v === 'string' && v.trim() !== '') {
        const n = Number(v);
        return Number.isNaN(n) ? v : n;
    }
    return v;
}, z.number());

const CommandSchema = z.discriminatedUnion('action', [
    z.object({ action: z.literal('status'), value: StatusSchema }),
    z.object({ action: z.literal('light'), value: FlagSchema }),
    z.object({ action: z.literal('aux'), value: FlagSchema }),
    z.object({ action: z.literal('set_temp'), value: NumberSchema }),
    z.object({ action: z.literal('set_profile'), value: ProfileSchema }),
    z.object({ action: z.literal('stop_session') }),
    z.object({
        action: z.literal('start_session'),
        profile: ProfileSchema.optional(),
        temperature: NumberSchema.optional(),
        session_time: z.string().optional(),
        ventilation_time: z.string().optional(),
        aroma: NumberSchema.optional(),
        humidity: NumberSchema.optional()
    })
]);

/**
 * Parse a message payload into a command. Missing session parameters are
 * taken from the current snapshot, then from the defaults above.
 *
 * @throws {SaunaValidationError} when the payload has the wrong shape
 */
export function parseCommand(payload: unknown, current?: Snapshot): SaunaCommand {
    const parsed = CommandSchema.safeParse(payload);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'payload';
        throw new SaunaValidationError(field, describe(payload, issue ? issue.path : []), issue ? issue.message : 'invalid command');
    }

    const cmd = parsed.data;
    switch (cmd.action) {
        case 'status':
            return { action: 'status', value: cmd.value };
        case 'set_temp':
            return { action: 'set_temp', value: cmd.value };
        case 'set_profile':
            return { action: 'set_profile', value: cmd.value };
        case 'light':
            return { action: 'light', value: cmd.value };
        case 'aux':
            return { action: 'aux', value: cmd.value };
        case 'stop_session':
            return { action: 'stop_session' };
        case 'start_session':
            return {
                action: 'start_session',
                profile: cmd.profile ?? current?.profile ?? 1,
                temperature: cmd.temperature ?? current?.setTemp ?? DEFAULT_SESSION_TEMPERATURE,
                sessionTime: cmd.session_time ?? current?.sessionTime ?? DEFAULT_SESSION_TIME,
                ventilationTime: cmd.ventilation_time ?? current?.ventilationTime ?? DEFAULT_VENTILATION_TIME,
                aroma: cmd.aroma ?? current?.aromaValue ?? 0,
                humidity: cmd.humidity ?? current?.humidityValue ?? 0
            };
    }
}

function describe(payload: unknown, path: ReadonlyArray<string | number>): unknown {
    let value: unknown = payload;
    for (const key of path) {
        if (value === null || typeof value !== 'object') return undefined;
        value = Reflect.get(value, key);
    }
    return value;
}

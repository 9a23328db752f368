import {
    REGISTER_MAP,
    PROFILE_NAMES,
    UNKNOWN,
    decodePackedTime,
    encodePackedTime,
    decodeStatus,
    decodeProfile,
    decodeRegisters,
    encodeField,
    isWritable,
    profileFromName,
    registersFromBlock
} from '../src/codec';
import { SaunaValidationError } from '../src/errors';
import * as CONST from '../src/constants';

describe('codec', () => {
    describe('packed time', () => {
        test('decodes HHMM into HH:MM', () => {
            expect(decodePackedTime(130)).toBe('01:30');
            expect(decodePackedTime(0)).toBe('00:00');
            expect(decodePackedTime(1205)).toBe('12:05');
            expect(decodePackedTime(9959)).toBe('99:59');
        });
        test('rejects minutes of 60 or more', () => {
            expect(() => decodePackedTime(175)).toThrow(RangeError);
            expect(() => decodePackedTime(160)).toThrow('minutes part 60 is not below 60');
        });
        test('rejects values outside the packed range', () => {
            expect(() => decodePackedTime(10000)).toThrow('packed time out of range');
        });
        test('encodes HH:MM into HHMM', () => {
            expect(encodePackedTime('01:30')).toBe(130);
            expect(encodePackedTime('1:05')).toBe(105);
            expect(encodePackedTime('00:00')).toBe(0);
        });
        test('rejects minutes of 60 or more on encode', () => {
            expect(() => encodePackedTime('01:60', 'session_time')).toThrow('Invalid session_time (01:60): minutes must be below 60');
        });
        test('rejects malformed durations', () => {
            expect(() => encodePackedTime('abc')).toThrow('Invalid time (abc): expected HH:MM');
            expect(() => encodePackedTime('90')).toThrow(SaunaValidationError);
        });
    });

    describe('enumerations', () => {
        test('decodes status codes', () => {
            expect(decodeStatus(0)).toBe('off');
            expect(decodeStatus(1)).toBe('heating');
            expect(decodeStatus(2)).toBe('ventilation');
            expect(decodeStatus(3)).toBe('standby');
        });
        test('returns the sentinel for unknown codes', () => {
            expect(decodeStatus(7)).toBe(UNKNOWN);
            expect(decodeProfile(0)).toBe(UNKNOWN);
            expect(decodeProfile(8)).toBe(UNKNOWN);
        });
        test('looks up profiles by name', () => {
            expect(PROFILE_NAMES[2]).toBe('Dry Sauna');
            expect(profileFromName('WET SAUNA')).toBe(3);
            expect(profileFromName(' Infrared MIX ')).toBe(7);
            expect(profileFromName('Hot Tub')).toBeUndefined();
        });
    });

    describe('decodeRegisters', () => {
        const block = () => {
            const values = new Array<number>(CONST.BULK_READ_COUNT).fill(0);
            values[CONST.REG_SET_TEMP] = 80;
            values[CONST.REG_ACTUAL_TEMP] = 65;
            values[CONST.REG_PROFILE] = 2;
            values[CONST.REG_SESSION_TIME] = 130;
            values[CONST.REG_VENTILATION_TIME] = 15;
            values[CONST.REG_AROMA] = 10;
            values[CONST.REG_HUMIDITY_SET] = 20;
            values[CONST.REG_ERROR_CODE] = 4;
            values[CONST.REG_HUMIDITY_ACTUAL] = 12;
            values[CONST.REG_CONTROLLER_STATUS] = 1;
            return values;
        };

        test('decodes a full bulk read', () => {
            const { fields, errors } = decodeRegisters(registersFromBlock(0, block()));

            expect(errors).toEqual([]);
            expect(fields).toEqual({
                setTemp: 80,
                actualTemp: 65,
                profile: 2,
                sessionTime: '01:30',
                ventilationTime: '00:15',
                aromaValue: 10,
                humidityValue: 20,
                errorCode: 4,
                humidity: 12,
                controllerStatus: 'heating'
            });
        });

        test('reads temperatures as signed values', () => {
            const { fields } = decodeRegisters({ [CONST.REG_ACTUAL_TEMP]: 65526 });
            expect(fields.actualTemp).toBe(-10);
        });

        test('skips registers that were not read', () => {
            expect(decodeRegisters({ 2: 70 })).toEqual({ fields: { actualTemp: 70 }, errors: [] });
        });

        test('reports a malformed field without losing the others', () => {
            const values = block();
            values[CONST.REG_CONTROLLER_STATUS] = 9;
            values[CONST.REG_SESSION_TIME] = 199;

            const { fields, errors } = decodeRegisters(registersFromBlock(0, values));

            expect(fields.controllerStatus).toBeUndefined();
            expect(fields.sessionTime).toBeUndefined();
            expect(fields.actualTemp).toBe(65);
            expect(errors.map(e => e.message)).toEqual([
                'Register 5 (sessionTime) holds 199: minutes part 99 is not below 60',
                'Register 20 (controllerStatus) holds 9: unknown controller status'
            ]);
            expect(errors[1]).toMatchObject({ field: 'controllerStatus', address: 20, raw: 9 });
        });
    });

    describe('encodeField', () => {
        test('rounds temperatures inside the range', () => {
            expect(encodeField('setTemp', 79.6)).toBe(80);
            expect(encodeField('setTemp', 20)).toBe(20);
            expect(encodeField('setTemp', 110)).toBe(110);
        });
        test('checks the range before rounding', () => {
            expect(() => encodeField('setTemp', 110.4)).toThrow('Invalid temperature (110.4): must be between 20 and 110');
            expect(() => encodeField('setTemp', 19.6)).toThrow('Invalid temperature (19.6): must be between 20 and 110');
            expect(() => encodeField('aromaValue', 100.3)).toThrow('Invalid aroma (100.3): must be between 0 and 100');
            expect(() => encodeField('humidityValue', -0.4)).toThrow('Invalid humidity (-0.4): must be between 0 and 100');
        });
        test('rejects temperatures out of range', () => {
            expect(() => encodeField('setTemp', 19)).toThrow('Invalid temperature (19): must be between 20 and 110');
            expect(() => encodeField('setTemp', 111)).toThrow('Invalid temperature (111): must be between 20 and 110');
        });
        test('rejects values that are not numbers', () => {
            expect(() => encodeField('aromaValue', NaN)).toThrow('Invalid aroma (NaN): not a number');
        });
        test('rejects percentages out of range', () => {
            expect(() => encodeField('humidityValue', 101)).toThrow('Invalid humidity (101): must be between 0 and 100');
        });
        test('encodes status and packed times', () => {
            expect(encodeField('controllerStatus', 'standby')).toBe(3);
            expect(encodeField('ventilationTime', '00:15')).toBe(15);
        });
        test('refuses read-only registers', () => {
            expect(() => encodeField('actualTemp', 50)).toThrow('Invalid actualTemp (50): register is read-only');
            expect(isWritable('humidity')).toBe(false);
            expect(isWritable('errorCode')).toBe(false);
            expect(isWritable('setTemp')).toBe(true);
        });
    });

    test('has no light or AUX register', () => {
        expect(Object.keys(REGISTER_MAP)).not.toContain('light');
        expect(Object.keys(REGISTER_MAP)).not.toContain('aux');
        // Registers 7 and 8 are read in the bulk block but not decoded
        expect(decodeRegisters({ 7: 5, 8: 9 })).toEqual({ fields: {}, errors: [] });
    });

    test('register table is immutable', () => {
        expect(Object.isFrozen(REGISTER_MAP)).toBe(true);
        expect(REGISTER_MAP.controllerStatus.address).toBe(20);
        expect(REGISTER_MAP.setTemp.range).toEqual({ min: 20, max: 110 });
    });
});

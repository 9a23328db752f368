export type ControllerStatus = 'off' | 'heating' | 'ventilation' | 'standby';

export type SaunaProfile = 1 | 2 | 3 | 4 | 5 | 6 | 7;

/**
 * Values carried by the controller's holding registers, keyed by field name.
 */
export interface RegisterFields {
    setTemp: number;
    actualTemp: number;
    profile: SaunaProfile;
    sessionTime: string;
    ventilationTime: string;
    aromaValue: number;
    humidityValue: number;
    errorCode: number;
    humidity: number;
    controllerStatus: ControllerStatus;
}

export type RegisterField = keyof RegisterFields;

/**
 * Latest known device state. When `available` is false the values are the
 * last ones read successfully. The controller exposes no light or AUX
 * register, so `light` and `aux` stay false.
 */
export interface Snapshot {
    controllerStatus: ControllerStatus;
    light: boolean;
    aux: boolean;
    controllerModel: number;
    actualTemp: number;
    humidity: number;
    setTemp?: number;
    profile?: SaunaProfile;
    sessionTime?: string;
    ventilationTime?: string;
    aromaValue?: number;
    humidityValue?: number;
    errorCode?: number;
    lastUpdated: Date | null;
    available: boolean;
}

export interface ModbusTarget {
    ip: string;
    port: number;
    unitId: number;
    /** Per-operation timeout in ms; the transport default applies when absent */
    timeout?: number;
}

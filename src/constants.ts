/**
 * Sauna Controller Constants
 * Register addresses, protocol defaults and operating limits
 */

// Register Addresses (0-based, holding registers)
export const REG_SET_TEMP = 1;                 // Temperature set value
export const REG_ACTUAL_TEMP = 2;              // Temperature 1 actual value
export const REG_PROFILE = 4;                  // Sauna profile
export const REG_SESSION_TIME = 5;             // Session time (HHMM)
export const REG_VENTILATION_TIME = 6;         // Ventilation time (HHMM)
export const REG_AROMA = 9;                    // Aroma set value
export const REG_HUMIDITY_SET = 10;            // Vaporizer humidity set value
export const REG_ERROR_CODE = 11;              // Controller error code
export const REG_HUMIDITY_ACTUAL = 15;         // Humidity actual value
export const REG_CONTROLLER_STATUS = 20;       // Controller status

// Bulk Read Window
export const BULK_READ_START = 0;
export const BULK_READ_COUNT = REG_CONTROLLER_STATUS + 1;

// Controller Status Codes
export const STATUS_OFF = 0;
export const STATUS_HEATING = 1;
export const STATUS_VENTILATION = 2;
export const STATUS_STANDBY = 3;

// Operating Limits
export const MIN_TEMPERATURE = 20;             // °C
export const MAX_TEMPERATURE = 110;            // °C
export const MIN_PERCENT = 0;
export const MAX_PERCENT = 100;
export const MIN_PROFILE = 1;
export const MAX_PROFILE = 7;
export const MAX_PACKED_TIME = 9959;           // 99:59

// Default Ports & Identity
export const DEFAULT_MODBUS_PORT = 502;
export const DEFAULT_UNIT_ID = 1;
export const DEFAULT_HOST = 'ffes.local';
export const DEFAULT_CONTROLLER_MODEL = 2;
export const LOCAL_SUFFIX = '.local';

// Polling (seconds)
export const DEFAULT_POLL_INTERVAL = 15;
export const MIN_POLL_INTERVAL = 5;
export const MAX_POLL_INTERVAL = 300;
export const RERESOLVE_AFTER_FAILURES = 3;

// Default Timeouts (ms)
export const DEFAULT_TIMEOUT = 10000;          // Connect and per-operation timeout
export const RESOLVE_TIMEOUT = 5000;           // .local lookup timeout
export const DEFAULT_PORT_CHECK_TIMEOUT = 300; // Quick port availability check
export const IDLE_TIMEOUT = 600000;            // Close connections unused for 10 minutes
export const IDLE_SWEEP_INTERVAL = 30000;
export const FRAME_GAP = 100;                  // Pause after each operation

// Discovery Candidates
export const DISCOVERY_CANDIDATES: readonly string[] = [
    'ffes.local',
    'sauna.local',
    '192.168.1.100',
    '192.168.0.100'
];

export * from './types/sauna';
export * from './errors';
export { Logger, createConsoleLogger, silentLogger } from './logger';
export {
    REGISTER_MAP,
    REGISTER_FIELDS,
    PROFILE_NAMES,
    STATUS_CODES,
    UNKNOWN,
    decodeRegisters,
    encodeField,
    decodePackedTime,
    encodePackedTime
} from './codec';
export { ConnectionManager, ConnectionManagerOptions, RegisterTransport } from './connection-manager';
export { AddressResolver, HostResolver, ResolvedAddress, DiscoveredSauna, discoverSauna } from './discovery';
export { SaunaCoordinator, SaunaCoordinatorOptions, PollOutcome } from './coordinator';
export { CommandDispatcher, CommandResult, SaunaCommand, PlannedWrite, validateCommand } from './dispatcher';
export { parseCommand } from './commands';
export { parseControllerConfig, ControllerConfig } from './config';
export { DeviceManager, SavedSauna } from './device-manager';

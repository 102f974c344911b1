export { InMemoryDeviceStore } from './device-store';
export type { DeviceStore, Mutation, RegistrySnapshot } from './device-store';
export { DEFAULT_DEVICES, loadSeedFile, parseSeed } from './seed';
export { deviceStateSchema, stateViolation } from './state-schema';

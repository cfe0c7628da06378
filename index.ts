export * from './types';
export * from './constants';
export { RegisterBank, isBitSpace } from './services/RegisterBank';
export type { ApplySnapshotReport } from './services/RegisterBank';
export { ChangeTracker, describeChange } from './services/ChangeTracker';
export { SnapshotStore, parseSnapshotText, serializeSnapshot, stripComments } from './services/SnapshotStore';
export type { LoadResult, SaveResult } from './services/SnapshotStore';
export { EnvironmentModel } from './services/EnvironmentModel';
export { Controller, requiredPumpVoltage, resolveMode } from './services/Controller';
export { SimulationEngine } from './services/SimulationEngine';
export { FieldRuntime } from './services/FieldRuntime';
export { PlcRuntime } from './services/PlcRuntime';
export { ProtocolGateway, EXCEPTION_NAMES } from './services/ProtocolGateway';
export { GatewayClient, LoopbackTransport, WebSocketTransport } from './services/GatewayClient';
export type { BridgeTransport } from './services/GatewayClient';
export { OperatorConsole, DELTA_STEP } from './services/OperatorConsole';
export { AdversarialWriter, parseTarget, TargetFormatError } from './services/AdversarialWriter';
export { loadConfig, parseConfig, ConfigError } from './utils/config';
export type { PlantConfig } from './utils/config';
export { Logger, createConsoleSink, createFileSink, formatLogLine } from './utils/logger';
export { formatMemoryView, readoutFromBank } from './utils/memoryView';

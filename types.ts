
// Register Spaces
export type RegisterSpace = 'coils' | 'discreteInputs' | 'inputRegisters' | 'holdingRegisters';
export type BitSpace = 'coils' | 'discreteInputs';
export type WordSpace = 'inputRegisters' | 'holdingRegisters';

export const REGISTER_SPACES: readonly RegisterSpace[] = ['coils', 'discreteInputs', 'inputRegisters', 'holdingRegisters'];

export type RegisterValue = number | boolean;

export enum Mode {
  Idle = 0,
  Auto = 1,
  Manual = 2
}

export type BankError = 'OutOfRange';

export type WriteResult =
  | { success: true }
  | { success: false; error: BankError; message: string };

export type ReadResult<T> =
  | { success: true; values: T[] }
  | { success: false; error: BankError; message: string };

// Slot indices per space that a snapshot should carry
export type SnapshotProjection = Partial<Record<RegisterSpace, readonly number[]>>;

// Persisted form: space -> stringified index -> value
export type Snapshot = Partial<Record<RegisterSpace, Record<string, RegisterValue>>>;

export interface ChangeRecord {
  space: RegisterSpace;
  address: number;
  label: string;
  oldValue: RegisterValue;
  newValue: RegisterValue;
}

export type ChangeSet = ChangeRecord[];

// Scenario Register Maps
export type ScenarioKind = 'thermal-relief' | 'basic';

export type RegisterLabels = Record<RegisterSpace, Record<number, string>>;

export interface ThermalReliefSlots {
  coils: { pump: number; alarm: number; fan: number; heating: number; emergencyStop: number; reliefValve: number };
  discreteInputs: { doorClosed: number; safetyOk: number; fanActive: number; heatingActive: number };
  inputRegisters: { pumpVoltage: number; temperature: number; pressure: number; throughput: number; fanRpm: number; heaterPower: number };
  holdingRegisters: {
    targetTemp: number;
    targetPressure: number;
    alarmTemp: number;
    alarmPressure: number;
    mode: number;
    pumpDelta: number;
    reliefThreshold: number;
    bleedRate: number;
  };
}

export interface BasicSlots {
  coils: { pump: number; alarm: number; fan: number; emergencyStop: number };
  discreteInputs: { doorClosed: number; safetyOk: number; fanActive: number };
  inputRegisters: { pumpVoltage: number; temperature: number; pressure: number; throughput: number; fanVoltage: number };
  holdingRegisters: { fanPower: number; targetTemp: number; targetPressure: number; alarmTemp: number; alarmPressure: number; mode: number };
}

interface RegisterMapBase {
  size: number; // slots per space
  labels: RegisterLabels;
  plcProjection: SnapshotProjection; // what the PLC persists
  fieldProjection: SnapshotProjection; // sensor slots owned by the field process
}

export interface ThermalReliefMap extends RegisterMapBase {
  scenario: 'thermal-relief';
  slots: ThermalReliefSlots;
}

export interface BasicMap extends RegisterMapBase {
  scenario: 'basic';
  slots: BasicSlots;
}

export type RegisterMap = ThermalReliefMap | BasicMap;

// Logging
export type LogLevel = 'info' | 'warning' | 'error' | 'packet' | 'change' | 'debug';

export interface LogEntry {
  id: string;
  timestamp: string;
  source: string;
  message: string;
  level: LogLevel;
}

// Register Bridge (JSON frames carrying Modbus function-code semantics)
export interface BridgeCommand {
  type: 'MODBUS_CMD';
  transId: number;
  unitId: number;
  fc: number;
  addr: number;
  len?: number;
  val?: RegisterValue;
  values?: RegisterValue[];
}

export interface BridgeResponse {
  type: 'MODBUS_RESP';
  transId: number;
  unitId: number;
  fc: number;
  exceptionCode: number; // 0 = none
  data?: RegisterValue[];
  addr?: number;
  count?: number;
}

export interface BridgeStatus {
  listening: boolean;
  url: string;
  clients: number;
  rxCount: number;
  txCount: number;
}

// Remote reads resolve to undefined when the value could not be obtained
export type RemoteValue<T extends RegisterValue = RegisterValue> = T | undefined;

export type RemoteWriteResult =
  | { success: true }
  | { success: false; error: 'Timeout' | 'Disconnected' | 'Exception'; exceptionCode?: number };

// Cycle Tasks
export interface CycleTask {
  id: string;
  name: string;
  tickRate: number; // ms
  runCycle(): Promise<void>;
}

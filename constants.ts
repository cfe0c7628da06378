import { BasicMap, RegisterLabels, RegisterMap, ScenarioKind, SnapshotProjection, ThermalReliefMap } from './types';

export const REGISTER_SPACE_SIZE = 100;
export const UINT16_MAX = 0xFFFF;

// Control constants
export const PUMP_VOLTAGE_MAX = 1000;
export const VOLTAGE_FLOOR = 200;
export const TARGET_THROUGHPUT = 100;
export const LOW_THROUGHPUT_VOLTAGE = 250;
export const FAN_MAX = 1000;
export const FAN_RATE_LIMIT = 80;
export const FAN_GAIN = 2.5;
export const HEATER_GAIN = 4;
export const HEATER_MAX = 300;
export const RELIEF_PRESSURE_CEILING = 1500;

/** Snapshot file keys, in the order they are written. */
export const SNAPSHOT_KEYS = {
  coils: 'coils',
  discreteInputs: 'discrete_inputs',
  inputRegisters: 'input_registers',
  holdingRegisters: 'holding_registers'
} as const;

export const SPACE_SHORT_NAMES = {
  coils: 'coil',
  discreteInputs: 'di',
  inputRegisters: 'ir',
  holdingRegisters: 'hr'
} as const;

const indices = (labels: Record<number, string>, skip: number[] = []): number[] =>
  Object.keys(labels).map(Number).filter(i => !skip.includes(i));

const THERMAL_LABELS: RegisterLabels = {
  coils: { 0: 'Pump', 1: 'Alarm', 2: 'Fan', 3: 'Heating', 4: 'Emergency Stop', 5: 'Pressure Relief Valve' },
  discreteInputs: { 0: 'Door Closed', 1: 'Safety OK', 2: 'Fan Active', 3: 'Heating Active' },
  inputRegisters: { 0: 'Pump Voltage', 1: 'Temperature', 2: 'Pressure', 3: 'Throughput', 4: 'Fan RPM', 5: 'Heater Power' },
  holdingRegisters: {
    0: 'Target Temp',
    1: 'Target Pressure',
    2: 'Alarm Temp',
    3: 'Alarm Pressure',
    4: 'Mode',
    5: 'Pump Delta',
    6: 'Relief Threshold',
    7: 'Bleed Rate'
  }
};

const BASIC_LABELS: RegisterLabels = {
  coils: { 0: 'Pump', 1: 'Alarm', 2: 'Fan', 3: 'Emergency Stop' },
  discreteInputs: { 0: 'Door Closed', 1: 'Safety OK', 2: 'Fan Active' },
  inputRegisters: { 0: 'Pump Voltage', 1: 'Temperature', 2: 'Pressure', 3: 'Throughput', 4: 'Fan Voltage' },
  holdingRegisters: { 0: 'Fan Power', 1: 'Target Temperature', 2: 'Target Pressure', 3: 'Alarm Temp Threshold', 4: 'Alarm Pressure Threshold', 5: 'Mode' }
};

const labelledSlots = (labels: RegisterLabels, modeSlot: number): SnapshotProjection => ({
  coils: indices(labels.coils),
  discreteInputs: indices(labels.discreteInputs),
  inputRegisters: indices(labels.inputRegisters),
  // Mode stays internal to the PLC
  holdingRegisters: indices(labels.holdingRegisters, [modeSlot])
});

export const THERMAL_RELIEF_MAP: ThermalReliefMap = {
  scenario: 'thermal-relief',
  size: REGISTER_SPACE_SIZE,
  labels: THERMAL_LABELS,
  slots: {
    coils: { pump: 0, alarm: 1, fan: 2, heating: 3, emergencyStop: 4, reliefValve: 5 },
    discreteInputs: { doorClosed: 0, safetyOk: 1, fanActive: 2, heatingActive: 3 },
    inputRegisters: { pumpVoltage: 0, temperature: 1, pressure: 2, throughput: 3, fanRpm: 4, heaterPower: 5 },
    holdingRegisters: {
      targetTemp: 0,
      targetPressure: 1,
      alarmTemp: 2,
      alarmPressure: 3,
      mode: 4,
      pumpDelta: 5,
      reliefThreshold: 6,
      bleedRate: 7
    }
  },
  plcProjection: labelledSlots(THERMAL_LABELS, 4),
  fieldProjection: {
    discreteInputs: indices(THERMAL_LABELS.discreteInputs),
    inputRegisters: [1, 2, 3]
  }
};

export const BASIC_MAP: BasicMap = {
  scenario: 'basic',
  size: REGISTER_SPACE_SIZE,
  labels: BASIC_LABELS,
  slots: {
    coils: { pump: 0, alarm: 1, fan: 2, emergencyStop: 3 },
    discreteInputs: { doorClosed: 0, safetyOk: 1, fanActive: 2 },
    inputRegisters: { pumpVoltage: 0, temperature: 1, pressure: 2, throughput: 3, fanVoltage: 4 },
    holdingRegisters: { fanPower: 0, targetTemp: 1, targetPressure: 2, alarmTemp: 3, alarmPressure: 4, mode: 5 }
  },
  plcProjection: labelledSlots(BASIC_LABELS, 5),
  fieldProjection: {
    discreteInputs: indices(BASIC_LABELS.discreteInputs),
    inputRegisters: [1, 2, 3]
  }
};

export const REGISTER_MAPS: Record<ScenarioKind, RegisterMap> = {
  'thermal-relief': THERMAL_RELIEF_MAP,
  basic: BASIC_MAP
};

export const getRegisterMap = (scenario: ScenarioKind): RegisterMap => REGISTER_MAPS[scenario];

export const MODE_NAMES: Record<number, string> = {
  0: 'IDLE',
  1: 'AUTO',
  2: 'MANUAL'
};

import {
  BasicMap,
  ChangeSet,
  Mode,
  RegisterMap,
  ThermalReliefMap
} from '../types';
import {
  FAN_GAIN,
  FAN_MAX,
  FAN_RATE_LIMIT,
  HEATER_GAIN,
  HEATER_MAX,
  LOW_THROUGHPUT_VOLTAGE,
  MODE_NAMES,
  PUMP_VOLTAGE_MAX,
  RELIEF_PRESSURE_CEILING,
  TARGET_THROUGHPUT,
  VOLTAGE_FLOOR
} from '../constants';
import { clamp, toSigned16 } from '../utils/registerMath';
import { Logger } from '../utils/logger';
import { ChangeTracker, describeChange } from './ChangeTracker';
import { RegisterBank } from './RegisterBank';

/** Mode for a stored value; undefined for values outside 0..2. */
export const resolveMode = (raw: number): Mode | undefined => {
  if (raw === Mode.Idle) return Mode.Idle;
  if (raw === Mode.Auto) return Mode.Auto;
  if (raw === Mode.Manual) return Mode.Manual;
  return undefined;
};

const modeName = (raw: number | null): string => {
  if (raw === null) return 'none';
  return resolveMode(raw) === undefined ? `UNKNOWN (${raw})` : MODE_NAMES[raw];
};

interface Reading {
  temperature: number;
  pressure: number;
}

/**
 * Pump setpoint for a target throughput, compensating the temperature
 * penalty the plant applies above 70 degrees.
 */
export const requiredPumpVoltage = (temperature: number, throughput: number): number => {
  if (throughput < 20) return clamp(LOW_THROUGHPUT_VOLTAGE, VOLTAGE_FLOOR, PUMP_VOLTAGE_MAX);

  const penaltyFactor = Math.max(0, (temperature - 70) / 100);
  const denominator = 1 - penaltyFactor;
  const required = denominator > 0 ? Math.trunc(TARGET_THROUGHPUT / denominator) : PUMP_VOLTAGE_MAX;
  return clamp(required, VOLTAGE_FLOOR, PUMP_VOLTAGE_MAX);
};

/**
 * Controller
 *
 * The PLC logic. One call to cycle() reads sensors and targets from the
 * bank and writes actuator registers:
 *
 *   EmergencyStop  -> zero pump/fan/heater, nothing else
 *   Idle           -> no actuation
 *   Manual         -> apply the single-shot pump delta
 *   Auto           -> closed-loop policy of the scenario
 *   other values   -> no control law (basic: Auto, any non-zero value runs)
 *
 * Every non-idle cycle ends with the common coil updates (pump, alarm, fan),
 * judged on the sensor reading taken at the start of the cycle.
 */
export class Controller {
  private lastMode: number | null = null;
  private logger: Logger;

  constructor(private map: RegisterMap, logger?: Logger) {
    this.logger = logger ?? new Logger('PLC');
  }

  public get registerMap(): RegisterMap {
    return this.map;
  }

  /** Raw mode value seen by the last cycle. */
  public get currentMode(): number | null {
    return this.lastMode;
  }

  public cycle(bank: RegisterBank): ChangeSet {
    const tracker = new ChangeTracker(bank, this.map.labels);
    const { slots } = this.map;

    const rawMode = bank.getRegister('holdingRegisters', slots.holdingRegisters.mode);
    const mode = resolveMode(rawMode) ?? (this.map.scenario === 'basic' ? Mode.Auto : undefined);
    if (rawMode !== this.lastMode) {
      this.logger.info(`Mode changed from ${modeName(this.lastMode)} to ${modeName(rawMode)}`);
      if (mode === undefined) this.logger.warning(`Unknown mode value ${rawMode}: no control law applied`);
      this.lastMode = rawMode;
    }

    const reading: Reading = {
      temperature: bank.getRegister('inputRegisters', slots.inputRegisters.temperature),
      pressure: bank.getRegister('inputRegisters', slots.inputRegisters.pressure)
    };

    if (bank.getBit('coils', slots.coils.emergencyStop)) {
      this.emergencyStop(tracker);
      return this.finish(bank, tracker);
    }

    if (mode === Mode.Idle) return tracker.changeSet;

    tracker.setBit('coils', slots.coils.pump, true);

    if (mode === Mode.Manual) {
      this.applyManualDelta(bank, tracker);
    } else if (mode === Mode.Auto) {
      switch (this.map.scenario) {
        case 'thermal-relief': this.autoThermal(bank, tracker, this.map); break;
        case 'basic': this.autoBasic(bank, tracker, this.map); break;
      }
    }

    this.updateCommonCoils(bank, tracker, reading);
    return this.finish(bank, tracker);
  }

  private emergencyStop(tracker: ChangeTracker) {
    const ir = this.map.slots.inputRegisters;
    tracker.setRegister('inputRegisters', ir.pumpVoltage, 0);
    if (this.map.scenario === 'thermal-relief') {
      tracker.setRegister('inputRegisters', this.map.slots.inputRegisters.fanRpm, 0);
      tracker.setRegister('inputRegisters', this.map.slots.inputRegisters.heaterPower, 0);
      this.logger.warning('Emergency stop active: pump, fan and heater OFF');
    } else {
      tracker.setRegister('inputRegisters', this.map.slots.inputRegisters.fanVoltage, 0);
      this.logger.warning('Emergency stop active: pump and fan shut down');
    }
  }

  private applyManualDelta(bank: RegisterBank, tracker: ChangeTracker) {
    // The basic map has no delta register; manual mode only keeps the coils updated there
    if (this.map.scenario !== 'thermal-relief') return;

    const { inputRegisters: ir, holdingRegisters: hr } = this.map.slots;
    const delta = toSigned16(bank.getRegister('holdingRegisters', hr.pumpDelta));
    if (delta === 0) return;

    const current = bank.getRegister('inputRegisters', ir.pumpVoltage);
    const next = clamp(current + delta, 0, PUMP_VOLTAGE_MAX);
    tracker.setRegister('inputRegisters', ir.pumpVoltage, next);
    tracker.setRegister('holdingRegisters', hr.pumpDelta, 0);
    this.logger.info(`Manual pump delta applied: ${current} + ${delta} -> ${next}`);
  }

  private autoThermal(bank: RegisterBank, tracker: ChangeTracker, map: ThermalReliefMap) {
    const { coils, inputRegisters: ir, holdingRegisters: hr } = map.slots;

    const temperature = bank.getRegister('inputRegisters', ir.temperature);
    const pressure = bank.getRegister('inputRegisters', ir.pressure);
    const throughput = bank.getRegister('inputRegisters', ir.throughput);
    const rpm = bank.getRegister('inputRegisters', ir.fanRpm);
    const targetTemp = bank.getRegister('holdingRegisters', hr.targetTemp);
    const reliefThreshold = bank.getRegister('holdingRegisters', hr.reliefThreshold);
    const bleedRate = bank.getRegister('holdingRegisters', hr.bleedRate);

    // Pump
    tracker.setRegister('inputRegisters', ir.pumpVoltage, requiredPumpVoltage(temperature, throughput));

    // Fan, rate limited per cycle
    const drpm = clamp(Math.trunc((temperature - targetTemp) * FAN_GAIN), -FAN_RATE_LIMIT, FAN_RATE_LIMIT);
    tracker.setRegister('inputRegisters', ir.fanRpm, clamp(rpm + drpm, 0, FAN_MAX));

    // Heater hysteresis: on below target-1, off above target+2, hold in between
    if (temperature < targetTemp - 1) {
      const power = clamp(Math.trunc((targetTemp - temperature) * HEATER_GAIN), 0, HEATER_MAX);
      tracker.setBit('coils', coils.heating, true);
      tracker.setRegister('inputRegisters', ir.heaterPower, power);
    } else if (temperature > targetTemp + 2) {
      tracker.setBit('coils', coils.heating, false);
      tracker.setRegister('inputRegisters', ir.heaterPower, 0);
    }

    // Relief valve
    if (pressure > reliefThreshold) {
      tracker.setBit('coils', coils.reliefValve, true);
      tracker.setRegister('inputRegisters', ir.pressure, clamp(pressure - bleedRate, 0, RELIEF_PRESSURE_CEILING));
    } else {
      tracker.setBit('coils', coils.reliefValve, false);
    }
  }

  private autoBasic(bank: RegisterBank, tracker: ChangeTracker, map: BasicMap) {
    const { inputRegisters: ir, holdingRegisters: hr } = map.slots;

    const pumpVoltage = bank.getRegister('inputRegisters', ir.pumpVoltage);
    const fanVoltage = bank.getRegister('inputRegisters', ir.fanVoltage);
    const temperature = bank.getRegister('inputRegisters', ir.temperature);
    const pressure = bank.getRegister('inputRegisters', ir.pressure);
    const targetTemp = bank.getRegister('holdingRegisters', hr.targetTemp);
    const targetPressure = bank.getRegister('holdingRegisters', hr.targetPressure);

    let pump = pumpVoltage;
    if (pressure > targetPressure + 10) pump = pumpVoltage - 28;
    else if (pressure > targetPressure + 5) pump = pumpVoltage - 8;
    else if (pressure < targetPressure - 10) pump = pumpVoltage + 28;
    else if (pressure < targetPressure - 5) pump = pumpVoltage + 8;
    tracker.setRegister('inputRegisters', ir.pumpVoltage, clamp(pump, 0, PUMP_VOLTAGE_MAX));

    let fan = fanVoltage;
    if (temperature > targetTemp + 3) fan = fanVoltage + 10;
    else if (temperature > targetTemp + 1) fan = fanVoltage + 5;
    else if (temperature < targetTemp - 3) fan = fanVoltage - 10;
    else if (temperature < targetTemp - 1) fan = fanVoltage - 5;
    tracker.setRegister('inputRegisters', ir.fanVoltage, clamp(fan, 0, FAN_MAX));
  }

  private updateCommonCoils(bank: RegisterBank, tracker: ChangeTracker, { temperature, pressure }: Reading) {
    const { coils, holdingRegisters: hr } = this.map.slots;
    const alarmTemp = bank.getRegister('holdingRegisters', hr.alarmTemp);
    const alarmPressure = bank.getRegister('holdingRegisters', hr.alarmPressure);

    tracker.setBit('coils', coils.alarm, temperature > alarmTemp || pressure > alarmPressure);

    const fanValue = this.map.scenario === 'thermal-relief'
      ? bank.getRegister('inputRegisters', this.map.slots.inputRegisters.fanRpm)
      : bank.getRegister('inputRegisters', this.map.slots.inputRegisters.fanVoltage);
    tracker.setBit('coils', coils.fan, fanValue > 0);
  }

  private finish(bank: RegisterBank, tracker: ChangeTracker): ChangeSet {
    const changes = tracker.changeSet;
    const summary = (['coils', 'inputRegisters', 'holdingRegisters'] as const).map(space => {
      const slots = Object.keys(this.map.labels[space]).map(Number);
      const values = slots.map(addr => {
        const v = bank.getValue(space, addr);
        return typeof v === 'boolean' ? Number(v) : v;
      });
      return `${space}: [${values.join(', ')}]`;
    });
    this.logger.debug(summary.join(', '));
    changes.forEach(change => this.logger.change(describeChange(change)));
    return changes;
  }
}

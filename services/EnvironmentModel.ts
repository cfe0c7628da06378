import { BasicMap, ChangeSet, RegisterMap, ThermalReliefMap } from '../types';
import { clamp } from '../utils/registerMath';
import { Logger } from '../utils/logger';
import { ChangeTracker } from './ChangeTracker';
import { RegisterBank } from './RegisterBank';

export interface EnvironmentModelOptions {
  /** 1.0 = normal; below 1 is more stable, above 1 more volatile. */
  aggressiveness?: number;
  /** Uniform source in [0, 1), used for temperature noise. */
  random?: () => number;
  logger?: Logger;
}

/**
 * EnvironmentModel
 *
 * Advances the simulated sensor registers by one tick from the actuator
 * registers the controller last wrote.
 */
export class EnvironmentModel {
  public aggressiveness: number;
  private random: () => number;
  private logger: Logger;

  constructor(private map: RegisterMap, options: EnvironmentModelOptions = {}) {
    this.aggressiveness = options.aggressiveness ?? 1;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? new Logger('Environment');
  }

  public get registerMap(): RegisterMap {
    return this.map;
  }

  public step(bank: RegisterBank): ChangeSet {
    const tracker = new ChangeTracker(bank, this.map.labels);
    switch (this.map.scenario) {
      case 'thermal-relief': this.stepThermal(bank, tracker, this.map); break;
      case 'basic': this.stepBasic(bank, tracker, this.map); break;
    }
    return tracker.changeSet;
  }

  private noise(): number {
    return this.random() * 2 - 1;
  }

  private stepThermal(bank: RegisterBank, tracker: ChangeTracker, map: ThermalReliefMap) {
    const { coils, discreteInputs, inputRegisters: ir, holdingRegisters: hr } = map.slots;
    const a = this.aggressiveness;

    const pumpVoltage = bank.getRegister('inputRegisters', ir.pumpVoltage);
    const temperature = bank.getRegister('inputRegisters', ir.temperature);
    const pressure = bank.getRegister('inputRegisters', ir.pressure);
    const throughput = bank.getRegister('inputRegisters', ir.throughput);
    const fanRpm = bank.getRegister('inputRegisters', ir.fanRpm);
    const heaterPower = bank.getRegister('inputRegisters', ir.heaterPower);

    const fanOn = bank.getBit('coils', coils.fan);
    const heaterOn = bank.getBit('coils', coils.heating);
    const valveOpen = bank.getBit('coils', coils.reliefValve);
    const reliefThreshold = bank.getRegister('holdingRegisters', hr.reliefThreshold);
    const bleedRate = bank.getRegister('holdingRegisters', hr.bleedRate);

    // Throughput
    const maxThroughput = clamp(pumpVoltage, 0, 1000);
    const tempPenalty = Math.max(0, (temperature - 70) / 100);
    const rawThroughput = maxThroughput * (1 - tempPenalty);
    let newThroughput = clamp(Math.trunc(Math.max(rawThroughput, 20)), 20, 1000);
    newThroughput = Math.trunc(newThroughput * a);

    // Pressure
    const pressureInput = Math.pow(newThroughput / 100, 1.2) * 10;
    const pressureLoss = Math.pow(throughput / 120, 1.1) * 7;
    let newPressure = pressure + (pressureInput - pressureLoss) * a;

    if (valveOpen && pressure > reliefThreshold) {
      newPressure -= bleedRate;
      this.logger.info(`Pressure relief valve OPEN: bleeding ${bleedRate} (pressure ${pressure} -> ${Math.trunc(newPressure)})`);
    }
    newPressure = clamp(Math.trunc(newPressure), 600, 1400);

    // Temperature
    const heatFromPump = Math.pow(pumpVoltage / 1000, 1.5) * 25;
    const heatFromPressure = pressure > 800 ? Math.pow((pressure - 800) / 400, 2) * 20 : 0;
    const heatFromHeater = heaterOn ? Math.pow(heaterPower / 200, 1.2) * 40 : 0;
    const coolingFromFan = fanOn ? Math.pow(fanRpm / 300, 1.4) * 60 : 0;

    const tempDelta = (heatFromPump + heatFromPressure + heatFromHeater - coolingFromFan) * a;
    const newTemperature = clamp(Math.trunc(temperature + tempDelta + this.noise()), 30, 150);

    tracker.setRegister('inputRegisters', ir.throughput, newThroughput);
    tracker.setRegister('inputRegisters', ir.pressure, newPressure);
    tracker.setRegister('inputRegisters', ir.temperature, newTemperature);

    tracker.setBit('discreteInputs', discreteInputs.fanActive, fanOn && fanRpm > 0);
    tracker.setBit('discreteInputs', discreteInputs.heatingActive, heaterOn && heaterPower > 0);
  }

  private stepBasic(bank: RegisterBank, tracker: ChangeTracker, map: BasicMap) {
    const { coils, discreteInputs, inputRegisters: ir } = map.slots;
    const a = this.aggressiveness;

    const pumpOn = bank.getBit('coils', coils.pump);
    const fanOn = bank.getBit('coils', coils.fan);
    const pumpVoltage = bank.getRegister('inputRegisters', ir.pumpVoltage);
    const fanVoltage = bank.getRegister('inputRegisters', ir.fanVoltage);
    const temperature = bank.getRegister('inputRegisters', ir.temperature);
    const pressure = bank.getRegister('inputRegisters', ir.pressure);

    const newThroughput = clamp(Math.trunc(0.4 * pumpVoltage), 5, 200);

    const newPressure = pumpOn && pumpVoltage > 0
      ? Math.min(1600, pressure + Math.trunc(0.03 * pumpVoltage * a))
      : Math.max(200, pressure - Math.trunc(5 * a));

    let newTemperature: number;
    if (fanOn) {
      const cooling = Math.trunc(fanVoltage / (newThroughput + 5)) + 1;
      newTemperature = Math.max(10, temperature - cooling);
    } else {
      const heating = Math.trunc((Math.trunc(newPressure / 500) + 1) * a);
      newTemperature = Math.min(130, temperature + heating);
    }

    tracker.setRegister('inputRegisters', ir.throughput, newThroughput);
    tracker.setRegister('inputRegisters', ir.pressure, newPressure);
    tracker.setRegister('inputRegisters', ir.temperature, newTemperature);

    tracker.setBit('discreteInputs', discreteInputs.fanActive, fanOn && fanVoltage > 0);
  }
}

import { describe, it, expect } from 'vitest';
import { BASIC_MAP, THERMAL_RELIEF_MAP } from '../constants';
import { EnvironmentModel } from '../services/EnvironmentModel';
import { basicBank, captureLogger, thermalBank } from './fixtures';

// random() = 0.5 gives zero temperature noise
const quiet = () => 0.5;

describe('EnvironmentModel (thermal-relief)', () => {
  it('advances throughput, pressure and temperature from the actuators', () => {
    const bank = thermalBank();
    const model = new EnvironmentModel(THERMAL_RELIEF_MAP, { aggressiveness: 1, random: quiet });

    const changes = model.step(bank);

    expect(changes.map(c => c.label)).toEqual(['Throughput', 'Pressure', 'Temperature']);
    expect(bank.getRegister('inputRegisters', 3)).toBe(250);
    expect(bank.getRegister('inputRegisters', 2)).toBe(924);
    // fan cooling outweighs the heat sources; clamped at the lower bound
    expect(bank.getRegister('inputRegisters', 1)).toBe(30);
  });

  it('bleeds pressure through an open relief valve above the threshold', () => {
    const run = (valveOpen: boolean) => {
      const bank = thermalBank();
      bank.writeRegister('inputRegisters', 2, 1350);
      bank.writeBit('coils', 2, false);
      bank.writeBit('coils', 5, valveOpen);
      const { logger, entries } = captureLogger();
      new EnvironmentModel(THERMAL_RELIEF_MAP, { aggressiveness: 1, random: quiet, logger }).step(bank);
      return { bank, entries };
    };

    const closed = run(false);
    const open = run(true);
    const closedPressure = closed.bank.getRegister('inputRegisters', 2);
    const openPressure = open.bank.getRegister('inputRegisters', 2);

    expect(closedPressure).toBe(1374);
    expect(openPressure).toBe(1359);
    expect(openPressure).toBeLessThanOrEqual(closedPressure - 15);
    expect(openPressure).toBeGreaterThanOrEqual(600);
    expect(open.entries.map(e => e.message)).toEqual(['Pressure relief valve OPEN: bleeding 15 (pressure 1350 -> 1359)']);
    expect(closed.entries).toEqual([]);

    // heat from pump and pressure, no fan
    expect(open.bank.getRegister('inputRegisters', 1)).toBe(95);
  });

  it('keeps pressure within 600..1400', () => {
    const bank = thermalBank();
    bank.writeRegister('inputRegisters', 0, 1000);
    bank.writeRegister('inputRegisters', 2, 1400);
    bank.writeRegister('inputRegisters', 3, 20);
    new EnvironmentModel(THERMAL_RELIEF_MAP, { random: quiet }).step(bank);
    expect(bank.getRegister('inputRegisters', 2)).toBe(1400);

    bank.writeRegister('inputRegisters', 0, 0);
    bank.writeRegister('inputRegisters', 2, 600);
    bank.writeRegister('inputRegisters', 3, 1000);
    new EnvironmentModel(THERMAL_RELIEF_MAP, { random: quiet }).step(bank);
    expect(bank.getRegister('inputRegisters', 2)).toBe(600);
  });

  it('mirrors running fan and heater into the discrete inputs', () => {
    const bank = thermalBank();
    bank.writeBit('coils', 3, true);
    bank.writeRegister('inputRegisters', 5, 120);
    bank.writeRegister('inputRegisters', 4, 0);

    const changes = new EnvironmentModel(THERMAL_RELIEF_MAP, { random: quiet }).step(bank);

    expect(bank.getBit('discreteInputs', 2)).toBe(false);
    expect(bank.getBit('discreteInputs', 3)).toBe(true);
    expect(changes.filter(c => c.space === 'discreteInputs').map(c => c.label)).toEqual(['Fan Active', 'Heating Active']);
  });
});

describe('EnvironmentModel (basic)', () => {
  it('raises pressure with the pump on and cools with the fan on', () => {
    const bank = basicBank();
    const changes = new EnvironmentModel(BASIC_MAP, { aggressiveness: 1 }).step(bank);

    expect(bank.getRegister('inputRegisters', 3)).toBe(100);
    expect(bank.getRegister('inputRegisters', 2)).toBe(907);
    expect(bank.getRegister('inputRegisters', 1)).toBe(52);
    expect(changes.map(c => c.label)).toEqual(['Pressure', 'Temperature']);
  });

  it('loses pressure and heats up with pump and fan off', () => {
    const bank = basicBank();
    bank.writeBit('coils', 0, false);
    bank.writeBit('coils', 2, false);

    new EnvironmentModel(BASIC_MAP, { aggressiveness: 1 }).step(bank);

    expect(bank.getRegister('inputRegisters', 2)).toBe(895);
    expect(bank.getRegister('inputRegisters', 1)).toBe(57);
    expect(bank.getBit('discreteInputs', 2)).toBe(false);
  });
});

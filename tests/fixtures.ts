import { BASIC_MAP, THERMAL_RELIEF_MAP } from '../constants';
import { RegisterBank } from '../services/RegisterBank';
import { LogEntry } from '../types';
import { Logger } from '../utils/logger';

/** Bank holding the shipped thermal-relief start state. */
export const thermalBank = (): RegisterBank => {
  const bank = new RegisterBank(THERMAL_RELIEF_MAP.size);
  bank.applySnapshot({
    coils: { 0: 1, 1: 0, 2: 1, 3: 0, 4: 0, 5: 0 },
    discreteInputs: { 0: 1, 1: 1, 2: 1, 3: 0 },
    inputRegisters: { 0: 250, 1: 55, 2: 900, 3: 100, 4: 250, 5: 0 },
    holdingRegisters: { 0: 55, 1: 900, 2: 75, 3: 1100, 4: 1, 5: 0, 6: 1300, 7: 15 }
  });
  return bank;
};

export const basicBank = (): RegisterBank => {
  const bank = new RegisterBank(BASIC_MAP.size);
  bank.applySnapshot({
    coils: { 0: 1, 1: 0, 2: 1, 3: 0 },
    discreteInputs: { 0: 1, 1: 1, 2: 1 },
    inputRegisters: { 0: 250, 1: 55, 2: 900, 3: 100, 4: 250 },
    holdingRegisters: { 0: 250, 1: 55, 2: 900, 3: 75, 4: 1100, 5: 1 }
  });
  return bank;
};

/** Logger whose entries are collected for assertions. */
export const captureLogger = (source: string = 'Test'): { logger: Logger; entries: LogEntry[] } => {
  const entries: LogEntry[] = [];
  const logger = new Logger(source, [(entry) => entries.push(entry)]);
  return { logger, entries };
};

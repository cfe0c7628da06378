import { MODE_NAMES, SPACE_SHORT_NAMES } from '../constants';
import { REGISTER_SPACES, RegisterMap, RegisterSpace, RemoteValue } from '../types';
import { toSigned16 } from './registerMath';
import { RegisterBank, isBitSpace } from '../services/RegisterBank';

export type RegisterReadout = Record<RegisterSpace, RemoteValue[]>;

const SECTION_TITLES: Record<RegisterSpace, string> = {
  coils: 'COILS (Actuators)',
  discreteInputs: 'DISCRETE INPUTS (Sensors)',
  inputRegisters: 'INPUT REGISTERS (Field Data)',
  holdingRegisters: 'HOLDING REGISTERS (Config)'
};

export const formatBit = (value: RemoteValue): string => {
  if (value === true) return 'ON';
  if (value === false) return 'OFF';
  return 'unknown';
};

export const formatWord = (value: RemoteValue): string => (typeof value === 'number' ? String(value) : 'unknown');

export const readoutFromBank = (bank: RegisterBank, count: number = 10): RegisterReadout => {
  const readout: Partial<RegisterReadout> = {};
  REGISTER_SPACES.forEach(space => {
    readout[space] = Array.from({ length: count }, (_, i) => bank.getValue(space, i));
  });
  return {
    coils: readout.coils ?? [],
    discreteInputs: readout.discreteInputs ?? [],
    inputRegisters: readout.inputRegisters ?? [],
    holdingRegisters: readout.holdingRegisters ?? []
  };
};

export interface MemoryViewOptions {
  title: string;
  /** Local operator delta not yet sent, shown in place of the delta register. */
  pendingDelta?: number;
}

/** Plain-text listing of every labelled slot, one per line. */
export const formatMemoryView = (readout: RegisterReadout, map: RegisterMap, options: MemoryViewOptions): string[] => {
  const lines: string[] = [];
  const modeSlot = map.slots.holdingRegisters.mode;
  const deltaSlot = map.scenario === 'thermal-relief' ? map.slots.holdingRegisters.pumpDelta : null;
  const mode = readout.holdingRegisters[modeSlot];

  lines.push(`======== ${options.title} ========`);
  lines.push(`MODE: ${typeof mode === 'number' ? `${MODE_NAMES[mode] ?? 'AUTO'} (hr[${modeSlot}] = ${mode})` : 'unknown'}`);

  for (const space of REGISTER_SPACES) {
    lines.push('');
    lines.push(`${SECTION_TITLES[space]}:`);
    const labels = map.labels[space];
    for (const key of Object.keys(labels)) {
      const addr = Number(key);
      const value = readout[space][addr];
      const label = `${labels[addr]} (${SPACE_SHORT_NAMES[space]} ${addr})`;
      let shown: string;
      if (isBitSpace(space)) {
        shown = formatBit(value);
      } else if (space === 'holdingRegisters' && addr === deltaSlot) {
        shown = options.pendingDelta && mode === 2
          ? `${options.pendingDelta} (pending)`
          : typeof value === 'number' ? String(toSigned16(value)) : 'unknown';
      } else {
        shown = formatWord(value);
      }
      lines.push(`  - ${label.padEnd(35)}: ${shown}`);
    }
  }

  lines.push('='.repeat(60));
  return lines;
};

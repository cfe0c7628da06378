import { REGISTER_SPACE_SIZE } from '../constants';
import {
  BitSpace,
  ReadResult,
  REGISTER_SPACES,
  RegisterSpace,
  RegisterValue,
  Snapshot,
  SnapshotProjection,
  WordSpace,
  WriteResult
} from '../types';
import { bitToInt, toUint16 } from '../utils/registerMath';

export const isBitSpace = (space: RegisterSpace): space is BitSpace =>
  space === 'coils' || space === 'discreteInputs';

export interface ApplySnapshotReport {
  applied: number;
  skipped: number;
}

/**
 * RegisterBank
 *
 * In-memory store for the four register spaces of one simulated device.
 * Each space is a fixed-length array addressed from zero. Bit spaces hold
 * booleans, word spaces hold unsigned 16-bit integers.
 */
export class RegisterBank {
  private coils: boolean[];
  private discreteInputs: boolean[];
  private inputRegisters: number[];
  private holdingRegisters: number[];

  constructor(public readonly size: number = REGISTER_SPACE_SIZE) {
    this.coils = new Array<boolean>(size).fill(false);
    this.discreteInputs = new Array<boolean>(size).fill(false);
    this.inputRegisters = new Array<number>(size).fill(0);
    this.holdingRegisters = new Array<number>(size).fill(0);
  }

  public static fromSnapshot(snapshot: Snapshot, size: number = REGISTER_SPACE_SIZE): RegisterBank {
    const bank = new RegisterBank(size);
    bank.applySnapshot(snapshot);
    return bank;
  }

  private bits(space: BitSpace): boolean[] {
    return space === 'coils' ? this.coils : this.discreteInputs;
  }

  private words(space: WordSpace): number[] {
    return space === 'inputRegisters' ? this.inputRegisters : this.holdingRegisters;
  }

  public inRange(start: number, count: number = 1): boolean {
    return Number.isInteger(start) && Number.isInteger(count) && count >= 1 && start >= 0 && start + count <= this.size;
  }

  private outOfRange(space: RegisterSpace, start: number, count: number): { success: false; error: 'OutOfRange'; message: string } {
    return {
      success: false,
      error: 'OutOfRange',
      message: `${space} ${start}..${start + count - 1} outside 0..${this.size - 1}`
    };
  }

  // --- Reads ---

  public readBits(space: BitSpace, start: number, count: number): ReadResult<boolean> {
    if (!this.inRange(start, count)) return this.outOfRange(space, start, count);
    return { success: true, values: this.bits(space).slice(start, start + count) };
  }

  public readRegisters(space: WordSpace, start: number, count: number): ReadResult<number> {
    if (!this.inRange(start, count)) return this.outOfRange(space, start, count);
    return { success: true, values: this.words(space).slice(start, start + count) };
  }

  public getBit(space: BitSpace, address: number): boolean {
    return this.inRange(address) ? this.bits(space)[address] : false;
  }

  public getRegister(space: WordSpace, address: number): number {
    return this.inRange(address) ? this.words(space)[address] : 0;
  }

  public getValue(space: RegisterSpace, address: number): RegisterValue {
    return isBitSpace(space) ? this.getBit(space, address) : this.getRegister(space, address);
  }

  // --- Writes ---

  public writeBit(space: BitSpace, address: number, value: boolean): WriteResult {
    if (!this.inRange(address)) return this.outOfRange(space, address, 1);
    this.bits(space)[address] = value;
    return { success: true };
  }

  public writeRegister(space: WordSpace, address: number, value: number): WriteResult {
    if (!this.inRange(address)) return this.outOfRange(space, address, 1);
    this.words(space)[address] = toUint16(value);
    return { success: true };
  }

  public writeBits(space: BitSpace, start: number, values: boolean[]): WriteResult {
    if (!this.inRange(start, values.length)) return this.outOfRange(space, start, values.length);
    values.forEach((v, i) => { this.bits(space)[start + i] = v; });
    return { success: true };
  }

  public writeRegisters(space: WordSpace, start: number, values: number[]): WriteResult {
    if (!this.inRange(start, values.length)) return this.outOfRange(space, start, values.length);
    values.forEach((v, i) => { this.words(space)[start + i] = toUint16(v); });
    return { success: true };
  }

  public writeValue(space: RegisterSpace, address: number, value: RegisterValue): WriteResult {
    if (isBitSpace(space)) return this.writeBit(space, address, Boolean(value));
    return this.writeRegister(space, address, Number(value));
  }

  // --- Snapshot projection ---

  /**
   * Copies snapshot slots into the bank. When a projection is given only
   * those slots are taken. Keys that are not addresses inside the space are
   * skipped.
   */
  public applySnapshot(snapshot: Snapshot, projection?: SnapshotProjection): ApplySnapshotReport {
    const report: ApplySnapshotReport = { applied: 0, skipped: 0 };

    for (const space of REGISTER_SPACES) {
      const entries = snapshot[space];
      if (!entries) continue;
      const wanted = projection ? projection[space] : undefined;
      if (projection && !wanted) continue;

      for (const [key, value] of Object.entries(entries)) {
        const addr = /^\d+$/.test(key) ? Number(key) : NaN;
        if (!this.inRange(addr)) {
          report.skipped++;
          continue;
        }
        if (wanted && !wanted.includes(addr)) continue;

        const result = isBitSpace(space)
          ? this.writeBit(space, addr, Boolean(Number(value)))
          : this.writeRegister(space, addr, Number(value));
        if (result.success) report.applied++;
        else report.skipped++;
      }
    }

    return report;
  }

  public toSnapshot(projection: SnapshotProjection): Snapshot {
    const snapshot: Snapshot = {};
    for (const space of REGISTER_SPACES) {
      const slots = projection[space];
      if (!slots) continue;
      const entries: Record<string, RegisterValue> = {};
      slots.filter(addr => this.inRange(addr)).forEach(addr => {
        entries[String(addr)] = isBitSpace(space) ? bitToInt(this.getBit(space, addr)) : this.getRegister(space, addr);
      });
      snapshot[space] = entries;
    }
    return snapshot;
  }

  /** True when any projected slot is missing from the snapshot or holds another value. */
  public differsFrom(snapshot: Snapshot, projection: SnapshotProjection): boolean {
    return REGISTER_SPACES.some(space => {
      const entries = snapshot[space] ?? {};
      return (projection[space] ?? []).filter(addr => this.inRange(addr)).some(addr => {
        const stored = entries[String(addr)];
        return stored === undefined || Number(stored) !== Number(this.getValue(space, addr));
      });
    });
  }

  /** Projection covering every slot of every space. */
  public fullProjection(): SnapshotProjection {
    const all = Array.from({ length: this.size }, (_, i) => i);
    return { coils: all, discreteInputs: all, inputRegisters: all, holdingRegisters: all };
  }
}

import { BitSpace, ChangeSet, RegisterLabels, RegisterSpace, RegisterValue, WordSpace } from '../types';
import { SPACE_SHORT_NAMES } from '../constants';
import { RegisterBank } from './RegisterBank';

/**
 * Writes through to a RegisterBank and records a ChangeRecord only when the
 * stored value actually differs from the prior one.
 */
export class ChangeTracker {
  private changes: ChangeSet = [];

  constructor(private bank: RegisterBank, private labels: RegisterLabels) {}

  private label(space: RegisterSpace, address: number): string {
    return this.labels[space][address] ?? `${SPACE_SHORT_NAMES[space]}[${address}]`;
  }

  private record(space: RegisterSpace, address: number, oldValue: RegisterValue, newValue: RegisterValue) {
    if (oldValue === newValue) return;
    this.changes.push({ space, address, label: this.label(space, address), oldValue, newValue });
  }

  public setBit(space: BitSpace, address: number, value: boolean): boolean {
    const old = this.bank.getBit(space, address);
    if (old === value) return false;
    const result = this.bank.writeBit(space, address, value);
    if (!result.success) return false;
    this.record(space, address, old, this.bank.getBit(space, address));
    return true;
  }

  public setRegister(space: WordSpace, address: number, value: number): boolean {
    const old = this.bank.getRegister(space, address);
    const result = this.bank.writeRegister(space, address, value);
    if (!result.success) return false;
    const stored = this.bank.getRegister(space, address);
    this.record(space, address, old, stored);
    return old !== stored;
  }

  public get changeSet(): ChangeSet {
    return [...this.changes];
  }
}

export const describeChange = (change: ChangeSet[number]): string => {
  const fmt = (v: RegisterValue) => (typeof v === 'boolean' ? (v ? 'ON' : 'OFF') : String(v));
  return `${change.label} changed from ${fmt(change.oldValue)} to ${fmt(change.newValue)}`;
};

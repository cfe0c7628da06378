import { describe, it, expect } from 'vitest';
import { THERMAL_RELIEF_MAP } from '../constants';
import { RegisterBank } from '../services/RegisterBank';
import { ChangeTracker, describeChange } from '../services/ChangeTracker';
import { fromSigned16, toSigned16, toUint16 } from '../utils/registerMath';

describe('RegisterBank', () => {
  it('starts zeroed with 100 slots per space', () => {
    const bank = new RegisterBank();
    expect(bank.size).toBe(100);
    expect(bank.getBit('coils', 99)).toBe(false);
    expect(bank.getRegister('holdingRegisters', 99)).toBe(0);
  });

  it('stores word values as unsigned 16-bit integers', () => {
    const bank = new RegisterBank();
    bank.writeRegister('holdingRegisters', 1, 70000);
    bank.writeRegister('holdingRegisters', 2, -5);
    bank.writeRegister('inputRegisters', 3, 12.7);
    expect(bank.getRegister('holdingRegisters', 1)).toBe(65535);
    expect(bank.getRegister('holdingRegisters', 2)).toBe(0);
    expect(bank.getRegister('inputRegisters', 3)).toBe(12);
  });

  it('fails explicitly for addresses outside the space', () => {
    const bank = new RegisterBank();
    const write = bank.writeBit('coils', 100, true);
    expect(write.success).toBe(false);
    if (!write.success) expect(write.error).toBe('OutOfRange');

    const read = bank.readRegisters('holdingRegisters', 99, 2);
    expect(read).toEqual({ success: false, error: 'OutOfRange', message: 'holdingRegisters 99..100 outside 0..99' });
    expect(bank.writeRegisters('holdingRegisters', 98, [1, 2, 3]).success).toBe(false);
    expect(bank.getRegister('holdingRegisters', 98)).toBe(0);
  });

  it('reads ranges of bits and registers', () => {
    const bank = new RegisterBank();
    bank.writeBits('coils', 2, [true, false, true]);
    bank.writeRegisters('inputRegisters', 0, [5, 6]);
    expect(bank.readBits('coils', 1, 4)).toEqual({ success: true, values: [false, true, false, true] });
    expect(bank.readRegisters('inputRegisters', 0, 3)).toEqual({ success: true, values: [5, 6, 0] });
  });

  it('applies snapshots and skips keys that are not addresses', () => {
    const bank = new RegisterBank();
    const report = bank.applySnapshot({ holdingRegisters: { 0: 55, abc: 1, 150: 3 }, coils: { 4: true } });
    expect(report).toEqual({ applied: 2, skipped: 2 });
    expect(bank.getRegister('holdingRegisters', 0)).toBe(55);
    expect(bank.getBit('coils', 4)).toBe(true);
  });

  it('restricts applied slots to a projection', () => {
    const bank = new RegisterBank();
    bank.applySnapshot(
      { inputRegisters: { 0: 400, 1: 60 }, holdingRegisters: { 4: 2 } },
      THERMAL_RELIEF_MAP.fieldProjection
    );
    expect(bank.getRegister('inputRegisters', 0)).toBe(0);
    expect(bank.getRegister('inputRegisters', 1)).toBe(60);
    expect(bank.getRegister('holdingRegisters', 4)).toBe(0);
  });

  it('projects bits as 0/1 and leaves out unprojected slots', () => {
    const bank = new RegisterBank();
    bank.writeBit('coils', 0, true);
    bank.writeRegister('holdingRegisters', 4, 2);
    bank.writeRegister('holdingRegisters', 6, 1300);
    const snapshot = bank.toSnapshot(THERMAL_RELIEF_MAP.plcProjection);
    expect(snapshot.coils).toEqual({ 0: 1, 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 });
    expect(snapshot.holdingRegisters).toEqual({ 0: 0, 1: 0, 2: 0, 3: 0, 5: 0, 6: 1300, 7: 0 });
  });
});

describe('register math', () => {
  it('encodes signed deltas in two\'s complement', () => {
    expect(fromSigned16(-100)).toBe(65436);
    expect(toSigned16(65436)).toBe(-100);
    expect(toSigned16(fromSigned16(20))).toBe(20);
  });

  it('saturates non-finite values', () => {
    expect(toUint16(Infinity)).toBe(65535);
    expect(toUint16(NaN)).toBe(0);
  });
});

describe('ChangeTracker', () => {
  it('records only values that actually change', () => {
    const bank = new RegisterBank();
    bank.writeRegister('inputRegisters', 0, 250);
    const tracker = new ChangeTracker(bank, THERMAL_RELIEF_MAP.labels);

    expect(tracker.setRegister('inputRegisters', 0, 250)).toBe(false);
    expect(tracker.setRegister('inputRegisters', 0, 300)).toBe(true);
    expect(tracker.setBit('coils', 0, true)).toBe(true);
    expect(tracker.setBit('coils', 0, true)).toBe(false);

    expect(tracker.changeSet).toEqual([
      { space: 'inputRegisters', address: 0, label: 'Pump Voltage', oldValue: 250, newValue: 300 },
      { space: 'coils', address: 0, label: 'Pump', oldValue: false, newValue: true }
    ]);
  });

  it('treats a write that clamps to the stored value as no change', () => {
    const bank = new RegisterBank();
    bank.writeRegister('holdingRegisters', 0, 65535);
    const tracker = new ChangeTracker(bank, THERMAL_RELIEF_MAP.labels);
    expect(tracker.setRegister('holdingRegisters', 0, 90000)).toBe(false);
    expect(tracker.changeSet).toEqual([]);
  });

  it('describes changes with labels and ON/OFF for bits', () => {
    expect(describeChange({ space: 'coils', address: 0, label: 'Pump', oldValue: false, newValue: true }))
      .toBe('Pump changed from OFF to ON');
    expect(describeChange({ space: 'inputRegisters', address: 2, label: 'Pressure', oldValue: 900, newValue: 924 }))
      .toBe('Pressure changed from 900 to 924');
  });

  it('labels unmapped slots by space and address', () => {
    const bank = new RegisterBank();
    const tracker = new ChangeTracker(bank, THERMAL_RELIEF_MAP.labels);
    tracker.setRegister('holdingRegisters', 42, 7);
    expect(tracker.changeSet[0].label).toBe('hr[42]');
  });
});

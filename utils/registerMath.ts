import { UINT16_MAX } from '../constants';

export const clamp = (value: number, min: number, max: number): number => Math.max(min, Math.min(value, max));

/** Reads a two's-complement signed 16-bit value out of an unsigned register. */
export const toSigned16 = (value: number): number => (value >= 0x8000 ? value - 0x10000 : value);

/** Encodes a signed value into an unsigned register slot. */
export const fromSigned16 = (value: number): number => Math.trunc(value) & UINT16_MAX;

// Registers only ever hold integers in 0..65535
export const toUint16 = (value: number): number => {
  if (!Number.isFinite(value)) return value > 0 ? UINT16_MAX : 0;
  return clamp(Math.trunc(value), 0, UINT16_MAX);
};

export const bitToInt = (value: boolean): number => (value ? 1 : 0);

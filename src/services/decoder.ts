import type { DataType } from '../types/registers.js';
import { DecodeError } from '../utils/errors.js';

const REGISTER_WIDTH: Record<DataType, number> = {
  uint16: 1,
  int16: 1,
  uint32: 2,
  int32: 2,
  float32: 2,
  uint64: 4,
};

/** Number of 16-bit registers a value of `dataType` occupies. */
export function registerCount(dataType: DataType): number {
  return REGISTER_WIDTH[dataType];
}

function readRaw(raw: Buffer, dataType: DataType): number {
  switch (dataType) {
    case 'uint16':
      return raw.readUInt16BE(0);
    case 'int16':
      return raw.readInt16BE(0);
    case 'uint32':
      return raw.readUInt32BE(0);
    case 'int32':
      return raw.readInt32BE(0);
    case 'float32':
      return raw.readFloatBE(0);
    case 'uint64': {
      const value = raw.readBigUInt64BE(0);
      if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new DecodeError(`uint64 value ${value} exceeds the safe integer range`);
      }
      return Number(value);
    }
  }
}

// Scales like 0.001 are applied as a division so 230000 mV gives exactly 230
function applyScale(value: number, scale: number): number {
  if (scale === 1) return value;
  const divisor = 1 / scale;
  return Number.isInteger(divisor) ? value / divisor : value * scale;
}

/**
 * Interprets big-endian register bytes (high word first) as `dataType` and
 * multiplies the result by `scale`. NaN, infinities and counters beyond
 * Number.MAX_SAFE_INTEGER are rejected with DecodeError.
 */
export function decode(raw: Buffer, dataType: DataType, scale: number): number {
  const expected = registerCount(dataType) * 2;
  if (raw.length !== expected) {
    throw new DecodeError(
      `Expected ${expected} bytes for ${dataType}, got ${raw.length}`
    );
  }
  const value = applyScale(readRaw(raw, dataType), scale);
  if (!Number.isFinite(value)) {
    throw new DecodeError(`${dataType} value is not a finite number (${value})`);
  }
  return value;
}

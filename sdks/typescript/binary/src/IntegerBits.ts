/**
 * Conversions between integers and fixed-width bit-strings (MSB first).
 * Signed values use two's complement.
 */

import { CodecError, CodecErrorCodes } from '@bitforge/core';
import type { BitString, Integer } from './BinaryTypes.js';
import { integerRange, invalidBitUnit, requireWidth, toBigInt } from './Preconditions.js';

/** Bits folded into a plain number before each bigint shift. */
const CHUNK_BITS = 32;

/**
 * Encodes an integer as a bit-string of exactly `width` units.
 * A width of 0 always yields an empty bit-string.
 *
 * @throws CodecError InvalidWidth, InvalidInteger or OutOfRange
 *
 * @example
 * ```typescript
 * integer2bits(19, 8); // [0, 0, 0, 1, 0, 0, 1, 1]
 * integer2bits(-1, 4, true); // [1, 1, 1, 1]
 * ```
 */
export function integer2bits(number: Integer, width: number, signed: boolean = false): BitString {
  requireWidth(width);
  if (width === 0) {
    return new Uint8Array(0);
  }

  const value = toBigInt(number);
  const [min, max] = integerRange(width, signed);
  if (value < min || value > max) {
    throw new CodecError(
      CodecErrorCodes.OutOfRange,
      `number ${value} does not fit within width ${width} and signed ${signed}, ` +
        `expected ${min} to ${max}`,
      { number: value, min, max, width, signed }
    );
  }

  let residue = value < 0n ? value + (1n << BigInt(width)) : value;
  const bits = new Uint8Array(width);
  for (let i = width - 1; i >= 0 && residue > 0n; i--) {
    bits[i] = Number(residue & 1n);
    residue >>= 1n;
  }
  return bits;
}

/**
 * Decodes a bit-string (MSB first) into an integer. An empty bit-string decodes to 0.
 *
 * @throws CodecError InvalidBitUnit if a unit is not 0 or 1
 */
export function bits2integer(bits: BitString, signed: boolean = false): bigint {
  let value = 0n;
  let chunk = 0;
  let chunkWidth = 0;

  for (let i = 0; i < bits.length; i++) {
    const bit = bits[i];
    if (bit > 1) {
      throw invalidBitUnit(bits, i);
    }
    chunk = chunk * 2 + bit;
    if (++chunkWidth === CHUNK_BITS) {
      value = (value << BigInt(CHUNK_BITS)) | BigInt(chunk);
      chunk = 0;
      chunkWidth = 0;
    }
  }
  value = (value << BigInt(chunkWidth)) | BigInt(chunk);

  if (signed && bits.length > 0 && bits[0] === 1) {
    value -= 1n << BigInt(bits.length);
  }
  return value;
}

/**
 * Eager argument checks run at the start of every codec operation.
 */

import { CodecError, CodecErrorCodes } from '@bitforge/core';
import { BITS_PER_BYTE, type BitString, type Integer } from './BinaryTypes.js';

/**
 * Throws InvalidWidth unless width is a non-negative integer.
 */
export function requireWidth(width: number): void {
  if (!Number.isInteger(width) || width < 0) {
    throw new CodecError(
      CodecErrorCodes.InvalidWidth,
      `width must be a non-negative integer, got ${width}`,
      { width }
    );
  }
}

/**
 * Converts an integer input to bigint, rejecting fractions, NaN and infinities.
 */
export function toBigInt(value: Integer): bigint {
  if (typeof value === 'bigint') {
    return value;
  }
  if (!Number.isInteger(value)) {
    throw new CodecError(
      CodecErrorCodes.InvalidInteger,
      `number ${value} is not an integer`,
      { number: value }
    );
  }
  return BigInt(value);
}

/**
 * Throws MisalignedLength unless a bit-string can be split into whole bytes.
 */
export function requireByteAligned(length: number): void {
  if (length % BITS_PER_BYTE !== 0) {
    throw new CodecError(
      CodecErrorCodes.MisalignedLength,
      `bit-string length ${length} must be a multiple of ${BITS_PER_BYTE}`,
      { length, multiple: BITS_PER_BYTE }
    );
  }
}

/**
 * Builds the InvalidBitUnit error for the first unit other than 0 or 1 at or after `from`.
 */
export function invalidBitUnit(bits: BitString, from: number): CodecError {
  let index = from;
  while (index < bits.length - 1 && bits[index] <= 1) {
    index++;
  }
  const unit = bits[index];
  return new CodecError(
    CodecErrorCodes.InvalidBitUnit,
    `bit-string unit at index ${index} is ${unit}, expected 0 or 1`,
    { index, unit }
  );
}

/**
 * Admissible [min, max] of a two's-complement (signed) or unsigned integer of `width` bits.
 */
export function integerRange(width: number, signed: boolean): [bigint, bigint] {
  requireWidth(width);
  if (width === 0) {
    return [0n, 0n];
  }
  if (signed) {
    const half = 1n << BigInt(width - 1);
    return [-half, half - 1n];
  }
  return [0n, (1n << BigInt(width)) - 1n];
}

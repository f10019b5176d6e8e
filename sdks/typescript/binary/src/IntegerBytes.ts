/**
 * Fixed-width big-endian integer encoding, widths given in bytes.
 * Overflow is detected with the runtime's own fixed-width wrapping (BigInt.asIntN/asUintN).
 */

import { CodecError, CodecErrorCodes } from '@bitforge/core';
import { BITS_PER_BYTE, type ByteString, type Integer } from './BinaryTypes.js';
import { requireWidth, toBigInt } from './Preconditions.js';

/**
 * Encodes an integer as `width` big-endian bytes.
 *
 * @throws CodecError InvalidWidth, InvalidInteger or OutOfRange
 */
export function integer2bytes(number: Integer, width: number, signed: boolean = false): ByteString {
  requireWidth(width);
  const value = toBigInt(number);
  const bitWidth = width * BITS_PER_BYTE;

  const wrapped = signed ? BigInt.asIntN(bitWidth, value) : BigInt.asUintN(bitWidth, value);
  if (wrapped !== value) {
    throw new CodecError(
      CodecErrorCodes.OutOfRange,
      `number ${value} does not fit within ${width} bytes (signed: ${signed})`,
      { number: value, width, signed }
    );
  }

  let residue = BigInt.asUintN(bitWidth, value);
  const bytes = new Uint8Array(width);
  for (let i = width - 1; i >= 0 && residue > 0n; i--) {
    bytes[i] = Number(residue & 0xffn);
    residue >>= 8n;
  }
  return bytes;
}

/**
 * Decodes big-endian bytes into an integer. An empty byte-string decodes to 0.
 */
export function bytes2integer(bytes: ByteString, signed: boolean = false): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return signed ? BigInt.asIntN(bytes.length * BITS_PER_BYTE, value) : value;
}

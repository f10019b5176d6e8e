/**
 * Expansion of bytes into bit-strings and compaction back, both table-driven.
 */

import { BITS_PER_BYTE, type BitString, type ByteString } from './BinaryTypes.js';
import { bitPatternKey, getLookupTables } from './LookupTables.js';
import { invalidBitUnit, requireByteAligned } from './Preconditions.js';

/**
 * Expands every byte into its 8 bit-units, MSB first, in original byte order.
 *
 * @example
 * ```typescript
 * bytes2bits(new Uint8Array([0x61])); // [0, 1, 1, 0, 0, 0, 0, 1]
 * ```
 */
export function bytes2bits(bytes: ByteString): BitString {
  const { byteToBits } = getLookupTables();
  const bits = new Uint8Array(bytes.length * BITS_PER_BYTE);
  for (let i = 0; i < bytes.length; i++) {
    bits.set(byteToBits[bytes[i]], i * BITS_PER_BYTE);
  }
  return bits;
}

/**
 * Packs a bit-string into bytes, 8 units per byte.
 *
 * @throws CodecError MisalignedLength if the length is not a multiple of 8
 * @throws CodecError InvalidBitUnit if a unit is not 0 or 1
 */
export function bits2bytes(bits: BitString): ByteString {
  requireByteAligned(bits.length);
  const { bitsToByte } = getLookupTables();
  const view = new DataView(bits.buffer, bits.byteOffset, bits.byteLength);
  const bytes = new Uint8Array(bits.length / BITS_PER_BYTE);

  for (let i = 0; i < bytes.length; i++) {
    const offset = i * BITS_PER_BYTE;
    const byte = bitsToByte.get(bitPatternKey(view, offset));
    if (byte === undefined) {
      throw invalidBitUnit(bits, offset);
    }
    bytes[i] = byte;
  }
  return bytes;
}

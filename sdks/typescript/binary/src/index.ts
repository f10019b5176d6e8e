/**
 * @bitforge/binary
 *
 * Bit-exact codec primitives for bit-field-granular binary formats: integers to and from
 * bit-strings and big-endian byte-strings, bit packing, byte/bit order swaps and hex.
 *
 * @example
 * ```typescript
 * import { integer2bits, bits2bytes, swapbytes, bytes2integer } from '@bitforge/binary';
 *
 * // A 12-bit signed field followed by a 4-bit flag nibble, packed into two bytes
 * const bits = new Uint8Array([...integer2bits(-300, 12, true), ...integer2bits(0b1010, 4)]);
 * const packed = bits2bytes(bits);
 *
 * // Read the same two bytes as a little-endian uint16
 * const asLittleEndian = bytes2integer(swapbytes(packed));
 * ```
 */

// Re-export core types for convenience
export {
  CodecError,
  CodecErrorCodes,
  type CodecErrorCode,
  type CodecErrorDetails,
  getCodecErrorName,
  isCodecError,
  CodecResult,
  tryCodec,
} from '@bitforge/core';

export { BITS_PER_BYTE, type BitString, type ByteString, type Integer } from './BinaryTypes.js';
export { integerRange } from './Preconditions.js';
export { integer2bits, bits2integer } from './IntegerBits.js';
export { integer2bytes, bytes2integer } from './IntegerBytes.js';
export { bytes2bits, bits2bytes } from './BitPacking.js';
export { swapbytes, swapbytesinbits, swapbitsinbytes } from './ByteOrder.js';
export { hexlify, unhexlify } from './Hex.js';
export { verifyLookupTables } from './LookupTables.js';

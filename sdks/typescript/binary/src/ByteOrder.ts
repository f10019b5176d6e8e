/**
 * Byte and bit order transforms for cross-endian and cross-bit-order formats.
 * Each transform is its own inverse.
 */

import { BITS_PER_BYTE, type BitString, type ByteString } from './BinaryTypes.js';
import { getLookupTables } from './LookupTables.js';
import { requireByteAligned } from './Preconditions.js';

/**
 * Reverses the byte order (e.g. big-endian to little-endian).
 */
export function swapbytes(bytes: ByteString): ByteString {
  return bytes.slice().reverse();
}

/**
 * Reverses the order of the 8-unit groups of a bit-string, leaving the bits inside
 * each group as they are. Equivalent to swapbytes on the packed form.
 *
 * @throws CodecError MisalignedLength if the length is not a multiple of 8
 */
export function swapbytesinbits(bits: BitString): BitString {
  requireByteAligned(bits.length);
  const swapped = new Uint8Array(bits.length);
  for (let offset = 0; offset < bits.length; offset += BITS_PER_BYTE) {
    swapped.set(bits.subarray(offset, offset + BITS_PER_BYTE), bits.length - offset - BITS_PER_BYTE);
  }
  return swapped;
}

/**
 * Reverses the bit order inside every byte (bit 7 becomes bit 0); byte positions are unchanged.
 */
export function swapbitsinbytes(bytes: ByteString): ByteString {
  const { reversedBits } = getLookupTables();
  const swapped = new Uint8Array(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    swapped[i] = reversedBits[bytes[i]];
  }
  return swapped;
}

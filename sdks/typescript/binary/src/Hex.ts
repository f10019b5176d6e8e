/**
 * Two-digits-per-byte hex text.
 */

import { CodecError, CodecErrorCodes } from '@bitforge/core';
import type { ByteString } from './BinaryTypes.js';
import { getLookupTables } from './LookupTables.js';

/**
 * Encodes bytes as lowercase hex text.
 */
export function hexlify(bytes: ByteString): string {
  const { byteToHex } = getLookupTables();
  let text = '';
  for (const byte of bytes) {
    text += byteToHex[byte];
  }
  return text;
}

/**
 * Decodes hex text (either case) into bytes.
 *
 * @throws CodecError InvalidHexInput on odd length or a non-hex character
 */
export function unhexlify(text: string): ByteString {
  if (text.length % 2 !== 0) {
    throw new CodecError(
      CodecErrorCodes.InvalidHexInput,
      `hex text must have an even length, got ${text.length}`,
      { length: text.length }
    );
  }

  const { hexToNibble } = getLookupTables();
  const nibbleAt = (index: number): number => {
    const code = text.charCodeAt(index);
    const nibble = code < hexToNibble.length ? hexToNibble[code] : -1;
    if (nibble < 0) {
      throw new CodecError(
        CodecErrorCodes.InvalidHexInput,
        `invalid hex character ${JSON.stringify(text[index])} at index ${index}`,
        { index, character: text[index] }
      );
    }
    return nibble;
  };

  const bytes = new Uint8Array(text.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = (nibbleAt(i * 2) << 4) | nibbleAt(i * 2 + 1);
  }
  return bytes;
}

/**
 * Precomputed 256-entry tables backing the per-byte codec paths.
 *
 * Tables are built on first use and never mutated afterwards. Callers must treat every
 * array returned from {@link getLookupTables} as read-only.
 */

import { BITS_PER_BYTE, type BitString } from './BinaryTypes.js';

const TABLE_SIZE = 256;

/** Any unit bit other than the lowest in each of the four bytes of a 32-bit word. */
const NON_BIT_MASK = 0xfefefefe;

export interface LookupTables {
  /** Byte value to its 8-unit MSB-first expansion (views over one shared buffer). */
  readonly byteToBits: readonly BitString[];

  /** Pattern key of an 8-unit chunk (see {@link bitPatternKey}) to its byte value. */
  readonly bitsToByte: ReadonlyMap<number, number>;

  /** Byte value to the same byte with its bit order reversed. */
  readonly reversedBits: Uint8Array;

  /** Byte value to two lowercase hex digits. */
  readonly byteToHex: readonly string[];

  /** ASCII code (0-127) to nibble value, or -1 for a non-hex character. */
  readonly hexToNibble: Int8Array;
}

let _tables: LookupTables | null = null;

/**
 * Folds the 8 bit-units at `offset` into one number key.
 * The units are read as two big-endian 32-bit words; with valid units the low bit of each
 * byte of `hi * 2` never overlaps `lo`, so the key is unique per pattern.
 * Returns -1 when any unit is not 0 or 1.
 */
export function bitPatternKey(view: DataView, offset: number): number {
  const hi = view.getUint32(offset, false);
  const lo = view.getUint32(offset + 4, false);
  if (((hi | lo) & NON_BIT_MASK) !== 0) {
    return -1;
  }
  return hi * 2 + lo;
}

function buildLookupTables(): LookupTables {
  const expansions = new Uint8Array(TABLE_SIZE * BITS_PER_BYTE);
  const byteToBits: BitString[] = [];
  const bitsToByte = new Map<number, number>();
  const reversedBits = new Uint8Array(TABLE_SIZE);
  const byteToHex: string[] = [];
  const expansionView = new DataView(expansions.buffer);

  for (let byte = 0; byte < TABLE_SIZE; byte++) {
    const offset = byte * BITS_PER_BYTE;
    let reversed = 0;
    for (let i = 0; i < BITS_PER_BYTE; i++) {
      expansions[offset + i] = (byte >> (BITS_PER_BYTE - 1 - i)) & 1;
      reversed = (reversed << 1) | ((byte >> i) & 1);
    }
    byteToBits.push(expansions.subarray(offset, offset + BITS_PER_BYTE));
    bitsToByte.set(bitPatternKey(expansionView, offset), byte);
    reversedBits[byte] = reversed;
    byteToHex.push(byte.toString(16).padStart(2, '0'));
  }

  // ASCII '0'-'9' (48-57), 'A'-'F' (65-70), 'a'-'f' (97-102)
  const hexToNibble = new Int8Array(128).fill(-1);
  for (let i = 0; i < 10; i++) hexToNibble[48 + i] = i;
  for (let i = 0; i < 6; i++) hexToNibble[65 + i] = 10 + i;
  for (let i = 0; i < 6; i++) hexToNibble[97 + i] = 10 + i;

  return { byteToBits, bitsToByte, reversedBits, byteToHex, hexToNibble };
}

/**
 * Returns the shared lookup tables, building them on the first call.
 */
export function getLookupTables(): LookupTables {
  if (_tables === null) {
    _tables = buildLookupTables();
  }
  return _tables;
}

/**
 * Self-check of every table entry.
 * Useful for unit testing and for validating a new runtime at startup.
 */
export function verifyLookupTables(): boolean {
  try {
    const tables = getLookupTables();
    if (tables.bitsToByte.size !== TABLE_SIZE) {
      console.warn(`Bit pattern table has ${tables.bitsToByte.size} entries, expected ${TABLE_SIZE}`);
      return false;
    }

    for (let byte = 0; byte < TABLE_SIZE; byte++) {
      const bits = tables.byteToBits[byte];
      const view = new DataView(bits.buffer, bits.byteOffset, bits.byteLength);
      const packed = tables.bitsToByte.get(bitPatternKey(view, 0));
      const reversed = tables.reversedBits[tables.reversedBits[byte]];
      const hex = tables.byteToHex[byte];
      const nibbles =
        (tables.hexToNibble[hex.charCodeAt(0)] << 4) | tables.hexToNibble[hex.charCodeAt(1)];

      if (packed !== byte || reversed !== byte || nibbles !== byte) {
        console.warn(`Lookup tables disagree for byte 0x${hex}`);
        return false;
      }
    }
    return true;
  } catch (error) {
    console.warn('Lookup table verification failed:', error);
    return false;
  }
}

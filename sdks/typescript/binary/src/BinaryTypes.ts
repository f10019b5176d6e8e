/**
 * Value representations shared by the codec primitives.
 */

/** An exact integer: a whole JavaScript number or a bigint. */
export type Integer = number | bigint;

/** One element per bit, each 0 or 1, most-significant bit first. */
export type BitString = Uint8Array;

/** Ordinary 8-bit bytes. */
export type ByteString = Uint8Array;

export const BITS_PER_BYTE = 8;

/**
 * Unit tests for big-endian integer <-> byte-string conversion.
 */

import { describe, it, expect } from 'vitest';
import { CodecErrorCodes, isCodecError } from '@bitforge/core';
import { integer2bytes, bytes2integer } from '../IntegerBytes.js';
import { integerRange } from '../Preconditions.js';

function codeOf(fn: () => unknown): number | undefined {
  try {
    fn();
  } catch (error) {
    return isCodecError(error) ? error.code : undefined;
  }
  return undefined;
}

describe('IntegerBytes', () => {
  describe('integer2bytes', () => {
    it('should write big-endian (high byte first)', () => {
      expect(Array.from(integer2bytes(0x1234, 2))).toEqual([0x12, 0x34]);
      expect(Array.from(integer2bytes(1, 4))).toEqual([0, 0, 0, 1]);
    });

    it('should write 64-bit values', () => {
      expect(Array.from(integer2bytes(0xfedcba9876543210n, 8))).toEqual([
        0xfe, 0xdc, 0xba, 0x98, 0x76, 0x54, 0x32, 0x10,
      ]);
    });

    it('should write negative values in two\'s complement when signed', () => {
      expect(Array.from(integer2bytes(-1, 2, true))).toEqual([0xff, 0xff]);
      expect(Array.from(integer2bytes(-2, 2, true))).toEqual([0xff, 0xfe]);
      expect(Array.from(integer2bytes(-128, 1, true))).toEqual([0x80]);
    });

    it('should only accept 0 for width 0', () => {
      expect(integer2bytes(0, 0).length).toBe(0);
      expect(codeOf(() => integer2bytes(1, 0))).toBe(CodecErrorCodes.OutOfRange);
    });

    it('should throw OutOfRange reporting number, width and signed', () => {
      expect(() => integer2bytes(256, 1)).toThrow(
        'number 256 does not fit within 1 bytes (signed: false)'
      );
      try {
        integer2bytes(128, 1, true);
        expect.unreachable();
      } catch (error) {
        expect(isCodecError(error, CodecErrorCodes.OutOfRange)).toBe(true);
        if (isCodecError(error)) {
          expect(error.details).toEqual({ number: 128n, width: 1, signed: true });
        }
      }
    });

    it('should reject negative values when unsigned', () => {
      expect(codeOf(() => integer2bytes(-1, 1))).toBe(CodecErrorCodes.OutOfRange);
    });

    it('should reject values one past the signed minimum', () => {
      expect(codeOf(() => integer2bytes(-129, 1, true))).toBe(CodecErrorCodes.OutOfRange);
    });

    it('should throw InvalidWidth for a negative width', () => {
      expect(codeOf(() => integer2bytes(1, -1))).toBe(CodecErrorCodes.InvalidWidth);
    });

    it('should throw InvalidInteger for a fractional number', () => {
      expect(codeOf(() => integer2bytes(0.5, 1))).toBe(CodecErrorCodes.InvalidInteger);
    });
  });

  describe('bytes2integer', () => {
    it('should read big-endian', () => {
      expect(bytes2integer(new Uint8Array([0x12, 0x34]))).toBe(0x1234n);
    });

    it('should decode an empty byte-string to 0', () => {
      expect(bytes2integer(new Uint8Array(0))).toBe(0n);
      expect(bytes2integer(new Uint8Array(0), true)).toBe(0n);
    });

    it('should honour signedness', () => {
      const bytes = new Uint8Array([0xff, 0xfe]);
      expect(bytes2integer(bytes)).toBe(65534n);
      expect(bytes2integer(bytes, true)).toBe(-2n);
      expect(bytes2integer(new Uint8Array([0x80, 0x00]), true)).toBe(-32768n);
      expect(bytes2integer(new Uint8Array([0x7f, 0xff]), true)).toBe(32767n);
    });
  });

  describe('round trip', () => {
    it('should decode what it encodes for widths 0 to 8 bytes', () => {
      for (const signed of [false, true]) {
        for (let width = 0; width <= 8; width++) {
          const [min, max] = integerRange(width * 8, signed);
          for (const n of [min, max, 0n, max / 3n]) {
            const bytes = integer2bytes(n, width, signed);
            expect(bytes.length).toBe(width);
            expect(bytes2integer(bytes, signed)).toBe(n);
          }
        }
      }
    });
  });
});

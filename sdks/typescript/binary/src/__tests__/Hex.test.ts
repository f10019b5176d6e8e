/**
 * Unit tests for hex encode/decode.
 */

import { describe, it, expect } from 'vitest';
import { CodecErrorCodes, isCodecError, tryCodec } from '@bitforge/core';
import { hexlify, unhexlify } from '../Hex.js';

describe('Hex', () => {
  describe('hexlify', () => {
    it('should encode two lowercase digits per byte', () => {
      expect(hexlify(new Uint8Array([0xde, 0xad, 0xbe, 0xef]))).toBe('deadbeef');
      expect(hexlify(new Uint8Array([0x00, 0x0f]))).toBe('000f');
    });

    it('should encode no bytes as an empty string', () => {
      expect(hexlify(new Uint8Array(0))).toBe('');
    });
  });

  describe('unhexlify', () => {
    it('should decode mixed-case digits', () => {
      expect(Array.from(unhexlify('DEADbeef'))).toEqual([0xde, 0xad, 0xbe, 0xef]);
    });

    it('should decode an empty string to no bytes', () => {
      expect(unhexlify('').length).toBe(0);
    });

    it('should throw InvalidHexInput on odd length', () => {
      expect(() => unhexlify('abc')).toThrow('hex text must have an even length, got 3');
    });

    it('should throw InvalidHexInput naming the first non-hex character', () => {
      expect(() => unhexlify('zz')).toThrow('invalid hex character "z" at index 0');

      const result = tryCodec(() => unhexlify('0g'));
      expect(result.isSuccess).toBe(false);
      expect(isCodecError(result.error, CodecErrorCodes.InvalidHexInput)).toBe(true);
      expect(result.error?.details).toEqual({ index: 1, character: 'g' });
    });

    it('should reject characters outside ASCII', () => {
      const result = tryCodec(() => unhexlify('é0'));
      expect(result.error?.code).toBe(CodecErrorCodes.InvalidHexInput);
    });
  });

  describe('round trip', () => {
    it('should restore every byte value', () => {
      const bytes = Uint8Array.from({ length: 256 }, (_, i) => i);
      expect(unhexlify(hexlify(bytes))).toEqual(bytes);
    });
  });
});

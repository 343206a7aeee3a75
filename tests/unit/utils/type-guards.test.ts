/**
 * Type Guards Tests
 */

import { describe, expect, it } from 'vitest';
import { Buffer } from 'node:buffer';

import { isBuffer, isHex, isUint32 } from '../../../src/utils/type-guards';

describe('Type Guards', () => {
  describe('isBuffer', () => {
    it('should return true for Buffer instances', () => {
      expect(isBuffer(Buffer.alloc(0))).toBe(true);
      expect(isBuffer(Buffer.from([1, 2, 3, 4]))).toBe(true);
    });

    it('should return false for non-Buffer values', () => {
      expect(isBuffer(null)).toBe(false);
      expect(isBuffer('string')).toBe(false);
      expect(isBuffer([])).toBe(false);
      expect(isBuffer(new ArrayBuffer(8))).toBe(false);
    });
  });

  describe('isUint32', () => {
    it('should accept the full unsigned 32-bit range', () => {
      expect(isUint32(0)).toBe(true);
      expect(isUint32(0xffffffff)).toBe(true);
    });

    it('should reject values outside the range or not integers', () => {
      expect(isUint32(-1)).toBe(false);
      expect(isUint32(0x100000000)).toBe(false);
      expect(isUint32(1.5)).toBe(false);
      expect(isUint32('1')).toBe(false);
    });
  });

  describe('isHex', () => {
    it('should accept even-length hex in either case', () => {
      expect(isHex('')).toBe(true);
      expect(isHex('00ff')).toBe(true);
      expect(isHex('ABcd')).toBe(true);
    });

    it('should reject odd lengths and other characters', () => {
      expect(isHex('abc')).toBe(false);
      expect(isHex('zz')).toBe(false);
      expect(isHex('0x00')).toBe(false);
      expect(isHex(12)).toBe(false);
    });
  });
});

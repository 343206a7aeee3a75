/**
 * Type guards and byte/integer validation helpers
 */

import { Buffer } from 'node:buffer';

export function isBuffer(value: unknown): value is Buffer {
  return value instanceof Buffer;
}

export function isUint32(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 &&
    value <= 0xffffffff;
}

export function isHex(value: unknown): value is string {
  return typeof value === 'string' && value.length % 2 === 0 && /^[0-9a-fA-F]*$/.test(value);
}

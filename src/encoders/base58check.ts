/**
 * Base58Check text encoding
 *
 * Used for legacy addresses, WIF private keys and extended keys. Decoding is
 * split into two steps so each caller can report length and checksum
 * failures with its own error type, in its own order.
 */

import { Buffer } from 'node:buffer';

import bs58 from 'bs58';

import { checksum } from '../utils/crypto.ts';

export const CHECKSUM_LENGTH = 4;

export interface Base58CheckParts {
  /** Bytes before the trailing checksum */
  payload: Buffer;
  /** Checksum carried by the encoded text */
  found: Buffer;
  /** Checksum computed over the payload */
  expected: Buffer;
  valid: boolean;
}

export function encodeBase58Check(payload: Buffer): string {
  return bs58.encode(Buffer.concat([payload, checksum(payload)]));
}

/**
 * Decode raw Base58 text. Returns undefined on a character outside the alphabet.
 */
export function decodeBase58(text: string): Buffer | undefined {
  const decoded = bs58.decodeUnsafe(text);
  return decoded === undefined ? undefined : Buffer.from(decoded);
}

/**
 * Split decoded bytes into payload and checksum and compare the checksum.
 * `data` must be longer than the checksum.
 */
export function splitChecksum(data: Buffer): Base58CheckParts {
  const payload = data.subarray(0, data.length - CHECKSUM_LENGTH);
  const found = data.subarray(data.length - CHECKSUM_LENGTH);
  const expected = checksum(payload);
  return { payload, found, expected, valid: expected.equals(found) };
}

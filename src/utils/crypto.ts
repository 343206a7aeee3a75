/**
 * Hash primitives shared by the key, address and transaction modules
 */

import { Buffer } from 'node:buffer';
import { createHmac, pbkdf2Sync } from 'node:crypto';

import * as bitcoin from 'bitcoinjs-lib';

export function sha256(data: Buffer): Buffer {
  return bitcoin.crypto.sha256(data);
}

/** RIPEMD160(SHA256(data)) */
export function hash160(data: Buffer): Buffer {
  return bitcoin.crypto.hash160(data);
}

/** SHA256(SHA256(data)) */
export function hash256(data: Buffer): Buffer {
  return bitcoin.crypto.hash256(data);
}

/**
 * First four bytes of the double SHA256, as appended by Base58Check
 */
export function checksum(data: Buffer): Buffer {
  return hash256(data).subarray(0, 4);
}

export function hmacSha512(key: Buffer | string, data: Buffer): Buffer {
  return createHmac('sha512', key).update(data).digest();
}

export function pbkdf2Sha512(
  password: Buffer,
  salt: Buffer,
  iterations: number,
  keyLength: number,
): Buffer {
  return pbkdf2Sync(password, salt, iterations, keyLength, 'sha512');
}

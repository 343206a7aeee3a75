/**
 * secp256k1 public keys
 */

import { Buffer } from 'node:buffer';

import * as ecc from 'tiny-secp256k1';

import type { AddressFormat } from '../interfaces/address.interface.ts';
import type { NetworkProfile } from '../interfaces/network.interface.ts';
import { PublicKeyError } from '../errors/index.ts';
import { hash160 } from '../utils/crypto.ts';
import { isHex } from '../utils/type-guards.ts';
import { Address } from './address.ts';

export class PublicKey {
  private constructor(private readonly point: Buffer) {}

  /**
   * @param bytes - SEC1 encoded point, 33 bytes compressed or 65 uncompressed
   */
  static fromBytes(bytes: Buffer): PublicKey {
    if (!ecc.isPoint(bytes)) {
      throw new PublicKeyError(`Invalid public key: ${bytes.toString('hex')}`);
    }
    return new PublicKey(Buffer.from(bytes));
  }

  static fromHex(hex: string): PublicKey {
    if (!isHex(hex)) {
      throw new PublicKeyError(`Invalid public key hex: "${hex}"`);
    }
    return PublicKey.fromBytes(Buffer.from(hex, 'hex'));
  }

  get compressed(): boolean {
    return this.point.length === 33;
  }

  toBuffer(): Buffer {
    return Buffer.from(this.point);
  }

  /** 33-byte form, as committed to by segwit scripts and BIP32 */
  toCompressedBuffer(): Buffer {
    if (this.compressed) return this.toBuffer();
    const compressed = ecc.pointCompress(this.point, true);
    return Buffer.from(compressed);
  }

  /** hash160 of the key in its own (compressed or uncompressed) encoding */
  hash160(): Buffer {
    return hash160(this.point);
  }

  toAddress(format: AddressFormat, network: NetworkProfile): Address {
    return Address.fromPublicKey(this, format, network);
  }

  /**
   * Verify a 64-byte compact (r ∥ s) signature over a 32-byte digest
   */
  verify(digest: Buffer, signature: Buffer): boolean {
    return ecc.verify(digest, this.point, signature);
  }

  equals(other: PublicKey): boolean {
    return this.point.equals(other.point);
  }

  toHex(): string {
    return this.point.toString('hex');
  }

  toString(): string {
    return this.toHex();
  }
}

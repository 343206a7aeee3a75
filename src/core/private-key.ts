/**
 * secp256k1 private keys and their WIF text form
 */

import { Buffer } from 'node:buffer';

import { ECPairFactory } from 'ecpair';
import type { ECPairInterface } from 'ecpair';
import * as ecc from 'tiny-secp256k1';

import type { AddressFormat } from '../interfaces/address.interface.ts';
import type { RandomSource } from '../interfaces/key.interface.ts';
import type { NetworkProfile } from '../interfaces/network.interface.ts';
import { findNetworkByWifPrefix, MAINNET } from '../config/networks.ts';
import { decodeBase58, splitChecksum } from '../encoders/base58check.ts';
import { NetworkMismatchError, PrivateKeyError } from '../errors/index.ts';
import { Address } from './address.ts';
import { PublicKey } from './public-key.ts';

const ECPair = ECPairFactory(ecc);

/** prefix ∥ secret ∥ checksum, with an extra 0x01 before the checksum when compressed */
const WIF_UNCOMPRESSED_LENGTH = 37;
const WIF_COMPRESSED_LENGTH = 38;

export class PrivateKey {
  private readonly keyPair: ECPairInterface;

  private constructor(
    private readonly secret: Buffer,
    public readonly network: NetworkProfile,
    public readonly compressed: boolean,
  ) {
    this.keyPair = ECPair.fromPrivateKey(secret, { compressed, network: network.network });
  }

  static fromBytes(secret: Buffer, network: NetworkProfile = MAINNET, compressed = true): PrivateKey {
    if (secret.length !== 32 || !ecc.isPrivate(secret)) {
      throw new PrivateKeyError('InvalidKey', 'Private key is not a valid secp256k1 scalar', {
        found: String(secret.length),
      });
    }
    return new PrivateKey(Buffer.from(secret), network, compressed);
  }

  /**
   * Draw 32-byte candidates from `random` until one is a valid scalar
   */
  static generate(random: RandomSource, network: NetworkProfile = MAINNET, compressed = true): PrivateKey {
    const keyPair = ECPair.makeRandom({ rng: random, compressed, network: network.network });
    if (!keyPair.privateKey) {
      throw new PrivateKeyError('InvalidKey', 'Random key pair has no private key');
    }
    return new PrivateKey(Buffer.from(keyPair.privateKey), network, compressed);
  }

  /**
   * Parse a WIF string. When `network` is given, the WIF prefix must match it.
   */
  static fromWif(wif: string, network?: NetworkProfile): PrivateKey {
    const data = decodeBase58(wif);
    if (!data) {
      throw new PrivateKeyError('InvalidEncoding', `Invalid base58 in WIF: "${wif}"`);
    }
    if (data.length !== WIF_UNCOMPRESSED_LENGTH && data.length !== WIF_COMPRESSED_LENGTH) {
      throw new PrivateKeyError('InvalidByteLength', `Invalid WIF byte length ${data.length}`, {
        expected: `${WIF_UNCOMPRESSED_LENGTH} or ${WIF_COMPRESSED_LENGTH}`,
        found: String(data.length),
      });
    }

    const { payload, found, expected, valid } = splitChecksum(data);
    if (!valid) {
      throw new PrivateKeyError('InvalidChecksum', 'Invalid WIF checksum', {
        expected: expected.toString('hex'),
        found: found.toString('hex'),
      });
    }

    const profile = findNetworkByWifPrefix(payload[0]);
    if (!profile) {
      throw new PrivateKeyError('InvalidPrefix', `Unknown WIF prefix 0x${payload[0].toString(16)}`, {
        found: payload[0].toString(16),
      });
    }
    if (network && network.type !== profile.type) {
      throw new NetworkMismatchError(network.type, profile.type);
    }

    const compressed = payload.length === 34;
    if (compressed && payload[33] !== 0x01) {
      throw new PrivateKeyError('InvalidEncoding', 'Invalid WIF compression flag', {
        expected: '01',
        found: payload[33].toString(16),
      });
    }
    return PrivateKey.fromBytes(payload.subarray(1, 33), profile, compressed);
  }

  toBuffer(): Buffer {
    return Buffer.from(this.secret);
  }

  toPublicKey(): PublicKey {
    return PublicKey.fromBytes(this.keyPair.publicKey);
  }

  toAddress(format: AddressFormat): Address {
    return Address.fromPublicKey(this.toPublicKey(), format, this.network);
  }

  /**
   * ECDSA over a 32-byte digest, returned as 64-byte compact r ∥ s with low s.
   * Nonces are RFC6979; bytes from `random` are mixed in as extra entropy.
   */
  sign(digest: Buffer, random?: RandomSource): Buffer {
    if (!random) {
      return this.keyPair.sign(digest);
    }
    return Buffer.from(ecc.sign(digest, this.secret, random(32)));
  }

  toWif(): string {
    return this.keyPair.toWIF();
  }

  equals(other: PrivateKey): boolean {
    return this.secret.equals(other.secret) &&
      this.network.type === other.network.type &&
      this.compressed === other.compressed;
  }

  toString(): string {
    return this.toWif();
  }
}

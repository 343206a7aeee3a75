/**
 * BIP32 extended private keys
 *
 * Every derivation returns a new key; parents are never modified, so any
 * number of branches can be derived from the same node.
 */

import { Buffer } from 'node:buffer';

import * as ecc from 'tiny-secp256k1';

import type { AddressFormat } from '../interfaces/address.interface.ts';
import type { DeriveOptions } from '../interfaces/key.interface.ts';
import type { NetworkProfile } from '../interfaces/network.interface.ts';
import { MAINNET } from '../config/networks.ts';
import { ExtendedKeyError, NetworkMismatchError } from '../errors/index.ts';
import { hash160, hmacSha512 } from '../utils/crypto.ts';
import { Address } from './address.ts';
import { ChildIndex, DerivationPath } from './derivation-path.ts';
import {
  decodeExtendedKey,
  encodeExtendedKey,
  type ExtendedKeyState,
  isSameState,
  MAX_DEPTH,
} from './extended-key-codec.ts';
import { ExtendedPublicKey, formatForPath } from './extended-public-key.ts';
import { PrivateKey } from './private-key.ts';
import { PublicKey } from './public-key.ts';

const MASTER_KEY_HMAC_KEY = 'Bitcoin seed';

export class ExtendedPrivateKey {
  private constructor(
    private readonly state: ExtendedKeyState,
    private readonly secret: Buffer,
  ) {}

  /**
   * Master key from a BIP39 seed (or any 16 to 64 byte seed)
   */
  static fromSeed(seed: Buffer, network: NetworkProfile = MAINNET, format: AddressFormat = 'p2pkh'): ExtendedPrivateKey {
    const digest = hmacSha512(MASTER_KEY_HMAC_KEY, seed);
    const secret = Buffer.from(digest.subarray(0, 32));
    if (!ecc.isPrivate(secret)) {
      throw new ExtendedKeyError('InvalidKey', 'Seed produces an invalid master key');
    }

    return new ExtendedPrivateKey(
      {
        network,
        format,
        depth: 0,
        parentFingerprint: Buffer.alloc(4),
        childIndex: ChildIndex.normal(0),
        chainCode: Buffer.from(digest.subarray(32)),
      },
      secret,
    );
  }

  static parse(text: string, network?: NetworkProfile): ExtendedPrivateKey {
    const { key, ...state } = decodeExtendedKey(text, 'private');
    if (network && network.type !== state.network.type) {
      throw new NetworkMismatchError(network.type, state.network.type);
    }

    const secret = key.subarray(1);
    if (key[0] !== 0x00 || !ecc.isPrivate(secret)) {
      throw new ExtendedKeyError('InvalidKey', 'Extended private key does not hold a valid scalar');
    }
    return new ExtendedPrivateKey(state, Buffer.from(secret));
  }

  get network(): NetworkProfile {
    return this.state.network;
  }

  get format(): AddressFormat {
    return this.state.format;
  }

  get depth(): number {
    return this.state.depth;
  }

  get childIndex(): ChildIndex {
    return this.state.childIndex;
  }

  get parentFingerprint(): Buffer {
    return Buffer.from(this.state.parentFingerprint);
  }

  get chainCode(): Buffer {
    return Buffer.from(this.state.chainCode);
  }

  get identifier(): Buffer {
    return hash160(this.compressedPublicKey());
  }

  get fingerprint(): Buffer {
    return this.identifier.subarray(0, 4);
  }

  /**
   * Derive along a path. Text paths are read with the network's coin type.
   */
  derive(path: DerivationPath | string, options: DeriveOptions = {}): ExtendedPrivateKey {
    const derivationPath = typeof path === 'string' ? DerivationPath.parse(path, this.network.coinType) : path;
    const derived = derivationPath.indices.reduce<ExtendedPrivateKey>(
      (node, index) => node.deriveChild(index, options),
      this,
    );
    const format = formatForPath(derivationPath, derived.format);
    return format === derived.format
      ? derived
      : new ExtendedPrivateKey({ ...derived.state, format }, derived.secret);
  }

  deriveChild(index: ChildIndex, options: DeriveOptions = {}): ExtendedPrivateKey {
    if (this.depth >= MAX_DEPTH) {
      throw new ExtendedKeyError('MaximumChildDepthReached', `Maximum child depth ${MAX_DEPTH} reached`);
    }

    const publicKey = this.compressedPublicKey();
    const data = Buffer.alloc(37);
    if (index.isHardened) {
      this.secret.copy(data, 1);
    } else {
      publicKey.copy(data, 0);
    }
    data.writeUInt32BE(index.toNumber(), 33);

    const digest = hmacSha512(this.state.chainCode, data);
    const tweak = digest.subarray(0, 32);
    if (!ecc.isPrivate(tweak)) {
      throw new ExtendedKeyError('InvalidKey', `Child ${index} tweak is not a valid scalar`);
    }
    const child = ecc.privateAdd(this.secret, tweak);
    if (!child) {
      throw new ExtendedKeyError('InvalidKey', `Child ${index} private key is zero`);
    }

    options.logger?.debug?.('Derived private child key', { depth: this.depth + 1, index: index.toString() });

    return new ExtendedPrivateKey(
      {
        network: this.network,
        format: this.format,
        depth: this.depth + 1,
        parentFingerprint: hash160(publicKey).subarray(0, 4),
        childIndex: index,
        chainCode: Buffer.from(digest.subarray(32)),
      },
      Buffer.from(child),
    );
  }

  toExtendedPublicKey(): ExtendedPublicKey {
    return ExtendedPublicKey.fromState(this.state, this.compressedPublicKey());
  }

  toPrivateKey(): PrivateKey {
    return PrivateKey.fromBytes(this.secret, this.network, true);
  }

  toPublicKey(): PublicKey {
    return PublicKey.fromBytes(this.compressedPublicKey());
  }

  toAddress(format: AddressFormat = this.format): Address {
    return Address.fromPublicKey(this.toPublicKey(), format, this.network);
  }

  equals(other: ExtendedPrivateKey): boolean {
    return isSameState(this.state, other.state) && this.secret.equals(other.secret);
  }

  toString(): string {
    return encodeExtendedKey(this.state, 'private', Buffer.concat([Buffer.alloc(1), this.secret]));
  }

  private compressedPublicKey(): Buffer {
    const point = ecc.pointFromScalar(this.secret, true);
    if (!point) {
      throw new ExtendedKeyError('InvalidKey', 'Private key has no public point');
    }
    return Buffer.from(point);
  }
}

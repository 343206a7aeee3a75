/**
 * BIP32 extended public keys
 */

import { Buffer } from 'node:buffer';

import * as ecc from 'tiny-secp256k1';

import type { AddressFormat } from '../interfaces/address.interface.ts';
import type { DeriveOptions } from '../interfaces/key.interface.ts';
import type { NetworkProfile } from '../interfaces/network.interface.ts';
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
import { PublicKey } from './public-key.ts';

export class ExtendedPublicKey {
  private constructor(
    private readonly state: ExtendedKeyState,
    private readonly point: Buffer,
  ) {}

  /**
   * @param point - Compressed public key
   */
  static fromState(state: ExtendedKeyState, point: Buffer): ExtendedPublicKey {
    if (point.length !== 33 || !ecc.isPoint(point)) {
      throw new ExtendedKeyError('InvalidKey', 'Extended public key does not hold a valid compressed point');
    }
    return new ExtendedPublicKey(state, Buffer.from(point));
  }

  static parse(text: string, network?: NetworkProfile): ExtendedPublicKey {
    const { key, ...state } = decodeExtendedKey(text, 'public');
    if (network && network.type !== state.network.type) {
      throw new NetworkMismatchError(network.type, state.network.type);
    }
    return ExtendedPublicKey.fromState(state, key);
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

  /** hash160 of the compressed public key */
  get identifier(): Buffer {
    return hash160(this.point);
  }

  get fingerprint(): Buffer {
    return this.identifier.subarray(0, 4);
  }

  /**
   * Derive along a path of normal steps. Text paths are read with the
   * network's coin type so BIP44/49/84 layouts are recognised.
   */
  derive(path: DerivationPath | string, options: DeriveOptions = {}): ExtendedPublicKey {
    const derivationPath = typeof path === 'string' ? DerivationPath.parse(path, this.network.coinType) : path;
    const derived = derivationPath.indices.reduce<ExtendedPublicKey>(
      (node, index) => node.deriveChild(index, options),
      this,
    );
    const format = formatForPath(derivationPath, derived.format);
    return format === derived.format
      ? derived
      : new ExtendedPublicKey({ ...derived.state, format }, derived.point);
  }

  deriveChild(index: ChildIndex, options: DeriveOptions = {}): ExtendedPublicKey {
    if (this.depth >= MAX_DEPTH) {
      throw new ExtendedKeyError('MaximumChildDepthReached', `Maximum child depth ${MAX_DEPTH} reached`);
    }
    if (index.isHardened) {
      throw new ExtendedKeyError('InvalidChildNumber', `Cannot derive hardened child ${index} from a public key`, {
        found: index.toString(),
      });
    }

    const data = Buffer.alloc(37);
    this.point.copy(data, 0);
    data.writeUInt32BE(index.toNumber(), 33);
    const digest = hmacSha512(this.state.chainCode, data);
    const tweak = digest.subarray(0, 32);

    if (!ecc.isPrivate(tweak)) {
      throw new ExtendedKeyError('InvalidKey', `Child ${index} tweak is not a valid scalar`);
    }
    const child = ecc.pointAddScalar(this.point, tweak, true);
    if (!child) {
      throw new ExtendedKeyError('InvalidKey', `Child ${index} is the point at infinity`);
    }

    options.logger?.debug?.('Derived public child key', { depth: this.depth + 1, index: index.toString() });

    return new ExtendedPublicKey(
      {
        network: this.network,
        format: this.format,
        depth: this.depth + 1,
        parentFingerprint: this.fingerprint,
        childIndex: index,
        chainCode: Buffer.from(digest.subarray(32)),
      },
      Buffer.from(child),
    );
  }

  toPublicKey(): PublicKey {
    return PublicKey.fromBytes(this.point);
  }

  toAddress(format: AddressFormat = this.format): Address {
    return Address.fromPublicKey(this.toPublicKey(), format, this.network);
  }

  equals(other: ExtendedPublicKey): boolean {
    return isSameState(this.state, other.state) && this.point.equals(other.point);
  }

  toString(): string {
    return encodeExtendedKey(this.state, 'public', this.point);
  }
}

/**
 * BIP49 and BIP84 paths fix the address format of the keys below them
 */
export function formatForPath(path: DerivationPath, inherited: AddressFormat): AddressFormat {
  switch (path.kind) {
    case 'bip49':
      return 'p2sh_p2wpkh';
    case 'bip84':
      return 'bech32';
    default:
      return inherited;
  }
}

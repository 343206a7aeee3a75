/**
 * BIP32 extended key serialization
 *
 * 78-byte payload: version(4) ∥ depth(1) ∥ parent fingerprint(4) ∥
 * child number(4, big endian) ∥ chain code(32) ∥ key(33), Base58Check encoded.
 * The private key slot holds `0x00 ∥ k`, the public slot the compressed point.
 */

import { Buffer } from 'node:buffer';

import type { AddressFormat } from '../interfaces/address.interface.ts';
import type { NetworkProfile } from '../interfaces/network.interface.ts';
import { findExtendedKeyVersion, isExtendedKeyFormat } from '../config/networks.ts';
import { decodeBase58, encodeBase58Check, splitChecksum } from '../encoders/base58check.ts';
import { ExtendedKeyError } from '../errors/index.ts';
import { ChildIndex } from './derivation-path.ts';

export const EXTENDED_KEY_PAYLOAD_LENGTH = 78;
export const EXTENDED_KEY_ENCODED_LENGTH = 82;
export const MAX_DEPTH = 255;

export type ExtendedKeyKind = 'private' | 'public';

/**
 * Everything an extended key carries apart from its key material
 */
export interface ExtendedKeyState {
  readonly network: NetworkProfile;
  readonly format: AddressFormat;
  readonly depth: number;
  readonly parentFingerprint: Buffer;
  readonly childIndex: ChildIndex;
  readonly chainCode: Buffer;
}

export interface DecodedExtendedKey extends ExtendedKeyState {
  /** 33-byte key slot as serialized */
  readonly key: Buffer;
}

export function isSameState(a: ExtendedKeyState, b: ExtendedKeyState): boolean {
  return a.network.type === b.network.type &&
    a.format === b.format &&
    a.depth === b.depth &&
    a.parentFingerprint.equals(b.parentFingerprint) &&
    a.childIndex.equals(b.childIndex) &&
    a.chainCode.equals(b.chainCode);
}

export function getExtendedKeyVersion(
  network: NetworkProfile,
  format: AddressFormat,
  kind: ExtendedKeyKind,
): number {
  if (!isExtendedKeyFormat(format)) {
    throw new ExtendedKeyError('UnsupportedFormat', `No extended key version bytes for format ${format}`, {
      found: format,
    });
  }
  return network.extendedKeyVersions[format][kind];
}

export function encodeExtendedKey(state: ExtendedKeyState, kind: ExtendedKeyKind, key: Buffer): string {
  const payload = Buffer.alloc(EXTENDED_KEY_PAYLOAD_LENGTH);
  payload.writeUInt32BE(getExtendedKeyVersion(state.network, state.format, kind), 0);
  payload.writeUInt8(state.depth, 4);
  state.parentFingerprint.copy(payload, 5);
  payload.writeUInt32BE(state.childIndex.toNumber(), 9);
  state.chainCode.copy(payload, 13);
  key.copy(payload, 45);
  return encodeBase58Check(payload);
}

export function decodeExtendedKey(text: string, kind: ExtendedKeyKind): DecodedExtendedKey {
  const data = decodeBase58(text);
  if (!data) {
    throw new ExtendedKeyError('InvalidEncoding', 'Extended key contains characters outside the base58 alphabet');
  }
  if (data.length !== EXTENDED_KEY_ENCODED_LENGTH) {
    throw new ExtendedKeyError('InvalidByteLength', `Invalid extended key byte length ${data.length}`, {
      expected: String(EXTENDED_KEY_ENCODED_LENGTH),
      found: String(data.length),
    });
  }

  const { payload, found, expected, valid } = splitChecksum(data);
  if (!valid) {
    throw new ExtendedKeyError('InvalidChecksum', 'Invalid extended key checksum', {
      expected: expected.toString('hex'),
      found: found.toString('hex'),
    });
  }

  const version = payload.readUInt32BE(0);
  const match = findExtendedKeyVersion(version);
  if (!match || match.kind !== kind) {
    throw new ExtendedKeyError('InvalidVersionBytes', `Invalid ${kind} extended key version bytes`, {
      found: version.toString(16).padStart(8, '0'),
    });
  }

  return {
    network: match.profile,
    format: match.format,
    depth: payload.readUInt8(4),
    parentFingerprint: Buffer.from(payload.subarray(5, 9)),
    childIndex: ChildIndex.fromNumber(payload.readUInt32BE(9)),
    chainCode: Buffer.from(payload.subarray(13, 45)),
    key: Buffer.from(payload.subarray(45, 78)),
  };
}

/**
 * Network Configuration Interface
 * Defines network-specific version bytes, prefixes and derivation constants
 */

import type { Network } from 'bitcoinjs-lib';

import type { ExtendedKeyFormat } from './address.interface.ts';

/**
 * Network Type definition
 */
export type NetworkType = 'mainnet' | 'testnet';

export const NETWORK_TYPES: readonly NetworkType[] = ['mainnet', 'testnet'];

/**
 * Extended key version bytes for one serialization format
 */
export interface ExtendedKeyVersion {
  private: number;
  public: number;
}

/**
 * Constant tables consulted (never mutated) by the key, address and
 * transaction modules.
 */
export interface NetworkProfile {
  readonly type: NetworkType;
  /** bitcoinjs-lib parameters, used where the library needs a network */
  readonly network: Network;
  /** BIP44 coin type (the value before hardening) */
  readonly coinType: number;
  /** Bech32 human-readable part */
  readonly bech32: string;
  /** Base58 version byte of P2PKH addresses */
  readonly pubKeyHash: number;
  /** Base58 version byte of P2SH addresses */
  readonly scriptHash: number;
  /** WIF private key prefix */
  readonly wif: number;
  readonly extendedKeyVersions: Readonly<Record<ExtendedKeyFormat, ExtendedKeyVersion>>;
}

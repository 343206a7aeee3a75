/**
 * Network profiles
 *
 * Constant tables for each supported network. Address, WIF and bech32
 * prefixes come from the bitcoinjs-lib network definitions; the SLIP-132
 * version bytes for the segwit extended key formats are added here.
 */

import * as bitcoin from 'bitcoinjs-lib';

import type { AddressFormat, ExtendedKeyFormat } from '../interfaces/address.interface.ts';
import type { NetworkProfile, NetworkType } from '../interfaces/network.interface.ts';

export const MAINNET: NetworkProfile = {
  type: 'mainnet',
  network: bitcoin.networks.bitcoin,
  coinType: 0,
  bech32: bitcoin.networks.bitcoin.bech32,
  pubKeyHash: bitcoin.networks.bitcoin.pubKeyHash,
  scriptHash: bitcoin.networks.bitcoin.scriptHash,
  wif: bitcoin.networks.bitcoin.wif,
  extendedKeyVersions: {
    p2pkh: { private: 0x0488ade4, public: 0x0488b21e }, // xprv / xpub
    p2sh_p2wpkh: { private: 0x049d7878, public: 0x049d7cb2 }, // yprv / ypub
    bech32: { private: 0x04b2430c, public: 0x04b24746 }, // zprv / zpub
  },
};

export const TESTNET: NetworkProfile = {
  type: 'testnet',
  network: bitcoin.networks.testnet,
  coinType: 1,
  bech32: bitcoin.networks.testnet.bech32,
  pubKeyHash: bitcoin.networks.testnet.pubKeyHash,
  scriptHash: bitcoin.networks.testnet.scriptHash,
  wif: bitcoin.networks.testnet.wif,
  extendedKeyVersions: {
    p2pkh: { private: 0x04358394, public: 0x043587cf }, // tprv / tpub
    p2sh_p2wpkh: { private: 0x044a4e28, public: 0x044a5262 }, // uprv / upub
    bech32: { private: 0x045f18bc, public: 0x045f1cf6 }, // vprv / vpub
  },
};

const PROFILES: readonly NetworkProfile[] = [MAINNET, TESTNET];

export const EXTENDED_KEY_FORMATS: readonly ExtendedKeyFormat[] = ['p2pkh', 'p2sh_p2wpkh', 'bech32'];

export function getNetworkProfile(type: NetworkType): NetworkProfile {
  return type === 'mainnet' ? MAINNET : TESTNET;
}

export function findNetworkByBech32Prefix(hrp: string): NetworkProfile | undefined {
  return PROFILES.find((profile) => profile.bech32 === hrp);
}

/**
 * Resolve a Base58 address version byte to its network and address format
 */
export function findNetworkByAddressVersion(
  version: number,
): { profile: NetworkProfile; format: AddressFormat } | undefined {
  for (const profile of PROFILES) {
    if (profile.pubKeyHash === version) return { profile, format: 'p2pkh' };
    if (profile.scriptHash === version) return { profile, format: 'p2sh_p2wpkh' };
  }
  return undefined;
}

export function findNetworkByWifPrefix(prefix: number): NetworkProfile | undefined {
  return PROFILES.find((profile) => profile.wif === prefix);
}

export interface ExtendedKeyVersionMatch {
  profile: NetworkProfile;
  format: ExtendedKeyFormat;
  kind: 'private' | 'public';
}

/**
 * Resolve the 4-byte version prefix of a serialized extended key
 */
export function findExtendedKeyVersion(version: number): ExtendedKeyVersionMatch | undefined {
  for (const profile of PROFILES) {
    for (const format of EXTENDED_KEY_FORMATS) {
      const versions = profile.extendedKeyVersions[format];
      if (versions.private === version) return { profile, format, kind: 'private' };
      if (versions.public === version) return { profile, format, kind: 'public' };
    }
  }
  return undefined;
}

export function isExtendedKeyFormat(format: AddressFormat): format is ExtendedKeyFormat {
  return format !== 'p2wsh';
}

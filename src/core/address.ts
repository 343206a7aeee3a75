/**
 * Address encoding and parsing
 *
 * Legacy formats (P2PKH, P2SH-P2WPKH) are Base58Check text over a version
 * byte and a 20-byte hash. Native segwit formats (P2WPKH, P2WSH) are BIP173
 * bech32 text over a witness program.
 */

import { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';

import type { AddressFormat } from '../interfaces/address.interface.ts';
import type { NetworkProfile } from '../interfaces/network.interface.ts';
import {
  findNetworkByAddressVersion,
  findNetworkByBech32Prefix,
} from '../config/networks.ts';
import { decodeBase58, encodeBase58Check, splitChecksum } from '../encoders/base58check.ts';
import { AddressError, NetworkMismatchError } from '../errors/index.ts';
import { hash160, sha256 } from '../utils/crypto.ts';
import type { PrivateKey } from './private-key.ts';
import type { PublicKey } from './public-key.ts';
import { ScriptBuilder } from './script-builder.ts';
import { WitnessProgram } from './witness-program.ts';

export const MIN_ADDRESS_LENGTH = 14;
export const MAX_ADDRESS_LENGTH = 74;

/** version byte ∥ 20-byte hash ∥ 4-byte checksum */
const BASE58_ADDRESS_LENGTH = 25;

export class Address {
  /**
   * @param text - Encoded address
   * @param hash - Key or script hash (legacy formats), witness program (segwit formats)
   */
  private constructor(
    private readonly text: string,
    public readonly format: AddressFormat,
    public readonly network: NetworkProfile,
    private readonly hash: Buffer,
    private readonly witnessVersion?: number,
  ) {}

  static fromPublicKey(publicKey: PublicKey, format: AddressFormat, network: NetworkProfile): Address {
    switch (format) {
      case 'p2pkh':
        return Address.fromHash(publicKey.hash160(), 'p2pkh', network);
      case 'p2sh_p2wpkh': {
        const redeemScript = new ScriptBuilder(network).createP2shP2wpkhRedeemScript(
          publicKey.toCompressedBuffer(),
        );
        return Address.fromHash(hash160(redeemScript), 'p2sh_p2wpkh', network);
      }
      case 'bech32':
        return Address.fromWitnessProgram(
          WitnessProgram.fromParts(0, hash160(publicKey.toCompressedBuffer())),
          network,
        );
      case 'p2wsh':
        throw new AddressError(
          'IncompatibleFormats',
          'A P2WSH address commits to a script, not a public key',
          { expected: 'p2pkh, p2sh_p2wpkh or bech32', found: format },
        );
    }
  }

  static fromPrivateKey(privateKey: PrivateKey, format: AddressFormat): Address {
    return Address.fromPublicKey(privateKey.toPublicKey(), format, privateKey.network);
  }

  /**
   * Native segwit address committing to SHA256 of a witness script
   */
  static p2wsh(script: Buffer, network: NetworkProfile): Address {
    return Address.fromWitnessProgram(WitnessProgram.fromParts(0, sha256(script)), network);
  }

  static fromWitnessProgram(program: WitnessProgram, network: NetworkProfile): Address {
    const text = bitcoin.address.toBech32(program.program, program.version, network.bech32);
    return new Address(text, Address.segwitFormat(program), network, program.program, program.version);
  }

  private static fromHash(hash: Buffer, format: 'p2pkh' | 'p2sh_p2wpkh', network: NetworkProfile): Address {
    const version = format === 'p2pkh' ? network.pubKeyHash : network.scriptHash;
    const text = encodeBase58Check(Buffer.concat([Buffer.from([version]), hash]));
    return new Address(text, format, network, hash);
  }

  private static segwitFormat(program: WitnessProgram): AddressFormat {
    return program.version === 0 && program.program.length === 32 ? 'p2wsh' : 'bech32';
  }

  /**
   * Parse address text. When `network` is given, the address must belong to it.
   */
  static parse(text: string, network?: NetworkProfile): Address {
    if (text.length < MIN_ADDRESS_LENGTH || text.length > MAX_ADDRESS_LENGTH) {
      throw new AddressError('InvalidCharacterLength', `Invalid address length ${text.length}`, {
        expected: `${MIN_ADDRESS_LENGTH}..${MAX_ADDRESS_LENGTH}`,
        found: String(text.length),
      });
    }

    const prefix = text.slice(0, 2).toLowerCase();
    const address = findNetworkByBech32Prefix(prefix)
      ? Address.parseBech32(text)
      : Address.parseBase58(text);

    if (network && network.type !== address.network.type) {
      throw new NetworkMismatchError(network.type, address.network.type);
    }
    return address;
  }

  private static parseBech32(text: string): Address {
    let decoded: bitcoin.address.Bech32Result;
    try {
      decoded = bitcoin.address.fromBech32(text);
    } catch (error) {
      throw new AddressError('InvalidAddress', `Invalid bech32 address: "${text}"`, { cause: error });
    }

    const profile = findNetworkByBech32Prefix(decoded.prefix);
    if (!profile) {
      throw new AddressError('InvalidPrefix', `Unknown bech32 prefix "${decoded.prefix}"`, {
        found: decoded.prefix,
      });
    }

    const program = WitnessProgram.fromParts(decoded.version, decoded.data);
    return new Address(text.toLowerCase(), Address.segwitFormat(program), profile, program.program, program.version);
  }

  private static parseBase58(text: string): Address {
    const data = decodeBase58(text);
    if (!data) {
      throw new AddressError('InvalidEncoding', `Invalid base58 address: "${text}"`);
    }
    if (data.length !== BASE58_ADDRESS_LENGTH) {
      throw new AddressError('InvalidByteLength', `Invalid address byte length ${data.length}`, {
        expected: String(BASE58_ADDRESS_LENGTH),
        found: String(data.length),
      });
    }

    const { payload, found, expected, valid } = splitChecksum(data);
    if (!valid) {
      throw new AddressError('InvalidChecksum', 'Invalid address checksum', {
        expected: expected.toString('hex'),
        found: found.toString('hex'),
      });
    }

    const match = findNetworkByAddressVersion(payload[0]);
    if (!match) {
      throw new AddressError('InvalidPrefix', `Unknown address version byte 0x${payload[0].toString(16)}`, {
        found: payload[0].toString(16),
      });
    }
    return new Address(text, match.format, match.profile, Buffer.from(payload.subarray(1)));
  }

  /**
   * 20-byte key/script hash of a legacy address, or the witness program
   */
  toHash(): Buffer {
    return Buffer.from(this.hash);
  }

  toWitnessProgram(): WitnessProgram {
    if (this.witnessVersion === undefined) {
      throw new AddressError('IncompatibleFormats', `A ${this.format} address has no witness program`, {
        expected: 'bech32 or p2wsh',
        found: this.format,
      });
    }
    return WitnessProgram.fromParts(this.witnessVersion, this.hash);
  }

  toScriptPubKey(): Buffer {
    return new ScriptBuilder(this.network).createScriptPubKey(this);
  }

  equals(other: Address): boolean {
    return this.text === other.text && this.format === other.format && this.network.type === other.network.type;
  }

  toString(): string {
    return this.text;
  }
}

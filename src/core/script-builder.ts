/**
 * Bitcoin Script Builder
 * Utilities for creating the output, redeem and script-code scripts of the
 * supported address formats
 */

import { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';

import type { NetworkProfile } from '../interfaces/network.interface.ts';
import { MAINNET } from '../config/networks.ts';
import { TransactionError } from '../errors/index.ts';
import { hash160 } from '../utils/crypto.ts';
import { type Logger, SILENT_LOGGER } from '../utils/logger.ts';
import type { Address } from './address.ts';

export type ScriptType = 'p2pkh' | 'p2sh' | 'p2wpkh' | 'p2wsh' | 'p2ms' | 'op_return' | 'unknown';

export class ScriptBuilder {
  private network: NetworkProfile;
  private logger: Logger;

  constructor(network: NetworkProfile = MAINNET, logger: Logger = SILENT_LOGGER) {
    this.network = network;
    this.logger = logger;
  }

  /**
   * Create the scriptPubKey that locks funds to an address
   */
  createScriptPubKey(address: Address): Buffer {
    switch (address.format) {
      case 'p2pkh':
        return this.createP2PKH(address.toHash());
      case 'p2sh_p2wpkh':
        return this.createP2SH(address.toHash());
      case 'bech32':
      case 'p2wsh':
        return address.toWitnessProgram().toScriptPubKey();
    }
  }

  /**
   * OP_DUP OP_HASH160 <hash> OP_EQUALVERIFY OP_CHECKSIG
   */
  createP2PKH(publicKeyHash: Buffer): Buffer {
    return bitcoin.script.compile([
      bitcoin.opcodes.OP_DUP,
      bitcoin.opcodes.OP_HASH160,
      publicKeyHash,
      bitcoin.opcodes.OP_EQUALVERIFY,
      bitcoin.opcodes.OP_CHECKSIG,
    ]);
  }

  /**
   * OP_HASH160 <hash> OP_EQUAL
   */
  createP2SH(scriptHash: Buffer): Buffer {
    return bitcoin.script.compile([
      bitcoin.opcodes.OP_HASH160,
      scriptHash,
      bitcoin.opcodes.OP_EQUAL,
    ]);
  }

  /**
   * Redeem script of a P2SH-wrapped P2WPKH output: `0x00 0x14 ∥ hash160(pubkey)`
   */
  createP2shP2wpkhRedeemScript(compressedPublicKey: Buffer): Buffer {
    return Buffer.concat([Buffer.from([bitcoin.opcodes.OP_0, 0x14]), hash160(compressedPublicKey)]);
  }

  /**
   * BIP143 scriptCode for a P2WPKH spend: the P2PKH script of the key hash,
   * prefixed with its length (0x19)
   */
  createP2wpkhScriptCode(publicKeyHash: Buffer): Buffer {
    const script = this.createP2PKH(publicKeyHash);
    return Buffer.concat([Buffer.from([script.length]), script]);
  }

  /**
   * Create multisig script
   */
  createMultisig(m: number, pubkeys: Buffer[]): Buffer {
    let output: Buffer | undefined;
    try {
      output = bitcoin.payments.p2ms({ m, pubkeys, network: this.network.network }).output;
    } catch (error) {
      throw new TransactionError('InvalidInputs', `Invalid ${m}-of-${pubkeys.length} multisig script`, { cause: error });
    }
    if (!output) {
      throw new TransactionError('InvalidInputs', `Invalid ${m}-of-${pubkeys.length} multisig script`);
    }
    return output;
  }

  /**
   * Parse script to identify type
   */
  identifyScript(script: Buffer): ScriptType {
    const network = this.network.network;
    const candidates: Array<[ScriptType, () => boolean]> = [
      ['p2pkh', () => bitcoin.payments.p2pkh({ output: script, network }).address !== undefined],
      ['p2wpkh', () => bitcoin.payments.p2wpkh({ output: script, network }).address !== undefined],
      ['p2sh', () => bitcoin.payments.p2sh({ output: script, network }).address !== undefined],
      ['p2wsh', () => bitcoin.payments.p2wsh({ output: script, network }).address !== undefined],
      ['p2ms', () => bitcoin.payments.p2ms({ output: script, network }).m !== undefined],
    ];

    for (const [type, matches] of candidates) {
      try {
        if (matches()) return type;
      } catch (error) {
        // payments throw on a template mismatch; try the next one
        this.logger.debug?.('Script is not ' + type, { error: String(error) });
      }
    }

    const decompiled = bitcoin.script.decompile(script);
    if (decompiled && decompiled[0] === bitcoin.opcodes.OP_RETURN) {
      return 'op_return';
    }

    return 'unknown';
  }
}

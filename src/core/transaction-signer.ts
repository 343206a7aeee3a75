/**
 * Transaction Signer
 *
 * Signs the inputs of a transaction that a private key can spend and
 * assembles their scriptSig and witness. Inputs that are already signed, or
 * that belong to another key, are passed through unchanged, so several
 * signers can be applied one after another.
 */

import { Buffer } from 'node:buffer';

import * as bitcoin from 'bitcoinjs-lib';

import type { RandomSource } from '../interfaces/key.interface.ts';
import type { SignOptions } from '../interfaces/transaction.interface.ts';
import { TransactionError } from '../errors/index.ts';
import { hash160 } from '../utils/crypto.ts';
import { type Logger, SILENT_LOGGER } from '../utils/logger.ts';
import { isBuffer } from '../utils/type-guards.ts';
import { Address } from './address.ts';
import { ExtendedPrivateKey } from './extended-private-key.ts';
import type { PrivateKey } from './private-key.ts';
import { ScriptBuilder } from './script-builder.ts';
import { legacySighash, witnessV0Sighash } from './sighash.ts';
import type { Transaction, TransactionInput } from './transaction.ts';
import { writeVarSlice } from './transaction-codec.ts';

export class TransactionSigner {
  private readonly logger: Logger;
  private readonly random?: RandomSource;

  constructor(options: SignOptions = {}) {
    this.logger = options.logger ?? SILENT_LOGGER;
    this.random = options.random;
  }

  /**
   * Returns a new transaction; `transaction` is left as it was
   */
  sign(transaction: Transaction, key: PrivateKey | ExtendedPrivateKey): Transaction {
    const privateKey = key instanceof ExtendedPrivateKey ? key.toPrivateKey() : key;
    let producedWitness = false;

    const inputs = transaction.inputs.map((input, inputIndex) => {
      const address = input.outpoint.address;
      if (!address) {
        this.logger.debug?.('Skipping input without an address', { inputIndex });
        return input;
      }
      if (input.isSigned) {
        this.logger.debug?.('Skipping signed input', { inputIndex });
        return input;
      }
      if (!this.controls(privateKey, input, address, inputIndex)) {
        this.logger.debug?.('Skipping input of another key', { inputIndex, address: address.toString() });
        return input;
      }

      const signed = this.signInput(transaction, inputIndex, input, address, privateKey);
      producedWitness = producedWitness || signed.witness.length > 0;
      this.logger.debug?.('Signed input', { inputIndex, format: address.format });
      return signed;
    });

    return transaction.withInputs(inputs, transaction.segwitFlag || producedWitness);
  }

  /**
   * Whether the key can spend the input's address. A P2WSH address is
   * recomputed from the witness script, which must contain the key.
   */
  private controls(privateKey: PrivateKey, input: TransactionInput, address: Address, inputIndex: number): boolean {
    const publicKey = privateKey.toPublicKey();
    if (address.format !== 'p2wsh') {
      return Address.fromPublicKey(publicKey, address.format, address.network).equals(address);
    }

    const witnessScript = this.requireRedeemScript(input, inputIndex);
    if (!Address.p2wsh(witnessScript, address.network).equals(address)) {
      return false;
    }
    const chunks = bitcoin.script.decompile(witnessScript) ?? [];
    const compressed = publicKey.toCompressedBuffer();
    return chunks.some((chunk) => isBuffer(chunk) && chunk.equals(compressed));
  }

  private signInput(
    transaction: Transaction,
    inputIndex: number,
    input: TransactionInput,
    address: Address,
    privateKey: PrivateKey,
  ): TransactionInput {
    const publicKey = privateKey.toPublicKey();
    const scripts = new ScriptBuilder(address.network, this.logger);

    switch (address.format) {
      case 'p2pkh': {
        const scriptPubKey = input.outpoint.scriptPubKey;
        if (!scriptPubKey) {
          throw new TransactionError('MissingOutpointScriptPublicKey', 'P2PKH input has no scriptPubKey', {
            inputIndex,
          });
        }
        const digest = legacySighash(transaction, inputIndex, scriptPubKey, input.sighashType);
        const signature = this.signDigest(privateKey, digest, input);
        return input.with({
          scriptSig: bitcoin.script.compile([signature, publicKey.toBuffer()]),
          isSigned: true,
        });
      }
      case 'p2sh_p2wpkh':
      case 'bech32': {
        const compressed = publicKey.toCompressedBuffer();
        const scriptCode = scripts.createP2wpkhScriptCode(hash160(compressed));
        const signature = this.signSegwit(transaction, inputIndex, input, scriptCode, privateKey);
        const scriptSig = address.format === 'p2sh_p2wpkh'
          ? bitcoin.script.compile([this.requireRedeemScript(input, inputIndex)])
          : Buffer.alloc(0);
        return input.with({ scriptSig, witness: [signature, compressed], isSigned: true });
      }
      case 'p2wsh': {
        const witnessScript = this.requireRedeemScript(input, inputIndex);
        const signature = this.signSegwit(transaction, inputIndex, input, writeVarSlice(witnessScript), privateKey);
        const witness = [
          ...(input.witnessScriptData ?? []),
          ...this.orderSignatures(signature, input, inputIndex),
          witnessScript,
        ];
        return input.with({ witness, isSigned: true });
      }
    }
  }

  private signSegwit(
    transaction: Transaction,
    inputIndex: number,
    input: TransactionInput,
    scriptCode: Buffer,
    privateKey: PrivateKey,
  ): Buffer {
    const amount = input.outpoint.amount;
    if (!amount) {
      throw new TransactionError('MissingOutpointAmount', 'Segwit inputs commit to the spent amount', {
        inputIndex,
      });
    }
    const digest = witnessV0Sighash(transaction, inputIndex, scriptCode, amount, input.sighashType);
    return this.signDigest(privateKey, digest, input);
  }

  /** DER signature followed by the sighash type byte */
  private signDigest(privateKey: PrivateKey, digest: Buffer, input: TransactionInput): Buffer {
    return bitcoin.script.signature.encode(privateKey.sign(digest, this.random), input.sighashType);
  }

  /**
   * This signer's signature, with the companion signature of a multisig
   * placed before or after it as the caller specified
   */
  private orderSignatures(signature: Buffer, input: TransactionInput, inputIndex: number): Buffer[] {
    const companion = input.additionalWitness;
    if (!companion) return [signature];
    if (companion.signature.length === 0) {
      throw new TransactionError('InvalidInputs', 'Companion signature is empty', { inputIndex });
    }
    return companion.isFirst ? [companion.signature, signature] : [signature, companion.signature];
  }

  private requireRedeemScript(input: TransactionInput, inputIndex: number): Buffer {
    const script = input.outpoint.redeemScript;
    if (!script) {
      throw new TransactionError('InvalidInputs', 'Input needs a redeem or witness script', { inputIndex });
    }
    return script;
  }
}

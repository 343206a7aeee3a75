/**
 * Raw Bitcoin transactions
 *
 * Values are immutable: signing and every other change produce a new
 * Transaction. Serialization follows the legacy layout, with the BIP144
 * marker, flag and witness section added when the segwit flag is set.
 */

import { Buffer } from 'node:buffer';

import {
  type AdditionalWitness,
  type OutpointOptions,
  SIGHASH,
  type SighashType,
  type SignOptions,
  type TransactionId,
  type TransactionInputOptions,
  type TransactionParameters,
} from '../interfaces/transaction.interface.ts';
import { AmountError, TransactionError } from '../errors/index.ts';
import { hash160, hash256, sha256 } from '../utils/crypto.ts';
import { isHex, isUint32 } from '../utils/type-guards.ts';
import type { Address } from './address.ts';
import { Amount } from './amount.ts';
import type { ExtendedPrivateKey } from './extended-private-key.ts';
import type { PrivateKey } from './private-key.ts';
import type { PublicKey } from './public-key.ts';
import { ScriptBuilder } from './script-builder.ts';
import { toSighashType } from './sighash.ts';
import {
  ByteReader,
  readVector,
  readWitnessVector,
  writeUInt32LE,
  writeUInt64LE,
  writeVarSlice,
  writeVector,
  writeWitnessVector,
} from './transaction-codec.ts';
import { TransactionSigner } from './transaction-signer.ts';

export const DEFAULT_SEQUENCE = 0xffffffff;
export const DEFAULT_VERSION = 2;

const TXID_LENGTH = 32;

/**
 * Reference to a previous output, with what is known about it
 */
export class Outpoint {
  public readonly reverseTxid: Buffer;
  public readonly index: number;
  public readonly amount?: Amount;
  public readonly address?: Address;
  public readonly scriptPubKey?: Buffer;
  public readonly redeemScript?: Buffer;

  constructor(options: OutpointOptions) {
    this.reverseTxid = Outpoint.resolveTxid(options);
    if (!isUint32(options.index)) {
      throw new TransactionError('InvalidOutpointIndex', `Invalid outpoint index ${options.index}`, {
        found: String(options.index),
      });
    }
    this.index = options.index;
    this.amount = options.amount;
    this.address = options.address;
    this.redeemScript = options.redeemScript;
    this.scriptPubKey = options.scriptPubKey ?? options.address?.toScriptPubKey();

    if (this.address) {
      Outpoint.validateScripts(this.address, this.scriptPubKey, this.redeemScript);
    }
  }

  /**
   * Outpoint spendable by `publicKey`; the P2SH-P2WPKH redeem script is derived
   */
  static fromPublicKey(
    publicKey: PublicKey,
    options: Omit<OutpointOptions, 'redeemScript'> & { address: Address },
  ): Outpoint {
    const redeemScript = options.address.format === 'p2sh_p2wpkh'
      ? new ScriptBuilder(options.address.network).createP2shP2wpkhRedeemScript(publicKey.toCompressedBuffer())
      : undefined;
    return new Outpoint({ ...options, redeemScript });
  }

  static read(reader: ByteReader): Outpoint {
    const reverseTxid = reader.readBytes(TXID_LENGTH);
    return new Outpoint({ reverseTxid, index: reader.readUInt32LE() });
  }

  private static resolveTxid(options: OutpointOptions): Buffer {
    if (options.txid !== undefined && options.reverseTxid === undefined) {
      if (!isHex(options.txid) || options.txid.length !== TXID_LENGTH * 2) {
        throw new TransactionError('InvalidTransactionId', `Invalid transaction id "${options.txid}"`, {
          expected: `${TXID_LENGTH * 2} hex characters`,
          found: options.txid,
        });
      }
      return Buffer.from(options.txid, 'hex').reverse();
    }
    if (options.reverseTxid !== undefined && options.txid === undefined) {
      if (options.reverseTxid.length !== TXID_LENGTH) {
        throw new TransactionError('InvalidTransactionId', `Invalid transaction id length ${options.reverseTxid.length}`, {
          expected: String(TXID_LENGTH),
          found: String(options.reverseTxid.length),
        });
      }
      return Buffer.from(options.reverseTxid);
    }
    throw new TransactionError('InvalidTransactionId', 'Exactly one of txid and reverseTxid must be given');
  }

  private static validateScripts(address: Address, scriptPubKey?: Buffer, redeemScript?: Buffer): void {
    const expected = address.toScriptPubKey();
    if (!scriptPubKey || !scriptPubKey.equals(expected)) {
      throw new TransactionError('InvalidScriptPubKey', `scriptPubKey does not pay to ${address.toString()}`, {
        expected: expected.toString('hex'),
        found: scriptPubKey?.toString('hex'),
      });
    }

    switch (address.format) {
      case 'p2pkh':
      case 'bech32':
        if (redeemScript) {
          throw new TransactionError('InvalidInputs', `${address.format} outpoints take no redeem script`);
        }
        return;
      case 'p2sh_p2wpkh':
        if (!redeemScript) {
          throw new TransactionError('InvalidInputs', 'P2SH-P2WPKH outpoints need a redeem script');
        }
        if (!hash160(redeemScript).equals(address.toHash())) {
          throw new TransactionError('InvalidInputs', `Redeem script does not hash to ${address.toString()}`, {
            expected: address.toHash().toString('hex'),
            found: hash160(redeemScript).toString('hex'),
          });
        }
        return;
      case 'p2wsh':
        if (!redeemScript) {
          throw new TransactionError('InvalidInputs', 'P2WSH outpoints need a witness script');
        }
        if (!sha256(redeemScript).equals(address.toHash())) {
          throw new TransactionError('InvalidInputs', `Witness script does not hash to ${address.toString()}`, {
            expected: address.toHash().toString('hex'),
            found: sha256(redeemScript).toString('hex'),
          });
        }
        return;
    }
  }

  /** Display form of the previous transaction id */
  get txid(): string {
    return Buffer.from(this.reverseTxid).reverse().toString('hex');
  }

  serialize(): Buffer {
    return Buffer.concat([this.reverseTxid, writeUInt32LE(this.index)]);
  }
}

export class TransactionInput {
  public readonly outpoint: Outpoint;
  public readonly scriptSig: Buffer;
  public readonly sequence: number;
  public readonly sighashType: SighashType;
  public readonly witness: readonly Buffer[];
  public readonly isSigned: boolean;
  public readonly additionalWitness?: AdditionalWitness;
  public readonly witnessScriptData?: readonly Buffer[];

  constructor(outpoint: Outpoint, options: TransactionInputOptions = {}) {
    this.outpoint = outpoint;
    this.scriptSig = options.scriptSig ?? Buffer.alloc(0);
    this.sequence = options.sequence ?? DEFAULT_SEQUENCE;
    this.sighashType = options.sighashType ?? SIGHASH.ALL;
    this.witness = options.witness ?? [];
    this.isSigned = options.isSigned ?? (this.scriptSig.length > 0 || this.witness.length > 0);
    this.additionalWitness = options.additionalWitness;
    this.witnessScriptData = options.witnessScriptData;

    if (!isUint32(this.sequence)) {
      throw new TransactionError('InvalidInputs', `Invalid sequence ${this.sequence}`);
    }
  }

  static read(reader: ByteReader): TransactionInput {
    const outpoint = Outpoint.read(reader);
    const scriptSig = reader.readVarSlice();
    return new TransactionInput(outpoint, { scriptSig, sequence: reader.readUInt32LE() });
  }

  /**
   * Copy with some fields replaced
   */
  with(changes: TransactionInputOptions): TransactionInput {
    return new TransactionInput(this.outpoint, {
      scriptSig: this.scriptSig,
      sequence: this.sequence,
      sighashType: this.sighashType,
      witness: [...this.witness],
      isSigned: this.isSigned,
      additionalWitness: this.additionalWitness,
      witnessScriptData: this.witnessScriptData ? [...this.witnessScriptData] : undefined,
      ...changes,
    });
  }

  /**
   * The script written for this input: the scriptSig once present, otherwise
   * the placeholder of the spent address's format
   */
  scriptForSerialization(): Buffer {
    const address = this.outpoint.address;
    if (this.scriptSig.length > 0 || this.isSigned || !address) {
      return this.scriptSig;
    }
    switch (address.format) {
      case 'bech32':
      case 'p2wsh':
        return Buffer.alloc(0);
      case 'p2pkh':
      case 'p2sh_p2wpkh':
        if (!this.outpoint.scriptPubKey) {
          throw new TransactionError('MissingOutpointScriptPublicKey', 'Unsigned input has no scriptPubKey to serialize');
        }
        return this.outpoint.scriptPubKey;
    }
  }

  serialize(): Buffer {
    return Buffer.concat([
      this.outpoint.serialize(),
      writeVarSlice(this.scriptForSerialization()),
      writeUInt32LE(this.sequence),
    ]);
  }
}

export class TransactionOutput {
  constructor(
    public readonly amount: Amount,
    public readonly scriptPubKey: Buffer,
  ) {
    if (amount.satoshis < 0) {
      throw new AmountError('InvalidAmount', `Output amount cannot be negative, got ${amount.satoshis}`);
    }
  }

  static toAddress(address: Address, amount: Amount): TransactionOutput {
    return new TransactionOutput(amount, address.toScriptPubKey());
  }

  static read(reader: ByteReader): TransactionOutput {
    const satoshis = reader.readUInt64LE();
    let amount: Amount;
    try {
      amount = Amount.fromSatoshi(satoshis);
    } catch (error) {
      throw new TransactionError('InvalidAmount', `Output amount ${satoshis} is out of range`, {
        found: String(satoshis),
        cause: error,
      });
    }
    return new TransactionOutput(amount, reader.readVarSlice());
  }

  serialize(): Buffer {
    return Buffer.concat([writeUInt64LE(this.amount.satoshis), writeVarSlice(this.scriptPubKey)]);
  }
}

export class Transaction {
  public readonly version: number;
  public readonly inputs: readonly TransactionInput[];
  public readonly outputs: readonly TransactionOutput[];
  public readonly lockTime: number;
  public readonly segwitFlag: boolean;

  constructor(
    inputs: readonly TransactionInput[],
    outputs: readonly TransactionOutput[],
    parameters: TransactionParameters = {},
  ) {
    this.version = parameters.version ?? DEFAULT_VERSION;
    this.lockTime = parameters.lockTime ?? 0;
    this.inputs = [...inputs];
    this.outputs = [...outputs];
    this.segwitFlag = parameters.segwitFlag ?? this.inputs.some((input) => input.witness.length > 0);

    if (!isUint32(this.version) || !isUint32(this.lockTime)) {
      throw new TransactionError('InvalidInputs', 'Version and lock time must be 32-bit unsigned integers');
    }
  }

  static create(
    parameters: TransactionParameters & {
      inputs: readonly TransactionInput[];
      outputs: readonly TransactionOutput[];
    },
  ): Transaction {
    const { inputs, outputs, ...rest } = parameters;
    return new Transaction(inputs, outputs, rest);
  }

  static fromHex(hex: string): Transaction {
    if (!isHex(hex)) {
      throw new TransactionError('InvalidEncoding', 'Transaction hex has an odd length or non-hex characters');
    }
    return Transaction.deserialize(Buffer.from(hex, 'hex'));
  }

  static deserialize(bytes: Buffer): Transaction {
    const reader = new ByteReader(bytes);
    const version = reader.readUInt32LE();

    let segwitFlag = false;
    let inputs = readVector(reader, TransactionInput.read);
    if (inputs.length === 0) {
      // the zero count was the segwit marker
      const flag = reader.readUInt8();
      if (flag !== 0x01) {
        throw new TransactionError('InvalidSegwitFlag', `Invalid segwit flag ${flag}`, {
          expected: '1',
          found: String(flag),
        });
      }
      segwitFlag = true;
      inputs = readVector(reader, TransactionInput.read);
    }

    const outputs = readVector(reader, TransactionOutput.read);

    if (segwitFlag) {
      inputs = inputs.map((input) => {
        const { count, items } = readWitnessVector(reader);
        if (count === 0) return input;
        const first = items[0];
        const sighashType = first.length > 0 ? toSighashType(first[first.length - 1]) : input.sighashType;
        return input.with({ witness: items, sighashType, isSigned: true });
      });
    }

    const lockTime = reader.readUInt32LE();
    reader.assertFinished();

    return new Transaction(inputs, outputs, { version, lockTime, segwitFlag });
  }

  /**
   * @param includeWitness - false gives the txid serialization
   */
  serialize(includeWitness = true): Buffer {
    const withWitness = includeWitness && this.segwitFlag;
    return Buffer.concat([
      writeUInt32LE(this.version),
      withWitness ? Buffer.from([0x00, 0x01]) : Buffer.alloc(0),
      writeVector(this.inputs.map((input) => input.serialize())),
      writeVector(this.outputs.map((output) => output.serialize())),
      ...(withWitness ? this.inputs.map((input) => writeWitnessVector(input.witness)) : []),
      writeUInt32LE(this.lockTime),
    ]);
  }

  toHex(): string {
    return this.serialize().toString('hex');
  }

  txid(): string {
    return hash256(this.serialize(false)).reverse().toString('hex');
  }

  wtxid(): string {
    return hash256(this.serialize(true)).reverse().toString('hex');
  }

  id(): TransactionId {
    return { txid: this.txid(), wtxid: this.wtxid() };
  }

  /**
   * Same transaction with its inputs replaced
   */
  withInputs(inputs: readonly TransactionInput[], segwitFlag = this.segwitFlag): Transaction {
    return new Transaction(inputs, this.outputs, {
      version: this.version,
      lockTime: this.lockTime,
      segwitFlag,
    });
  }

  /**
   * Sign every unsigned input the key can spend. Returns a new transaction.
   */
  sign(key: PrivateKey | ExtendedPrivateKey, options: SignOptions = {}): Transaction {
    return new TransactionSigner(options).sign(this, key);
  }
}

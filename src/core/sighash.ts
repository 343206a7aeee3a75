/**
 * Signature hash preimages
 *
 * `legacySighash` is the original whole-transaction algorithm used by P2PKH
 * inputs. `witnessV0Sighash` is the BIP143 algorithm used by every segwit v0
 * input, wrapped or native.
 */

import { Buffer } from 'node:buffer';

import { SIGHASH, SIGHASH_TYPES, type SighashType } from '../interfaces/transaction.interface.ts';
import { TransactionError } from '../errors/index.ts';
import { hash256 } from '../utils/crypto.ts';
import type { Amount } from './amount.ts';
import type { Transaction } from './transaction.ts';
import {
  writeUInt32LE,
  writeUInt64LE,
  writeVarSlice,
  writeVector,
} from './transaction-codec.ts';

const BASE_TYPE_MASK = 0x1f;
const ZERO_HASH = Buffer.alloc(32);

/**
 * Digest signed when SIGHASH_SINGLE has no matching output: the number one
 * as a little-endian 256-bit value
 */
export const SIGHASH_SINGLE_BUG_DIGEST = Buffer.concat([Buffer.from([0x01]), Buffer.alloc(31)]);

/** Value and script of a blanked output in a SIGHASH_SINGLE preimage */
const BLANK_OUTPUT = Buffer.concat([Buffer.alloc(8, 0xff), writeVarSlice(Buffer.alloc(0))]);

/**
 * Map a trailing signature byte to a sighash type. Unknown values sign as ALL.
 */
export function toSighashType(value: number): SighashType {
  return SIGHASH_TYPES.find((type) => type === value) ?? SIGHASH.ALL;
}

export function isSighashType(value: unknown): value is SighashType {
  return SIGHASH_TYPES.some((type) => type === value);
}

function baseType(sighashType: SighashType): number {
  return sighashType & BASE_TYPE_MASK;
}

function anyoneCanPay(sighashType: SighashType): boolean {
  return (sighashType & SIGHASH.ANYONECANPAY) !== 0;
}

function checkInputIndex(transaction: Transaction, inputIndex: number): void {
  if (!Number.isInteger(inputIndex) || inputIndex < 0 || inputIndex >= transaction.inputs.length) {
    throw new TransactionError('InvalidInputs', `No input at index ${inputIndex}`, { inputIndex });
  }
}

/**
 * @param scriptCode - scriptPubKey of the spent output, without length prefix
 */
export function legacySighash(
  transaction: Transaction,
  inputIndex: number,
  scriptCode: Buffer,
  sighashType: SighashType,
): Buffer {
  checkInputIndex(transaction, inputIndex);
  const base = baseType(sighashType);

  if (base === SIGHASH.SINGLE && inputIndex >= transaction.outputs.length) {
    return Buffer.from(SIGHASH_SINGLE_BUG_DIGEST);
  }

  const clearsOtherSequences = base === SIGHASH.NONE || base === SIGHASH.SINGLE;
  const inputs = transaction.inputs
    .map((input, index) =>
      Buffer.concat([
        input.outpoint.serialize(),
        writeVarSlice(index === inputIndex ? scriptCode : Buffer.alloc(0)),
        writeUInt32LE(index !== inputIndex && clearsOtherSequences ? 0 : input.sequence),
      ])
    )
    .filter((_, index) => !anyoneCanPay(sighashType) || index === inputIndex);

  let outputs: Buffer[];
  switch (base) {
    case SIGHASH.NONE:
      outputs = [];
      break;
    case SIGHASH.SINGLE:
      outputs = transaction.outputs
        .slice(0, inputIndex + 1)
        .map((output, index) => (index === inputIndex ? output.serialize() : BLANK_OUTPUT));
      break;
    default:
      outputs = transaction.outputs.map((output) => output.serialize());
  }

  const preimage = Buffer.concat([
    writeUInt32LE(transaction.version),
    writeVector(inputs),
    writeVector(outputs),
    writeUInt32LE(transaction.lockTime),
    writeUInt32LE(sighashType),
  ]);
  return hash256(preimage);
}

/**
 * BIP143 digest
 *
 * @param scriptCode - serialized scriptCode, including its length prefix
 */
export function witnessV0Sighash(
  transaction: Transaction,
  inputIndex: number,
  scriptCode: Buffer,
  amount: Amount,
  sighashType: SighashType,
): Buffer {
  checkInputIndex(transaction, inputIndex);
  const base = baseType(sighashType);
  const input = transaction.inputs[inputIndex];

  const hashPrevouts = anyoneCanPay(sighashType)
    ? ZERO_HASH
    : hash256(Buffer.concat(transaction.inputs.map((entry) => entry.outpoint.serialize())));

  const hashSequence = anyoneCanPay(sighashType) || base === SIGHASH.SINGLE || base === SIGHASH.NONE
    ? ZERO_HASH
    : hash256(Buffer.concat(transaction.inputs.map((entry) => writeUInt32LE(entry.sequence))));

  let hashOutputs: Buffer = ZERO_HASH;
  if (base !== SIGHASH.SINGLE && base !== SIGHASH.NONE) {
    hashOutputs = hash256(Buffer.concat(transaction.outputs.map((output) => output.serialize())));
  } else if (base === SIGHASH.SINGLE && inputIndex < transaction.outputs.length) {
    hashOutputs = hash256(transaction.outputs[inputIndex].serialize());
  }

  const preimage = Buffer.concat([
    writeUInt32LE(transaction.version),
    hashPrevouts,
    hashSequence,
    input.outpoint.serialize(),
    scriptCode,
    writeUInt64LE(amount.satoshis),
    writeUInt32LE(input.sequence),
    hashOutputs,
    writeUInt32LE(transaction.lockTime),
    writeUInt32LE(sighashType),
  ]);
  return hash256(preimage);
}

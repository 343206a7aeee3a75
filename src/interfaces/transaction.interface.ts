/**
 * Transaction Interfaces
 * Construction options for raw transactions and their inputs and outputs
 */

import type { Buffer } from 'node:buffer';

import type { Address } from '../core/address.ts';
import type { Amount } from '../core/amount.ts';
import type { Logger } from '../utils/logger.ts';
import type { RandomSource } from './key.interface.ts';

export const SIGHASH = {
  ALL: 0x01,
  NONE: 0x02,
  SINGLE: 0x03,
  ANYONECANPAY: 0x80,
} as const;

/**
 * Signature hash type byte: a base mode, optionally with ANYONECANPAY
 */
export type SighashType = 0x01 | 0x02 | 0x03 | 0x81 | 0x82 | 0x83;

export const SIGHASH_TYPES: readonly SighashType[] = [0x01, 0x02, 0x03, 0x81, 0x82, 0x83];

export interface OutpointOptions {
  /** Previous transaction id as displayed (big-endian hex) */
  txid?: string;
  /** Previous transaction id in wire (little-endian) byte order */
  reverseTxid?: Buffer;
  index: number;
  /** Value of the spent output; required to sign segwit inputs */
  amount?: Amount;
  /** Address of the spent output; inputs without one are never signed */
  address?: Address;
  /** Defaults to the address's scriptPubKey */
  scriptPubKey?: Buffer;
  /** P2SH redeem script or P2WSH witness script */
  redeemScript?: Buffer;
}

/**
 * A signature contributed by another signer of a P2WSH multisig input
 */
export interface AdditionalWitness {
  signature: Buffer;
  /** Whether `signature` precedes this signer's signature in the witness */
  isFirst: boolean;
}

export interface TransactionInputOptions {
  sequence?: number;
  sighashType?: SighashType;
  scriptSig?: Buffer;
  /** Witness stack items, without length prefixes */
  witness?: Buffer[];
  additionalWitness?: AdditionalWitness;
  /** Items placed before the signatures in a P2WSH witness */
  witnessScriptData?: Buffer[];
  isSigned?: boolean;
}

export interface TransactionParameters {
  version?: number;
  lockTime?: number;
  /** Defaults to whether any input carries witness data */
  segwitFlag?: boolean;
}

export interface SignOptions {
  /** Extra entropy for signature nonces */
  random?: RandomSource;
  logger?: Logger;
}

export interface TransactionId {
  txid: string;
  wtxid: string;
}

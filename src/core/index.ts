/**
 * @module Core
 * @description Wallet primitives: mnemonic phrases and seeds, the BIP32 key tree, addresses in every
 * supported format, and raw transactions with their signer.
 *
 * @example Receive address from a mnemonic
 * ```typescript
 * import { DerivationPath, Mnemonic } from 'bitcoin-wallet-primitives/core';
 *
 * const mnemonic = Mnemonic.fromPhrase(phrase);
 * const address = mnemonic
 *   .toExtendedPrivateKey()
 *   .derive(DerivationPath.bip84(0, 0, 0, 0))
 *   .toAddress();
 * ```
 *
 * @example Signing a transaction
 * ```typescript
 * import { Outpoint, Transaction, TransactionInput, TransactionOutput } from 'bitcoin-wallet-primitives/core';
 *
 * const outpoint = Outpoint.fromPublicKey(key.toPublicKey(), { txid, index: 0, amount, address });
 * const signed = Transaction.create({
 *   inputs: [new TransactionInput(outpoint)],
 *   outputs: [TransactionOutput.toAddress(recipient, Amount.fromSatoshi(90_000))],
 * }).sign(key);
 * ```
 */

export * from './address.ts';
export * from './amount.ts';
export * from './derivation-path.ts';
export * from './extended-key-codec.ts';
export * from './extended-private-key.ts';
export * from './extended-public-key.ts';
export * from './hd-wallet.ts';
export * from './mnemonic.ts';
export * from './private-key.ts';
export * from './public-key.ts';
export * from './script-builder.ts';
export * from './sighash.ts';
export * from './transaction.ts';
export * from './transaction-codec.ts';
export * from './transaction-signer.ts';
export * from './witness-program.ts';
export * from './wordlist.ts';

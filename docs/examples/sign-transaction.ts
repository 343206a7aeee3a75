/**
 * Transaction Signing Example
 *
 * Spends a P2WPKH output and a 2-of-2 P2WSH multisig output in one
 * transaction. The multisig input is signed in two rounds: the first signer
 * hands its signature to the second, which assembles the final witness.
 *
 * Keys and the funding txid are placeholders for illustration only.
 */

import { Buffer } from 'node:buffer';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import {
  Address,
  Amount,
  Outpoint,
  PrivateKey,
  ScriptBuilder,
  TESTNET,
  Transaction,
  TransactionInput,
  TransactionOutput,
} from '../../src/index.ts';

const FUNDING_TXID = '4a5e1e4baab89f3a32518a88c31bc87f618f76673e2cc77ab2127b7afdeda33b';

const alice = PrivateKey.fromBytes(Buffer.alloc(32, 0x11), TESTNET);
const bob = PrivateKey.fromBytes(Buffer.alloc(32, 0x22), TESTNET);

export function buildMultisigSpend(): { transaction: Transaction; witnessScript: Buffer } {
  const scripts = new ScriptBuilder(TESTNET);
  const witnessScript = scripts.createMultisig(2, [
    alice.toPublicKey().toCompressedBuffer(),
    bob.toPublicKey().toCompressedBuffer(),
  ]);

  const singleKey = new TransactionInput(
    new Outpoint({
      txid: FUNDING_TXID,
      index: 0,
      address: alice.toAddress('bech32'),
      amount: Amount.fromSatoshi(60_000),
    }),
  );

  // OP_CHECKMULTISIG pops one extra stack item, hence the empty first item
  const multisig = new TransactionInput(
    new Outpoint({
      txid: FUNDING_TXID,
      index: 1,
      address: Address.p2wsh(witnessScript, TESTNET),
      amount: Amount.fromSatoshi(40_000),
      redeemScript: witnessScript,
    }),
    { witnessScriptData: [Buffer.alloc(0)] },
  );

  const payment = TransactionOutput.toAddress(
    Address.parse('tb1qw508d6qejxtdg4y5r3zarvary0c5xw7kxpjzsx', TESTNET),
    Amount.fromSatoshi(99_000),
  );

  return { transaction: Transaction.create({ inputs: [singleKey, multisig], outputs: [payment] }), witnessScript };
}

export function signInTwoRounds(): Transaction {
  const { transaction } = buildMultisigSpend();

  // Round 1: bob signs on his own device and shares his multisig signature
  const bobSignature = transaction.sign(bob).inputs[1].witness[1];

  // Round 2: alice signs both inputs, placing bob's signature after hers
  const [singleKey, multisig] = transaction.inputs;
  const withCompanion = transaction.withInputs([
    singleKey,
    multisig.with({ additionalWitness: { signature: bobSignature, isFirst: false } }),
  ]);
  return withCompanion.sign(alice);
}

function main(): void {
  const signed = signInTwoRounds();
  console.log('txid ', signed.txid());
  console.log('wtxid', signed.wtxid());
  console.log(signed.toHex());
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main();
}

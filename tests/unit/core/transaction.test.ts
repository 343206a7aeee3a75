/**
 * Transaction Tests
 *
 * Construction, serialization and parsing of raw transactions. Identifiers
 * are cross-checked against bitcoinjs-lib.
 */

import { describe, expect, it } from 'vitest';
import { Buffer } from 'node:buffer';
import * as bitcoin from 'bitcoinjs-lib';

import { Address } from '../../../src/core/address';
import { Amount } from '../../../src/core/amount';
import { PublicKey } from '../../../src/core/public-key';
import {
  DEFAULT_SEQUENCE,
  DEFAULT_VERSION,
  Outpoint,
  Transaction,
  TransactionInput,
  TransactionOutput,
} from '../../../src/core/transaction';
import { SIGHASH } from '../../../src/interfaces/transaction.interface';
import { TransactionError } from '../../../src/errors';
import {
  FUNDING_TXID,
  G_CHECKSIG_SCRIPT_HEX,
  G_HASH160,
  G_P2PKH_ADDRESS,
  G_P2WPKH_ADDRESS,
  G_P2WSH_ADDRESS,
  G_PUBLIC_KEY_HEX,
  hex,
} from '../../fixtures/keys';

const REVERSED_FUNDING_TXID = `01${'aa'.repeat(31)}`;
const P2PKH_OUTPUT_HEX = `e80300000000000019` + `76a914${G_HASH160}88ac`;

function paymentOutput(): TransactionOutput {
  return TransactionOutput.toAddress(Address.parse(G_P2PKH_ADDRESS), Amount.fromSatoshi(1000));
}

function bareInput(index = 0, witness?: Buffer[]): TransactionInput {
  return new TransactionInput(new Outpoint({ txid: FUNDING_TXID, index }), { witness });
}

const LEGACY_HEX = '02000000' +
  '01' + REVERSED_FUNDING_TXID + '00000000' + '00' + 'ffffffff' +
  '01' + P2PKH_OUTPUT_HEX +
  '00000000';

describe('Outpoint', () => {
  it('should store the txid in wire order', () => {
    const outpoint = new Outpoint({ txid: FUNDING_TXID, index: 3 });
    expect(outpoint.reverseTxid.toString('hex')).toBe(REVERSED_FUNDING_TXID);
    expect(outpoint.txid).toBe(FUNDING_TXID);
    expect(outpoint.serialize().toString('hex')).toBe(`${REVERSED_FUNDING_TXID}03000000`);
  });

  it('should accept a wire-order txid', () => {
    const outpoint = new Outpoint({ reverseTxid: hex(REVERSED_FUNDING_TXID), index: 0 });
    expect(outpoint.txid).toBe(FUNDING_TXID);
  });

  it('should require exactly one well-formed txid', () => {
    expect(() => new Outpoint({ txid: 'abcd', index: 0 })).toThrow(
      expect.objectContaining({ code: 'InvalidTransactionId', found: 'abcd' }),
    );
    expect(() => new Outpoint({ reverseTxid: Buffer.alloc(31), index: 0 })).toThrow(
      expect.objectContaining({ code: 'InvalidTransactionId', found: '31' }),
    );
    expect(() => new Outpoint({ txid: FUNDING_TXID, reverseTxid: hex(REVERSED_FUNDING_TXID), index: 0 }))
      .toThrow(expect.objectContaining({ code: 'InvalidTransactionId' }));
    expect(() => new Outpoint({ index: 0 })).toThrow(TransactionError);
  });

  it('should reject indices outside 32 bits', () => {
    expect(() => new Outpoint({ txid: FUNDING_TXID, index: -1 })).toThrow(
      expect.objectContaining({ code: 'InvalidOutpointIndex', found: '-1' }),
    );
    expect(() => new Outpoint({ txid: FUNDING_TXID, index: 2 ** 32 })).toThrow(TransactionError);
  });

  it('should take the scriptPubKey from the address', () => {
    const outpoint = new Outpoint({ txid: FUNDING_TXID, index: 0, address: Address.parse(G_P2WPKH_ADDRESS) });
    expect(outpoint.scriptPubKey?.toString('hex')).toBe(`0014${G_HASH160}`);
  });

  it('should check the scripts against the address format', () => {
    const p2pkh = Address.parse(G_P2PKH_ADDRESS);
    expect(() => new Outpoint({ txid: FUNDING_TXID, index: 0, address: p2pkh, redeemScript: hex('51') }))
      .toThrow(expect.objectContaining({ code: 'InvalidInputs' }));
    expect(() => new Outpoint({ txid: FUNDING_TXID, index: 0, address: p2pkh, scriptPubKey: hex('a9') }))
      .toThrow(expect.objectContaining({ code: 'InvalidScriptPubKey', found: 'a9' }));

    const p2wsh = Address.parse(G_P2WSH_ADDRESS);
    expect(() => new Outpoint({ txid: FUNDING_TXID, index: 0, address: p2wsh })).toThrow(
      expect.objectContaining({ code: 'InvalidInputs' }),
    );
    expect(() => new Outpoint({ txid: FUNDING_TXID, index: 0, address: Address.parse(G_P2WPKH_ADDRESS), redeemScript: hex('51') }))
      .toThrow(expect.objectContaining({ code: 'InvalidInputs' }));
  });

  it('should reject a scriptPubKey that pays another key hash', () => {
    const otherHashScript = `76a914${'00'.repeat(20)}88ac`;
    expect(() => new Outpoint({
      txid: FUNDING_TXID,
      index: 0,
      address: Address.parse(G_P2PKH_ADDRESS),
      scriptPubKey: hex(otherHashScript),
    })).toThrow(expect.objectContaining({
      code: 'InvalidScriptPubKey',
      expected: `76a914${G_HASH160}88ac`,
      found: otherHashScript,
    }));

    expect(() => new Outpoint({
      txid: FUNDING_TXID,
      index: 0,
      address: Address.parse(G_P2WPKH_ADDRESS),
      scriptPubKey: hex(`0014${'00'.repeat(20)}`),
    })).toThrow(expect.objectContaining({ code: 'InvalidScriptPubKey', expected: `0014${G_HASH160}` }));
  });

  it('should reject a P2SH-P2WPKH redeem script of another key', () => {
    const address = PublicKey.fromHex(G_PUBLIC_KEY_HEX).toAddress('p2sh_p2wpkh', Address.parse(G_P2PKH_ADDRESS).network);
    expect(() => new Outpoint({ txid: FUNDING_TXID, index: 0, address, redeemScript: hex(`0014${'00'.repeat(20)}`) }))
      .toThrow(expect.objectContaining({ code: 'InvalidInputs', expected: address.toHash().toString('hex') }));
  });

  it('should reject a witness script that does not hash to the P2WSH address', () => {
    const address = Address.parse(G_P2WSH_ADDRESS);
    expect(() => new Outpoint({ txid: FUNDING_TXID, index: 0, address, redeemScript: hex('51') })).toThrow(
      expect.objectContaining({ code: 'InvalidInputs', expected: address.toHash().toString('hex') }),
    );
  });

  it('should derive the P2SH-P2WPKH redeem script from a public key', () => {
    const publicKey = PublicKey.fromHex(G_PUBLIC_KEY_HEX);
    const address = publicKey.toAddress('p2sh_p2wpkh', Address.parse(G_P2PKH_ADDRESS).network);
    const outpoint = Outpoint.fromPublicKey(publicKey, { txid: FUNDING_TXID, index: 0, address });

    expect(outpoint.redeemScript?.toString('hex')).toBe(`0014${G_HASH160}`);
    expect(outpoint.scriptPubKey?.toString('hex')).toBe(`a914${address.toHash().toString('hex')}87`);
  });

  it('should require a redeem script for P2SH-P2WPKH', () => {
    const address = PublicKey.fromHex(G_PUBLIC_KEY_HEX).toAddress('p2sh_p2wpkh', Address.parse(G_P2PKH_ADDRESS).network);
    expect(() => new Outpoint({ txid: FUNDING_TXID, index: 0, address })).toThrow(
      expect.objectContaining({ code: 'InvalidInputs' }),
    );
  });
});

describe('TransactionInput', () => {
  it('should apply defaults', () => {
    const input = bareInput();
    expect(input.sequence).toBe(DEFAULT_SEQUENCE);
    expect(input.sighashType).toBe(SIGHASH.ALL);
    expect(input.isSigned).toBe(false);
    expect(input.witness).toEqual([]);
  });

  it('should count a scriptSig or witness as signed', () => {
    expect(new TransactionInput(new Outpoint({ txid: FUNDING_TXID, index: 0 }), { scriptSig: hex('00') }).isSigned)
      .toBe(true);
    expect(bareInput(0, [hex('aa')]).isSigned).toBe(true);
  });

  it('should reject an invalid sequence', () => {
    expect(() => new TransactionInput(new Outpoint({ txid: FUNDING_TXID, index: 0 }), { sequence: -1 })).toThrow(
      expect.objectContaining({ code: 'InvalidInputs' }),
    );
  });

  it('should write the spent scriptPubKey as a placeholder for legacy formats', () => {
    const p2pkh = new TransactionInput(
      new Outpoint({ txid: FUNDING_TXID, index: 0, address: Address.parse(G_P2PKH_ADDRESS) }),
    );
    expect(p2pkh.scriptForSerialization().toString('hex')).toBe(`76a914${G_HASH160}88ac`);

    const p2wpkh = new TransactionInput(
      new Outpoint({ txid: FUNDING_TXID, index: 0, address: Address.parse(G_P2WPKH_ADDRESS) }),
    );
    expect(p2wpkh.scriptForSerialization().length).toBe(0);

    const witnessScript = hex(G_CHECKSIG_SCRIPT_HEX);
    const p2wsh = new TransactionInput(
      new Outpoint({ txid: FUNDING_TXID, index: 0, address: Address.parse(G_P2WSH_ADDRESS), redeemScript: witnessScript }),
    );
    expect(p2wsh.scriptForSerialization().length).toBe(0);
  });

  it('should copy with changes', () => {
    const input = bareInput();
    const changed = input.with({ sequence: 5, sighashType: SIGHASH.NONE });
    expect(changed.sequence).toBe(5);
    expect(changed.sighashType).toBe(SIGHASH.NONE);
    expect(changed.outpoint).toBe(input.outpoint);
    expect(input.sequence).toBe(DEFAULT_SEQUENCE);
  });
});

describe('Transaction', () => {
  describe('legacy serialization', () => {
    const transaction = Transaction.create({ inputs: [bareInput()], outputs: [paymentOutput()] });

    it('should default to version 2 without a segwit flag', () => {
      expect(transaction.version).toBe(DEFAULT_VERSION);
      expect(transaction.lockTime).toBe(0);
      expect(transaction.segwitFlag).toBe(false);
    });

    it('should serialize the legacy layout', () => {
      expect(transaction.toHex()).toBe(LEGACY_HEX);
    });

    it('should round-trip', () => {
      const parsed = Transaction.fromHex(LEGACY_HEX);
      expect(parsed.toHex()).toBe(LEGACY_HEX);
      expect(parsed.inputs[0].outpoint.txid).toBe(FUNDING_TXID);
      expect(parsed.outputs[0].amount.satoshis).toBe(1000);
      expect(parsed.segwitFlag).toBe(false);
    });

    it('should agree with bitcoinjs-lib on the txid', () => {
      const reference = bitcoin.Transaction.fromHex(LEGACY_HEX);
      expect(transaction.txid()).toBe(reference.getId());
      expect(transaction.wtxid()).toBe(transaction.txid());
    });
  });

  describe('segwit serialization', () => {
    const witness = [hex('aa'), hex(G_PUBLIC_KEY_HEX)];
    const transaction = new Transaction([bareInput(0, witness)], [paymentOutput()], { lockTime: 500 });
    const expectedHex = '02000000' + '0001' +
      '01' + REVERSED_FUNDING_TXID + '00000000' + '00' + 'ffffffff' +
      '01' + P2PKH_OUTPUT_HEX +
      '02' + '01aa' + `21${G_PUBLIC_KEY_HEX}` +
      'f4010000';

    it('should set the segwit flag when an input has a witness', () => {
      expect(transaction.segwitFlag).toBe(true);
      expect(transaction.toHex()).toBe(expectedHex);
    });

    it('should leave the witness out of the txid serialization', () => {
      expect(transaction.serialize(false).toString('hex')).toBe(
        '02000000' + '01' + REVERSED_FUNDING_TXID + '00000000' + '00' + 'ffffffff' +
          '01' + P2PKH_OUTPUT_HEX + 'f4010000',
      );
    });

    it('should agree with bitcoinjs-lib on txid and wtxid', () => {
      const reference = bitcoin.Transaction.fromHex(expectedHex);
      expect(transaction.txid()).toBe(reference.getId());
      expect(transaction.wtxid()).toBe(Buffer.from(reference.getHash(true)).reverse().toString('hex'));
      expect(transaction.id()).toEqual({ txid: transaction.txid(), wtxid: transaction.wtxid() });
    });

    it('should round-trip with raw witness items', () => {
      const parsed = Transaction.fromHex(expectedHex);
      expect(parsed.segwitFlag).toBe(true);
      expect(parsed.lockTime).toBe(500);
      expect(parsed.inputs[0].witness.map((item) => item.toString('hex'))).toEqual(['aa', G_PUBLIC_KEY_HEX]);
      expect(parsed.inputs[0].isSigned).toBe(true);
      expect(parsed.toHex()).toBe(expectedHex);
    });

    it('should read the sighash type from the first witness item', () => {
      const signed = new Transaction([bareInput(0, [hex('3083'), hex(G_PUBLIC_KEY_HEX)])], [paymentOutput()]);
      expect(Transaction.fromHex(signed.toHex()).inputs[0].sighashType).toBe(0x83);
    });
  });

  describe('segwit flag without witness data', () => {
    const transaction = new Transaction([bareInput()], [paymentOutput()], { segwitFlag: true });

    it('should write empty witness stacks', () => {
      expect(transaction.toHex()).toBe(
        '02000000' + '0001' + '01' + REVERSED_FUNDING_TXID + '00000000' + '00' + 'ffffffff' +
          '01' + P2PKH_OUTPUT_HEX + '00' + '00000000',
      );
    });

    it('should keep the flag through a round trip', () => {
      const parsed = Transaction.fromHex(transaction.toHex());
      expect(parsed.segwitFlag).toBe(true);
      expect(parsed.inputs[0].isSigned).toBe(false);
      expect(parsed.toHex()).toBe(transaction.toHex());
      expect(parsed.txid()).toBe(Transaction.fromHex(LEGACY_HEX).txid());
    });
  });

  describe('parsing errors', () => {
    it('should reject a segwit flag other than 1', () => {
      expect(() => Transaction.fromHex('020000000002')).toThrow(
        expect.objectContaining({ code: 'InvalidSegwitFlag', expected: '1', found: '2' }),
      );
    });

    it('should reject trailing bytes', () => {
      expect(() => Transaction.fromHex(`${LEGACY_HEX}00`)).toThrow(
        expect.objectContaining({ code: 'TrailingBytes', found: '1' }),
      );
    });

    it('should reject truncated input', () => {
      expect(() => Transaction.fromHex(LEGACY_HEX.slice(0, -4))).toThrow(
        expect.objectContaining({ code: 'UnexpectedEndOfInput' }),
      );
    });

    it('should report out-of-range output amounts as transaction errors', () => {
      const aboveSupply = LEGACY_HEX.replace('e803000000000000', '0140075af0750700');
      expect(() => Transaction.fromHex(aboveSupply)).toThrow(
        expect.objectContaining({ name: 'TransactionError', code: 'InvalidAmount', found: '2100000000000001' }),
      );

      const aboveSafeInteger = LEGACY_HEX.replace('e803000000000000', 'ffffffffffffffff');
      expect(() => Transaction.fromHex(aboveSafeInteger)).toThrow(
        expect.objectContaining({ code: 'InvalidAmount', found: '18446744073709551615' }),
      );
    });

    it('should reject text that is not hex', () => {
      expect(() => Transaction.fromHex('zz')).toThrow(expect.objectContaining({ code: 'InvalidEncoding' }));
      expect(() => Transaction.fromHex('abc')).toThrow(TransactionError);
    });
  });

  it('should reject a version outside 32 bits', () => {
    expect(() => new Transaction([], [], { version: -1 })).toThrow(
      expect.objectContaining({ code: 'InvalidInputs' }),
    );
  });

  it('should replace inputs without touching the original', () => {
    const original = Transaction.create({ inputs: [bareInput()], outputs: [paymentOutput()], version: 1 });
    const replaced = original.withInputs([bareInput(1)]);

    expect(replaced.inputs[0].outpoint.index).toBe(1);
    expect(replaced.version).toBe(1);
    expect(original.inputs[0].outpoint.index).toBe(0);
  });
});

/**
 * Mnemonic Tests
 *
 * BIP39 phrase encoding, validation and seed stretching.
 */

import { describe, expect, it } from 'vitest';
import { Buffer } from 'node:buffer';
import * as bip39 from 'bip39';

import { Mnemonic } from '../../../src/core/mnemonic';
import { Wordlist } from '../../../src/core/wordlist';
import { TESTNET } from '../../../src/config/networks';
import { MnemonicError } from '../../../src/errors';
import {
  ABANDON_BIP44_ADDRESS,
  ABANDON_BIP49_TESTNET_ADDRESS,
  ABANDON_PHRASE,
  ABANDON_SEED_HEX,
  ABANDON_TREZOR_SEED_HEX,
  constantRandom,
} from '../../fixtures/keys';

describe('Mnemonic', () => {
  describe('fromEntropy', () => {
    it('should encode zero entropy', () => {
      expect(Mnemonic.fromEntropy(Buffer.alloc(16)).toPhrase()).toBe(ABANDON_PHRASE);
    });

    it('should encode the published 128-bit vectors', () => {
      expect(Mnemonic.fromEntropy(Buffer.alloc(16, 0x7f)).toPhrase()).toBe(
        'legal winner thank year wave sausage worth useful legal winner thank yellow',
      );
      expect(Mnemonic.fromEntropy(Buffer.alloc(16, 0x80)).toPhrase()).toBe(
        'letter advice cage absurd amount doctor acoustic avoid letter advice cage above',
      );
      expect(Mnemonic.fromEntropy(Buffer.alloc(16, 0xff)).toPhrase()).toBe(
        'zoo zoo zoo zoo zoo zoo zoo zoo zoo zoo zoo wrong',
      );
    });

    it('should encode 256-bit entropy as 24 words', () => {
      const mnemonic = Mnemonic.fromEntropy(Buffer.alloc(32));
      expect(mnemonic.toPhrase()).toBe(`${'abandon '.repeat(23)}art`);
      expect(mnemonic.wordCount).toBe(24);
    });

    it('should match the bip39 package for other languages', () => {
      const entropy = Buffer.from('9e885d952ad362caeb4efe34a8e91bd2', 'hex');
      for (const language of ['french', 'spanish', 'czech'] as const) {
        expect(Mnemonic.fromEntropy(entropy, language).toPhrase()).toBe(
          bip39.entropyToMnemonic(entropy, bip39.wordlists[language]),
        );
      }
    });

    it('should reject unsupported entropy lengths', () => {
      expect(() => Mnemonic.fromEntropy(Buffer.alloc(15))).toThrow(
        expect.objectContaining({ code: 'InvalidEntropyLength', found: '15' }),
      );
    });
  });

  describe('generate', () => {
    it('should draw the entropy for the word count from the random source', () => {
      const mnemonic = Mnemonic.generate(12, constantRandom(0));
      expect(mnemonic.toPhrase()).toBe(ABANDON_PHRASE);
      expect(mnemonic.toEntropy()).toEqual(Buffer.alloc(16));
    });

    it('should request 32 bytes for 24 words', () => {
      const requested: number[] = [];
      Mnemonic.generate(24, (size) => {
        requested.push(size);
        return Buffer.alloc(size, 1);
      });
      expect(requested).toEqual([32]);
    });

    it('should reject unsupported word counts', () => {
      expect(() => Mnemonic.generate(13, constantRandom(0))).toThrow(MnemonicError);
      expect(() => Mnemonic.generate(13, constantRandom(0))).toThrow(
        expect.objectContaining({ code: 'InvalidWordCount' }),
      );
    });
  });

  describe('fromPhrase', () => {
    it('should recover the entropy', () => {
      const mnemonic = Mnemonic.fromPhrase(
        'legal winner thank year wave sausage worth useful legal winner thank yellow',
      );
      expect(mnemonic.toEntropy().toString('hex')).toBe('7f'.repeat(16));
    });

    it('should reject a flipped bit in the checksum word', () => {
      // "about" is word 3, "able" is word 2
      const phrase = ABANDON_PHRASE.replace(/about$/, 'able');
      expect(() => Mnemonic.fromPhrase(phrase)).toThrow(expect.objectContaining({ code: 'InvalidPhrase' }));
    });

    it('should reject unknown words', () => {
      const phrase = ABANDON_PHRASE.replace(/^abandon/, 'notaword');
      expect(() => Mnemonic.fromPhrase(phrase)).toThrow(
        expect.objectContaining({ code: 'InvalidWord', found: 'notaword' }),
      );
    });

    it('should reject unsupported word counts', () => {
      expect(() => Mnemonic.fromPhrase('abandon abandon about')).toThrow(
        expect.objectContaining({ code: 'InvalidWordCount' }),
      );
    });

    it('should only split on single spaces', () => {
      const phrase = ABANDON_PHRASE.replace(' ', '  ');
      expect(() => Mnemonic.fromPhrase(phrase)).toThrow(
        expect.objectContaining({ code: 'InvalidWordCount' }),
      );
    });

    it('should read phrases in the requested language', () => {
      const entropy = Buffer.alloc(16, 0x42);
      const phrase = bip39.entropyToMnemonic(entropy, bip39.wordlists.italian);
      expect(Mnemonic.fromPhrase(phrase, 'italian').toEntropy()).toEqual(entropy);
      expect(Mnemonic.verifyPhrase(phrase, 'english')).toBe(false);
    });
  });

  describe('verifyPhrase', () => {
    it('should report validity as a boolean', () => {
      expect(Mnemonic.verifyPhrase(ABANDON_PHRASE)).toBe(true);
      expect(Mnemonic.verifyPhrase(`${'abandon '.repeat(11)}abandon`)).toBe(false);
    });
  });

  describe('toSeed', () => {
    it('should stretch without a password', () => {
      expect(Mnemonic.fromPhrase(ABANDON_PHRASE).toSeed().toString('hex')).toBe(ABANDON_SEED_HEX);
    });

    it('should salt with the password', () => {
      expect(Mnemonic.fromPhrase(ABANDON_PHRASE).toSeed('TREZOR').toString('hex')).toBe(ABANDON_TREZOR_SEED_HEX);
    });

    it('should agree with the bip39 package for a non-ASCII password', () => {
      const mnemonic = Mnemonic.fromEntropy(Buffer.alloc(16, 0x11));
      expect(mnemonic.toSeed('pässwörd')).toEqual(bip39.mnemonicToSeedSync(mnemonic.toPhrase(), 'pässwörd'));
    });
  });

  describe('keys and addresses', () => {
    const mnemonic = Mnemonic.fromPhrase(ABANDON_PHRASE);

    it('should derive the BIP44 receive address', () => {
      const address = mnemonic.toExtendedPrivateKey().derive("m/44'/0'/0'/0/0").toAddress();
      expect(address.toString()).toBe(ABANDON_BIP44_ADDRESS);
    });

    it('should derive the BIP49 testnet receive address', () => {
      const master = mnemonic.toExtendedPrivateKey('', TESTNET, 'p2sh_p2wpkh');
      expect(master.derive("m/49'/1'/0'/0/0").toAddress().toString()).toBe(ABANDON_BIP49_TESTNET_ADDRESS);
    });

    it('should render the master key in each form', () => {
      const master = mnemonic.toExtendedPrivateKey();
      expect(mnemonic.toExtendedPublicKey().toString()).toBe(master.toExtendedPublicKey().toString());
      expect(mnemonic.toPrivateKey().toWif()).toBe(master.toPrivateKey().toWif());
      expect(mnemonic.toPublicKey().toHex()).toBe(master.toPublicKey().toHex());
      expect(mnemonic.toAddress('', undefined, 'bech32').toString()).toBe(master.toAddress('bech32').toString());
    });
  });

  it('should compare by language and entropy', () => {
    const a = Mnemonic.fromEntropy(Buffer.alloc(16));
    expect(a.equals(Mnemonic.fromPhrase(ABANDON_PHRASE))).toBe(true);
    expect(a.equals(Mnemonic.fromEntropy(Buffer.alloc(16), 'french'))).toBe(false);
    expect(String(a)).toBe(ABANDON_PHRASE);
  });
});

describe('Wordlist', () => {
  it('should look words up by index and index by word', () => {
    const english = Wordlist.forLanguage('english');
    expect(english.size).toBe(2048);
    expect(english.get(0)).toBe('abandon');
    expect(english.get(2047)).toBe('zoo');
    expect(english.indexOf('about')).toBe(3);
    expect(english.indexOf('qwerty')).toBeUndefined();
  });

  it('should reject indices outside the list', () => {
    expect(() => Wordlist.forLanguage('english').get(2048)).toThrow(
      expect.objectContaining({ code: 'InvalidWord' }),
    );
  });

  it('should cache one list per language', () => {
    expect(Wordlist.forLanguage('korean')).toBe(Wordlist.forLanguage('korean'));
  });
});

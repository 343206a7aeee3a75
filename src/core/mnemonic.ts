/**
 * BIP39 mnemonic phrases
 *
 * Entropy of 128 to 256 bits is extended with a SHA256 checksum and split
 * into 11-bit word indices. Seeds are stretched with PBKDF2-HMAC-SHA512.
 */

import { Buffer } from 'node:buffer';

import type { AddressFormat } from '../interfaces/address.interface.ts';
import type { RandomSource } from '../interfaces/key.interface.ts';
import type { NetworkProfile } from '../interfaces/network.interface.ts';
import { MAINNET } from '../config/networks.ts';
import { MnemonicError } from '../errors/index.ts';
import { pbkdf2Sha512, sha256 } from '../utils/crypto.ts';
import type { Address } from './address.ts';
import { ExtendedPrivateKey } from './extended-private-key.ts';
import type { ExtendedPublicKey } from './extended-public-key.ts';
import type { PrivateKey } from './private-key.ts';
import type { PublicKey } from './public-key.ts';
import { type MnemonicLanguage, Wordlist } from './wordlist.ts';

export type WordCount = 12 | 15 | 18 | 21 | 24;

/** Entropy bytes for each supported phrase length */
export const ENTROPY_LENGTHS: Readonly<Record<WordCount, number>> = {
  12: 16,
  15: 20,
  18: 24,
  21: 28,
  24: 32,
};

export const WORD_COUNTS: readonly WordCount[] = [12, 15, 18, 21, 24];

export const PBKDF2_ITERATIONS = 2048;
export const SEED_LENGTH = 64;

const BITS_PER_WORD = 11;

export function isWordCount(value: unknown): value is WordCount {
  return typeof value === 'number' && WORD_COUNTS.some((entry) => entry === value);
}

function bytesToBits(bytes: Buffer): string {
  return Array.from(bytes, (byte) => byte.toString(2).padStart(8, '0')).join('');
}

function bitsToBytes(bits: string): Buffer {
  const bytes = bits.match(/.{8}/g) ?? [];
  return Buffer.from(bytes.map((byte) => parseInt(byte, 2)));
}

function encodePhrase(entropy: Buffer, wordlist: Wordlist): string {
  const checksumBits = bytesToBits(sha256(entropy)).slice(0, (entropy.length * 8) / 32);
  const groups = (bytesToBits(entropy) + checksumBits).match(/.{11}/g) ?? [];
  return groups.map((group) => wordlist.get(parseInt(group, 2))).join(' ');
}

export class Mnemonic {
  private constructor(
    private readonly entropy: Buffer,
    public readonly language: MnemonicLanguage,
    private readonly phrase: string,
  ) {}

  static generate(wordCount: number, random: RandomSource, language: MnemonicLanguage = 'english'): Mnemonic {
    if (!isWordCount(wordCount)) {
      throw new MnemonicError('InvalidWordCount', `Invalid word count ${wordCount}`, {
        expected: WORD_COUNTS.join(', '),
        found: String(wordCount),
      });
    }
    return Mnemonic.fromEntropy(random(ENTROPY_LENGTHS[wordCount]), language);
  }

  static fromEntropy(entropy: Buffer, language: MnemonicLanguage = 'english'): Mnemonic {
    if (!Object.values(ENTROPY_LENGTHS).includes(entropy.length)) {
      throw new MnemonicError('InvalidEntropyLength', `Invalid entropy length ${entropy.length}`, {
        expected: Object.values(ENTROPY_LENGTHS).join(', '),
        found: String(entropy.length),
      });
    }
    const copy = Buffer.from(entropy);
    return new Mnemonic(copy, language, encodePhrase(copy, Wordlist.forLanguage(language)));
  }

  /**
   * Parse a space separated phrase. The phrase must be exactly what its own
   * entropy encodes to, so a wrong checksum word is rejected.
   */
  static fromPhrase(phrase: string, language: MnemonicLanguage = 'english'): Mnemonic {
    const words = phrase.split(' ');
    const wordCount = words.length;
    if (!isWordCount(wordCount)) {
      throw new MnemonicError('InvalidWordCount', `Invalid word count ${wordCount}`, {
        expected: WORD_COUNTS.join(', '),
        found: String(wordCount),
      });
    }

    const wordlist = Wordlist.forLanguage(language);
    const bits = words
      .map((word) => {
        const index = wordlist.indexOf(word);
        if (index === undefined) {
          throw new MnemonicError('InvalidWord', `Invalid word "${word}"`, { found: word });
        }
        return index.toString(2).padStart(BITS_PER_WORD, '0');
      })
      .join('');

    const entropy = bitsToBytes(bits.slice(0, ENTROPY_LENGTHS[wordCount] * 8));
    const expected = encodePhrase(entropy, wordlist);
    if (expected !== phrase) {
      throw new MnemonicError('InvalidPhrase', 'Invalid phrase', { expected, found: phrase });
    }
    return new Mnemonic(entropy, language, phrase);
  }

  static verifyPhrase(phrase: string, language: MnemonicLanguage = 'english'): boolean {
    try {
      Mnemonic.fromPhrase(phrase, language);
      return true;
    } catch (error) {
      if (error instanceof MnemonicError) return false;
      throw error;
    }
  }

  get wordCount(): WordCount {
    const count = this.phrase.split(' ').length;
    if (!isWordCount(count)) {
      throw new MnemonicError('InvalidWordCount', `Invalid word count ${count}`);
    }
    return count;
  }

  toEntropy(): Buffer {
    return Buffer.from(this.entropy);
  }

  toPhrase(): string {
    return this.phrase;
  }

  /**
   * 64-byte seed: PBKDF2-HMAC-SHA512 over the NFKD phrase with salt
   * `"mnemonic" + password`, 2048 iterations
   */
  toSeed(password = ''): Buffer {
    const phrase = Buffer.from(this.phrase.normalize('NFKD'), 'utf8');
    const salt = Buffer.from(`mnemonic${password}`.normalize('NFKD'), 'utf8');
    return pbkdf2Sha512(phrase, salt, PBKDF2_ITERATIONS, SEED_LENGTH);
  }

  toExtendedPrivateKey(
    password = '',
    network: NetworkProfile = MAINNET,
    format: AddressFormat = 'p2pkh',
  ): ExtendedPrivateKey {
    return ExtendedPrivateKey.fromSeed(this.toSeed(password), network, format);
  }

  toExtendedPublicKey(
    password = '',
    network: NetworkProfile = MAINNET,
    format: AddressFormat = 'p2pkh',
  ): ExtendedPublicKey {
    return this.toExtendedPrivateKey(password, network, format).toExtendedPublicKey();
  }

  /** Master private key */
  toPrivateKey(password = '', network: NetworkProfile = MAINNET): PrivateKey {
    return this.toExtendedPrivateKey(password, network).toPrivateKey();
  }

  toPublicKey(password = '', network: NetworkProfile = MAINNET): PublicKey {
    return this.toExtendedPrivateKey(password, network).toPublicKey();
  }

  /** Address of the master key */
  toAddress(password = '', network: NetworkProfile = MAINNET, format: AddressFormat = 'p2pkh'): Address {
    return this.toExtendedPrivateKey(password, network, format).toAddress(format);
  }

  equals(other: Mnemonic): boolean {
    return this.language === other.language && this.entropy.equals(other.entropy);
  }

  toString(): string {
    return this.phrase;
  }
}

/**
 * BIP39 word tables
 *
 * The 2048-word lists are the ones published with the bip39 package; this
 * module only adds index lookups and the language set the mnemonic codec
 * supports (languages whose phrases are joined with an ASCII space).
 */

import { wordlists } from 'bip39';

import { MnemonicError } from '../errors/index.ts';

export type MnemonicLanguage =
  | 'english'
  | 'chinese_simplified'
  | 'chinese_traditional'
  | 'french'
  | 'italian'
  | 'spanish'
  | 'korean'
  | 'czech'
  | 'portuguese';

export const MNEMONIC_LANGUAGES: readonly MnemonicLanguage[] = [
  'english',
  'chinese_simplified',
  'chinese_traditional',
  'french',
  'italian',
  'spanish',
  'korean',
  'czech',
  'portuguese',
];

export const WORDLIST_SIZE = 2048;

export function isMnemonicLanguage(value: unknown): value is MnemonicLanguage {
  return typeof value === 'string' && MNEMONIC_LANGUAGES.some((entry) => entry === value);
}

export class Wordlist {
  private static readonly cache = new Map<MnemonicLanguage, Wordlist>();

  private readonly indices: Map<string, number>;

  private constructor(
    public readonly language: MnemonicLanguage,
    private readonly words: readonly string[],
  ) {
    this.indices = new Map(words.map((word, index) => [word, index]));
  }

  static forLanguage(language: MnemonicLanguage): Wordlist {
    const cached = Wordlist.cache.get(language);
    if (cached) return cached;

    const words = wordlists[language];
    if (!words || words.length !== WORDLIST_SIZE) {
      throw new MnemonicError('InvalidLanguage', `No ${WORDLIST_SIZE}-word list available for ${language}`);
    }

    const wordlist = new Wordlist(language, words);
    Wordlist.cache.set(language, wordlist);
    return wordlist;
  }

  get(index: number): string {
    const word = this.words[index];
    if (word === undefined) {
      throw new MnemonicError('InvalidWord', `Word index ${index} is outside of the ${this.language} wordlist`, {
        found: String(index),
      });
    }
    return word;
  }

  indexOf(word: string): number | undefined {
    return this.indices.get(word);
  }

  get size(): number {
    return this.words.length;
  }
}

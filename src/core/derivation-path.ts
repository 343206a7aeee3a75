/**
 * BIP32 derivation paths
 *
 * Paths are written `m/44'/0'/0'/0/0`; an apostrophe or `h` marks a hardened
 * step. Five-step paths that follow the BIP44, BIP49 or BIP84 layout for the
 * given coin type are classified as such; everything else is plain BIP32.
 */

import { DerivationPathError } from '../errors/index.ts';

export const HARDENED_OFFSET = 0x80000000;

/** Depth is stored in a single byte */
export const MAX_PATH_LENGTH = 255;

export type ChildIndexKind = 'normal' | 'hardened';

export class ChildIndex {
  private constructor(
    public readonly kind: ChildIndexKind,
    public readonly index: number,
  ) {}

  static normal(index: number): ChildIndex {
    return new ChildIndex('normal', ChildIndex.checkIndex(index));
  }

  static hardened(index: number): ChildIndex {
    return new ChildIndex('hardened', ChildIndex.checkIndex(index));
  }

  /**
   * From the 32-bit wire value, where the top bit marks a hardened step
   */
  static fromNumber(value: number): ChildIndex {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw new DerivationPathError('InvalidChildNumber', `Invalid child number: ${value}`);
    }
    return value >= HARDENED_OFFSET
      ? new ChildIndex('hardened', value - HARDENED_OFFSET)
      : new ChildIndex('normal', value);
  }

  /**
   * Parse `0`, `44'` or `44h`
   */
  static parse(text: string): ChildIndex {
    const match = /^(\d+)(['h]?)$/.exec(text);
    if (!match) {
      throw new DerivationPathError('InvalidChildNumberFormat', `Invalid child number format: "${text}"`);
    }
    const index = Number(match[1]);
    return match[2] ? ChildIndex.hardened(index) : ChildIndex.normal(index);
  }

  private static checkIndex(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= HARDENED_OFFSET) {
      throw new DerivationPathError('InvalidChildNumber', `Invalid child number: ${index}`);
    }
    return index;
  }

  get isHardened(): boolean {
    return this.kind === 'hardened';
  }

  get isNormal(): boolean {
    return this.kind === 'normal';
  }

  /** 32-bit value used in the HMAC input and the serialized key */
  toNumber(): number {
    return this.isHardened ? this.index + HARDENED_OFFSET : this.index;
  }

  equals(other: ChildIndex): boolean {
    return this.kind === other.kind && this.index === other.index;
  }

  toString(): string {
    return this.isHardened ? `${this.index}'` : `${this.index}`;
  }
}

export type DerivationPathKind = 'bip32' | 'bip44' | 'bip49' | 'bip84';

const PURPOSES = {
  bip44: 44,
  bip49: 49,
  bip84: 84,
} as const;

export type PurposeKind = keyof typeof PURPOSES;

const PURPOSE_KINDS: readonly PurposeKind[] = ['bip44', 'bip49', 'bip84'];

const EXPECTED_PATH_CODES = {
  bip44: 'ExpectedBIP44Path',
  bip49: 'ExpectedBIP49Path',
  bip84: 'ExpectedBIP84Path',
} as const;

export class DerivationPath {
  private constructor(
    public readonly kind: DerivationPathKind,
    public readonly indices: readonly ChildIndex[],
  ) {}

  static parse(text: string, coinType = 0): DerivationPath {
    const [root, ...parts] = text.split('/');
    if (root !== 'm') {
      throw new DerivationPathError('InvalidDerivationPath', `Invalid derivation path: "${text}"`);
    }
    return DerivationPath.fromIndices(parts.map((part) => ChildIndex.parse(part)), coinType);
  }

  static fromIndices(indices: readonly ChildIndex[], coinType = 0): DerivationPath {
    DerivationPath.checkLength(indices);
    return new DerivationPath(DerivationPath.classify(indices, coinType), [...indices]);
  }

  /** An unclassified path, even when its layout matches a purpose */
  static bip32(indices: readonly ChildIndex[]): DerivationPath {
    DerivationPath.checkLength(indices);
    return new DerivationPath('bip32', [...indices]);
  }

  static bip44(coinType: number, account: number, change: number, index: number): DerivationPath {
    return DerivationPath.forPurpose('bip44', coinType, account, change, index);
  }

  static bip49(coinType: number, account: number, change: number, index: number): DerivationPath {
    return DerivationPath.forPurpose('bip49', coinType, account, change, index);
  }

  static bip84(coinType: number, account: number, change: number, index: number): DerivationPath {
    return DerivationPath.forPurpose('bip84', coinType, account, change, index);
  }

  /** `m/purpose'/coin'/account'` */
  static account(kind: PurposeKind, coinType: number, account: number): DerivationPath {
    return DerivationPath.bip32([
      ChildIndex.hardened(PURPOSES[kind]),
      ChildIndex.hardened(coinType),
      ChildIndex.hardened(account),
    ]);
  }

  private static forPurpose(
    kind: PurposeKind,
    coinType: number,
    account: number,
    change: number,
    index: number,
  ): DerivationPath {
    return new DerivationPath(kind, [
      ChildIndex.hardened(PURPOSES[kind]),
      ChildIndex.hardened(coinType),
      ChildIndex.hardened(account),
      ChildIndex.normal(change),
      ChildIndex.normal(index),
    ]);
  }

  private static checkLength(indices: readonly ChildIndex[]): void {
    if (indices.length > MAX_PATH_LENGTH) {
      throw new DerivationPathError(
        'PathTooLong',
        `Derivation path has ${indices.length} steps, at most ${MAX_PATH_LENGTH} are allowed`,
      );
    }
  }

  private static classify(indices: readonly ChildIndex[], coinType: number): DerivationPathKind {
    if (indices.length !== 5) return 'bip32';
    const [purpose, coin, account, change, index] = indices;
    const layoutMatches = coin.isHardened &&
      coin.index === coinType &&
      account.isHardened &&
      change.isNormal &&
      index.isNormal;
    if (!layoutMatches || purpose.isNormal) return 'bip32';

    return PURPOSE_KINDS.find((kind) => purpose.index === PURPOSES[kind]) ?? 'bip32';
  }

  /**
   * Throws unless the path was classified as `kind`
   */
  expect(kind: PurposeKind): this {
    if (this.kind !== kind) {
      throw new DerivationPathError(
        EXPECTED_PATH_CODES[kind],
        `Expected a ${kind.toUpperCase()} path, got ${this.toString()}`,
      );
    }
    return this;
  }

  get length(): number {
    return this.indices.length;
  }

  equals(other: DerivationPath): boolean {
    return this.indices.length === other.indices.length &&
      this.indices.every((index, position) => index.equals(other.indices[position]));
  }

  toString(): string {
    return ['m', ...this.indices.map((index) => index.toString())].join('/');
  }
}

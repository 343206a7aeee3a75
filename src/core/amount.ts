/**
 * Bitcoin denomination arithmetic
 *
 * A signed satoshi count bounded to the 21 million coin supply. Arithmetic
 * is checked: leaving the bounds raises an AmountError instead of wrapping.
 */

import { AmountError } from '../errors/index.ts';

export const SATOSHIS_PER_BITCOIN = 100_000_000;

export const MAX_SATOSHIS = 21_000_000 * SATOSHIS_PER_BITCOIN;

export type Denomination = 'satoshi' | 'uBTC' | 'mBTC' | 'cBTC' | 'dBTC' | 'BTC';

/** Decimal places between each denomination and the satoshi */
export const DENOMINATION_PRECISION: Readonly<Record<Denomination, number>> = {
  satoshi: 0,
  uBTC: 2,
  mBTC: 5,
  cBTC: 6,
  dBTC: 7,
  BTC: 8,
};

export class Amount {
  static readonly ZERO = new Amount(0);
  static readonly ONE_SAT = new Amount(1);
  static readonly ONE_BTC = new Amount(SATOSHIS_PER_BITCOIN);

  private constructor(public readonly satoshis: number) {}

  static fromSatoshi(satoshis: number): Amount {
    if (!Number.isSafeInteger(satoshis)) {
      throw new AmountError('InvalidAmount', `Amount must be an integer satoshi count, got ${satoshis}`);
    }
    if (satoshis < -MAX_SATOSHIS || satoshis > MAX_SATOSHIS) {
      throw new AmountError(
        'AmountOutOfBounds',
        `Amount ${satoshis} is outside of the bounds of +/-${MAX_SATOSHIS} satoshis`,
      );
    }
    return new Amount(satoshis);
  }

  /**
   * Whole units of the given denomination
   */
  static from(value: number, denomination: Denomination): Amount {
    if (!Number.isSafeInteger(value)) {
      throw new AmountError('InvalidAmount', `Amount must be an integer number of ${denomination}, got ${value}`);
    }
    return Amount.fromSatoshi(value * 10 ** DENOMINATION_PRECISION[denomination]);
  }

  static fromUbtc(value: number): Amount {
    return Amount.from(value, 'uBTC');
  }

  static fromMbtc(value: number): Amount {
    return Amount.from(value, 'mBTC');
  }

  static fromCbtc(value: number): Amount {
    return Amount.from(value, 'cBTC');
  }

  static fromDbtc(value: number): Amount {
    return Amount.from(value, 'dBTC');
  }

  static fromBtc(value: number): Amount {
    return Amount.from(value, 'BTC');
  }

  add(other: Amount): Amount {
    return Amount.fromSatoshi(this.satoshis + other.satoshis);
  }

  sub(other: Amount): Amount {
    return Amount.fromSatoshi(this.satoshis - other.satoshis);
  }

  equals(other: Amount): boolean {
    return this.satoshis === other.satoshis;
  }

  toString(): string {
    return this.satoshis.toString();
  }
}

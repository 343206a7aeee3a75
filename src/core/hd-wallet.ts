/**
 * HD wallet facade
 *
 * Holds a mnemonic and its master key, and derives accounts and receive
 * addresses along the BIP44, BIP49 or BIP84 layout that matches the
 * configured address format.
 */

import type { AddressFormat } from '../interfaces/address.interface.ts';
import type { RandomSource } from '../interfaces/key.interface.ts';
import type { NetworkProfile } from '../interfaces/network.interface.ts';
import { getNetworkProfile } from '../config/networks.ts';
import { DEFAULT_WALLET_CONFIG, validateConfig, type WalletConfig } from '../config/wallet-config.ts';
import { ConfigError } from '../errors/index.ts';
import { createLogger, type Logger } from '../utils/logger.ts';
import type { Address } from './address.ts';
import { DerivationPath, type PurposeKind } from './derivation-path.ts';
import type { ExtendedPrivateKey } from './extended-private-key.ts';
import type { ExtendedPublicKey } from './extended-public-key.ts';
import { Mnemonic } from './mnemonic.ts';
import type { PrivateKey } from './private-key.ts';

const PURPOSE_BY_FORMAT: Readonly<Record<Exclude<AddressFormat, 'p2wsh'>, PurposeKind>> = {
  p2pkh: 'bip44',
  p2sh_p2wpkh: 'bip49',
  bech32: 'bip84',
};

export interface HDWalletOptions {
  config?: WalletConfig;
  /** Defaults to a console logger at the configured level */
  logger?: Logger;
}

export class HDWallet {
  public readonly config: WalletConfig;
  public readonly network: NetworkProfile;
  public readonly purpose: PurposeKind;
  private readonly master: ExtendedPrivateKey;
  private readonly logger: Logger;

  private constructor(
    private readonly mnemonic: Mnemonic,
    password: string,
    options: HDWalletOptions,
  ) {
    const validation = validateConfig(options.config ?? DEFAULT_WALLET_CONFIG);
    if (!validation.config) {
      throw new ConfigError(validation.errors);
    }
    const config = validation.config;
    if (config.addressFormat === 'p2wsh') {
      throw new ConfigError(['Address format p2wsh has no single-key derivation scheme']);
    }

    this.config = config;
    this.network = getNetworkProfile(config.network);
    this.purpose = PURPOSE_BY_FORMAT[config.addressFormat];
    this.logger = options.logger ?? createLogger(config.logLevel);
    this.master = mnemonic.toExtendedPrivateKey(password, this.network, config.addressFormat);
  }

  /**
   * New wallet from fresh entropy, with the configured word count and language
   */
  static generate(random: RandomSource, password = '', options: HDWalletOptions = {}): HDWallet {
    const config = options.config ?? DEFAULT_WALLET_CONFIG;
    const mnemonic = Mnemonic.generate(config.wordCount, random, config.language);
    return new HDWallet(mnemonic, password, options);
  }

  static fromMnemonic(phrase: string, password = '', options: HDWalletOptions = {}): HDWallet {
    const config = options.config ?? DEFAULT_WALLET_CONFIG;
    return new HDWallet(Mnemonic.fromPhrase(phrase, config.language), password, options);
  }

  toMnemonic(): Mnemonic {
    return this.mnemonic;
  }

  /** Master extended private key */
  toExtendedPrivateKey(): ExtendedPrivateKey {
    return this.master;
  }

  accountPath(account: number): DerivationPath {
    return DerivationPath.account(this.purpose, this.network.coinType, account);
  }

  addressPath(account: number, change: number, index: number): DerivationPath {
    switch (this.purpose) {
      case 'bip44':
        return DerivationPath.bip44(this.network.coinType, account, change, index);
      case 'bip49':
        return DerivationPath.bip49(this.network.coinType, account, change, index);
      case 'bip84':
        return DerivationPath.bip84(this.network.coinType, account, change, index);
    }
  }

  /**
   * Account-level extended private key, `m/purpose'/coin'/account'`
   */
  deriveAccount(account: number): ExtendedPrivateKey {
    const path = this.accountPath(account);
    this.logger.debug?.('Deriving account', { path: path.toString() });
    return this.master.derive(path, { logger: this.logger });
  }

  /** Watch-only form of an account */
  deriveAccountPublicKey(account: number): ExtendedPublicKey {
    return this.deriveAccount(account).toExtendedPublicKey();
  }

  derivePrivateKey(account: number, change: number, index: number): PrivateKey {
    return this.master.derive(this.addressPath(account, change, index), { logger: this.logger }).toPrivateKey();
  }

  deriveAddress(account: number, change: number, index: number): Address {
    const path = this.addressPath(account, change, index);
    const address = this.master.derive(path, { logger: this.logger }).toAddress(this.config.addressFormat);
    this.logger.debug?.('Derived address', { path: path.toString(), address: address.toString() });
    return address;
  }
}

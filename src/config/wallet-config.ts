/**
 * Wallet configuration: the defaults a wallet facade starts from and the
 * checks applied to a merged configuration.
 */

import { ADDRESS_FORMATS, type AddressFormat, isAddressFormat } from '../interfaces/address.interface.ts';
import { NETWORK_TYPES, type NetworkType } from '../interfaces/network.interface.ts';
import { isMnemonicLanguage, MNEMONIC_LANGUAGES, type MnemonicLanguage } from '../core/wordlist.ts';
import { isWordCount, WORD_COUNTS, type WordCount } from '../core/mnemonic.ts';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../utils/logger.ts';

export interface WalletConfig {
  network: NetworkType;
  /** Address format of derived receive addresses; selects BIP44, BIP49 or BIP84 */
  addressFormat: AddressFormat;
  language: MnemonicLanguage;
  /** Phrase length of generated mnemonics */
  wordCount: WordCount;
  logLevel: LogLevel;
}

export const DEFAULT_WALLET_CONFIG: Readonly<WalletConfig> = {
  network: 'mainnet',
  addressFormat: 'bech32',
  language: 'english',
  wordCount: 24,
  logLevel: 'warn',
};

export function isNetworkType(value: unknown): value is NetworkType {
  return NETWORK_TYPES.some((entry) => entry === value);
}

/**
 * Default configuration for a network
 */
export function createWalletConfig(network: NetworkType = DEFAULT_WALLET_CONFIG.network): WalletConfig {
  return { ...DEFAULT_WALLET_CONFIG, network };
}

export interface ConfigValidation {
  /** Present only when `errors` is empty */
  config?: WalletConfig;
  errors: string[];
}

/**
 * Check every field of a merged configuration, collecting one message per
 * problem.
 */
export function validateConfig(candidate: Readonly<Record<keyof WalletConfig, unknown>>): ConfigValidation {
  const { network, addressFormat, language, wordCount, logLevel } = candidate;
  const errors: string[] = [];

  if (!isNetworkType(network)) {
    errors.push(`Unknown network "${String(network)}". Allowed: ${NETWORK_TYPES.join(', ')}`);
  }
  if (!isAddressFormat(addressFormat)) {
    errors.push(`Unknown address format "${String(addressFormat)}". Allowed: ${ADDRESS_FORMATS.join(', ')}`);
  } else if (addressFormat === 'p2wsh') {
    errors.push('Address format p2wsh has no single-key derivation scheme');
  }
  if (!isMnemonicLanguage(language)) {
    errors.push(`Unknown mnemonic language "${String(language)}". Allowed: ${MNEMONIC_LANGUAGES.join(', ')}`);
  }
  if (!isWordCount(wordCount)) {
    errors.push(`Unsupported word count ${String(wordCount)}. Allowed: ${WORD_COUNTS.join(', ')}`);
  }
  if (!isLogLevel(logLevel)) {
    errors.push(`Unknown log level "${String(logLevel)}". Allowed: ${LOG_LEVELS.join(', ')}`);
  }

  if (
    errors.length === 0 &&
    isNetworkType(network) &&
    isAddressFormat(addressFormat) &&
    isMnemonicLanguage(language) &&
    isWordCount(wordCount) &&
    isLogLevel(logLevel)
  ) {
    return { config: { network, addressFormat, language, wordCount, logLevel }, errors };
  }
  return { errors };
}

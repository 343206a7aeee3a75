/**
 * Configuration module exports
 */

export {
  createWalletConfig,
  DEFAULT_WALLET_CONFIG,
  isNetworkType,
  type ConfigValidation,
  validateConfig,
  type WalletConfig,
} from './wallet-config.ts';

export {
  getEnvironmentConfigDocumentation,
  loadWalletEnvironmentConfig,
  validateWalletConfiguration,
  type ValidationResult,
  WALLET_ENV_VARS,
} from './env-validator.ts';

export { CONFIG_FILE_NAMES, ConfigLoader, type ConfigSources } from './config-loader.ts';

export {
  EXTENDED_KEY_FORMATS,
  type ExtendedKeyVersionMatch,
  findExtendedKeyVersion,
  findNetworkByAddressVersion,
  findNetworkByBech32Prefix,
  findNetworkByWifPrefix,
  getNetworkProfile,
  isExtendedKeyFormat,
  MAINNET,
  TESTNET,
} from './networks.ts';

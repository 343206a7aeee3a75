/**
 * Environment Variable Configuration Validator
 * Reads the WALLET_* variables and reports every invalid value
 */

import process from 'node:process';

import { ADDRESS_FORMATS, type AddressFormat } from '../interfaces/address.interface.ts';
import { ConfigError } from '../errors/index.ts';
import { MNEMONIC_LANGUAGES } from '../core/wordlist.ts';
import { isWordCount, WORD_COUNTS } from '../core/mnemonic.ts';
import { LOG_LEVELS, type Logger, SILENT_LOGGER } from '../utils/logger.ts';
import type { WalletConfig } from './wallet-config.ts';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  config: Partial<WalletConfig>;
}

/** Network names accepted besides the canonical ones */
const NETWORK_ALIASES = {
  bitcoin: 'mainnet',
  testnet3: 'testnet',
} as const;

/**
 * Wallet environment variables with their validation rules
 */
export const WALLET_ENV_VARS = {
  WALLET_NETWORK: {
    type: 'string' as const,
    description: 'Bitcoin network for keys and addresses (mainnet, testnet)',
    example: 'testnet',
    required: false,
    enum: ['mainnet', 'testnet', 'bitcoin', 'testnet3'],
    default: 'mainnet',
  },
  WALLET_ADDRESS_FORMAT: {
    type: 'string' as const,
    description: 'Address format of derived receive addresses',
    example: 'p2sh_p2wpkh',
    required: false,
    enum: ADDRESS_FORMATS,
    default: 'bech32',
  },
  WALLET_MNEMONIC_LANGUAGE: {
    type: 'string' as const,
    description: 'Wordlist used to generate and read mnemonic phrases',
    example: 'english',
    required: false,
    enum: MNEMONIC_LANGUAGES,
    default: 'english',
  },
  WALLET_WORD_COUNT: {
    type: 'number' as const,
    description: 'Number of words in generated mnemonic phrases',
    example: '12',
    required: false,
    min: 12,
    max: 24,
    default: 24,
  },
  WALLET_LOG_LEVEL: {
    type: 'string' as const,
    description: 'Minimum level of log messages',
    example: 'debug',
    required: false,
    enum: LOG_LEVELS,
    default: 'warn',
  },
} as const;

/**
 * Validate number environment variable
 */
function validateNumber(
  value: string,
  varName: string,
  options: { min?: number; max?: number } = {},
): { valid: boolean; errors: string[]; parsed?: number | undefined } {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  const errors: string[] = [];

  if (trimmed === '' || !Number.isInteger(parsed)) {
    return {
      valid: false,
      errors: [`${varName}: Invalid number "${value}"`],
    };
  }

  if (options.min !== undefined && parsed < options.min) {
    errors.push(`${varName}: Value ${parsed} is below minimum ${options.min}`);
  }

  if (options.max !== undefined && parsed > options.max) {
    errors.push(`${varName}: Value ${parsed} is above maximum ${options.max}`);
  }

  return {
    valid: errors.length === 0,
    errors,
    parsed: errors.length === 0 ? parsed : undefined,
  };
}

/**
 * Validate enum environment variable
 */
function validateEnum<T extends string>(
  value: string,
  varName: string,
  allowedValues: readonly T[],
): { valid: boolean; errors: string[]; parsed?: T } {
  const normalized = value.toLowerCase().trim();
  const parsed = allowedValues.find((allowed) => allowed.toLowerCase() === normalized);

  if (parsed !== undefined) {
    return { valid: true, errors: [], parsed };
  }

  return {
    valid: false,
    errors: [
      `${varName}: Invalid value "${value}". Allowed: ${allowedValues.join(', ')}`,
    ],
  };
}

/**
 * Load and validate the wallet environment configuration
 */
export function loadWalletEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const config: Partial<WalletConfig> = {};

  // Network, with aliases
  if (env.WALLET_NETWORK) {
    const validation = validateEnum(env.WALLET_NETWORK, 'WALLET_NETWORK', WALLET_ENV_VARS.WALLET_NETWORK.enum);
    if (!validation.parsed) {
      errors.push(...validation.errors);
    } else if (validation.parsed === 'bitcoin' || validation.parsed === 'testnet3') {
      const canonical = NETWORK_ALIASES[validation.parsed];
      warnings.push(`WALLET_NETWORK=${validation.parsed} is an alias. Use ${canonical} instead.`);
      config.network = canonical;
    } else {
      config.network = validation.parsed;
    }
  }

  if (env.WALLET_ADDRESS_FORMAT) {
    const validation = validateEnum<AddressFormat>(
      env.WALLET_ADDRESS_FORMAT,
      'WALLET_ADDRESS_FORMAT',
      WALLET_ENV_VARS.WALLET_ADDRESS_FORMAT.enum,
    );
    if (!validation.parsed) {
      errors.push(...validation.errors);
    } else {
      config.addressFormat = validation.parsed;
    }
  }

  if (env.WALLET_MNEMONIC_LANGUAGE) {
    const validation = validateEnum(
      env.WALLET_MNEMONIC_LANGUAGE,
      'WALLET_MNEMONIC_LANGUAGE',
      WALLET_ENV_VARS.WALLET_MNEMONIC_LANGUAGE.enum,
    );
    if (!validation.parsed) {
      errors.push(...validation.errors);
    } else {
      config.language = validation.parsed;
    }
  }

  // Word count: in range and one of the supported lengths
  if (env.WALLET_WORD_COUNT) {
    const { min, max } = WALLET_ENV_VARS.WALLET_WORD_COUNT;
    const validation = validateNumber(env.WALLET_WORD_COUNT, 'WALLET_WORD_COUNT', { min, max });
    if (!validation.valid) {
      errors.push(...validation.errors);
    } else if (!isWordCount(validation.parsed)) {
      errors.push(`WALLET_WORD_COUNT: ${validation.parsed} is not one of ${WORD_COUNTS.join(', ')}`);
    } else {
      config.wordCount = validation.parsed;
    }
  }

  if (env.WALLET_LOG_LEVEL) {
    const validation = validateEnum(env.WALLET_LOG_LEVEL, 'WALLET_LOG_LEVEL', WALLET_ENV_VARS.WALLET_LOG_LEVEL.enum);
    if (!validation.parsed) {
      errors.push(...validation.errors);
    } else {
      config.logLevel = validation.parsed;
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config,
  };
}

/**
 * Get comprehensive configuration documentation
 */
export function getEnvironmentConfigDocumentation(): string {
  const sections = Object.entries(WALLET_ENV_VARS).map(([name, rules]) => {
    const requiredLabel = rules.required ? ' (Required)' : ' (Optional)';
    const defaultValue = ` (Default: ${rules.default})`;

    let validationInfo = '';
    if ('min' in rules) {
      validationInfo = ` [Min: ${rules.min}, Max: ${rules.max}]`;
    }
    if ('enum' in rules) {
      validationInfo = ` [Values: ${rules.enum.join(', ')}]`;
    }

    return `${name}${requiredLabel}${defaultValue}${validationInfo}
  ${rules.description}
  Example: ${name}=${rules.example}`;
  });

  return `# Wallet Environment Variable Configuration Guide

## Environment Variables

${sections.join('\n\n')}

## Configuration Validation

Use loadWalletEnvironmentConfig() to validate your environment:
- Checks every variable against its allowed values
- Warns about network aliases
- Returns the parsed configuration object

## Priority

Runtime options override environment variables, which override
.wallet-primitives.json or wallet-primitives.config.json in the working
directory, which override the built-in defaults.
`;
}

/**
 * Validate the environment, throwing a ConfigError that lists every problem
 */
export function validateWalletConfiguration(
  throwOnError = true,
  logger: Logger = SILENT_LOGGER,
  env: NodeJS.ProcessEnv = process.env,
): ValidationResult {
  const result = loadWalletEnvironmentConfig(env);

  if (!result.valid && throwOnError) {
    throw new ConfigError(result.errors);
  }

  for (const warning of result.warnings) {
    logger.warn(`Wallet configuration warning: ${warning}`);
  }

  return result;
}

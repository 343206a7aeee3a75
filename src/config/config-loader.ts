/**
 * Configuration Loader
 * Loads wallet configuration with priority:
 * 1. Runtime options (passed to loadConfig)
 * 2. Environment variables
 * 3. Config file (.wallet-primitives.json or wallet-primitives.config.json)
 * 4. Default values
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import process from 'node:process';

import { ConfigError } from '../errors/index.ts';
import { type Logger, SILENT_LOGGER } from '../utils/logger.ts';
import { getEnvironmentConfigDocumentation, loadWalletEnvironmentConfig } from './env-validator.ts';
import { DEFAULT_WALLET_CONFIG, validateConfig, type WalletConfig } from './wallet-config.ts';

export const CONFIG_FILE_NAMES = ['.wallet-primitives.json', 'wallet-primitives.config.json'] as const;

const CONFIG_KEYS = ['network', 'addressFormat', 'language', 'wordCount', 'logLevel'] as const;

type ConfigCandidate = Record<keyof WalletConfig, unknown>;

/**
 * Where the loader looks for its layers; the process is the default
 */
export interface ConfigSources {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export class ConfigLoader {
  private readonly cwd: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  constructor(sources: ConfigSources = {}) {
    this.cwd = sources.cwd ?? process.cwd();
    this.env = sources.env ?? process.env;
    this.logger = sources.logger ?? SILENT_LOGGER;
  }

  /**
   * Merge defaults, config file, environment and runtime options, in
   * increasing priority, and validate the result
   */
  static loadConfig(options?: Partial<WalletConfig>, sources?: ConfigSources): WalletConfig {
    return new ConfigLoader(sources).load(options);
  }

  load(options: Partial<WalletConfig> = {}): WalletConfig {
    const problems: string[] = [];

    // Layer 1: defaults
    let config: ConfigCandidate = { ...DEFAULT_WALLET_CONFIG };

    // Layer 2: config file overrides (if exists)
    const configFile = this.loadConfigFile();
    if (configFile) {
      config = { ...config, ...configFile };
    }

    // Layer 3: environment variables
    const environment = loadWalletEnvironmentConfig(this.env);
    problems.push(...environment.errors);
    for (const warning of environment.warnings) {
      this.logger.warn(warning);
    }
    config = { ...config, ...environment.config };

    // Layer 4: runtime options (highest priority)
    config = { ...config, ...this.definedOptions(options) };

    const validation = validateConfig(config);
    problems.push(...validation.errors);
    if (!validation.config || problems.length > 0) {
      throw new ConfigError(problems);
    }

    this.logger.debug?.('Loaded wallet configuration', { ...validation.config });
    return validation.config;
  }

  private definedOptions(options: Partial<WalletConfig>): Partial<ConfigCandidate> {
    const defined: Partial<ConfigCandidate> = {};
    for (const key of CONFIG_KEYS) {
      if (options[key] !== undefined) {
        defined[key] = options[key];
      }
    }
    return defined;
  }

  private loadConfigFile(): Partial<ConfigCandidate> | null {
    // Look for config files in order of preference
    const configPaths = CONFIG_FILE_NAMES.map((name) => path.join(this.cwd, name));

    for (const configPath of configPaths) {
      if (!fs.existsSync(configPath)) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      } catch (error) {
        this.logger.warn(`Failed to load config from ${configPath}`, {
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
        return this.pickConfigKeys(parsed, configPath);
      }
      this.logger.warn(`Ignoring config file ${configPath}: expected a JSON object`);
    }

    return null;
  }

  /**
   * Known keys of a parsed config file; values are checked with the rest of
   * the merged configuration
   */
  private pickConfigKeys(parsed: object, configPath: string): Partial<ConfigCandidate> {
    const picked: Partial<ConfigCandidate> = {};
    for (const [key, value] of Object.entries(parsed)) {
      const configKey = CONFIG_KEYS.find((known) => known === key);
      if (configKey) {
        picked[configKey] = value;
      } else {
        this.logger.warn(`Unknown key "${key}" in ${configPath}`);
      }
    }
    return picked;
  }

  /**
   * Get configuration documentation
   */
  static getConfigDocumentation(): string {
    return getEnvironmentConfigDocumentation() + `
Configuration File:
   Create .wallet-primitives.json or wallet-primitives.config.json in the
   working directory:
   {
     "network": "testnet",
     "addressFormat": "p2sh_p2wpkh",
     "language": "english",
     "wordCount": 12,
     "logLevel": "info"
   }
`;
  }
}

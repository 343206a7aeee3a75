/**
 * @module bitcoin-wallet-primitives
 *
 * Bitcoin wallet primitives: BIP39 mnemonics, BIP32/44/49/84 key derivation,
 * P2PKH, P2SH-P2WPKH, P2WPKH and P2WSH addresses, and raw transaction
 * serialization and signing.
 *
 * @example Wallet facade
 * ```typescript
 * import { ConfigLoader, HDWallet } from 'bitcoin-wallet-primitives';
 *
 * const config = ConfigLoader.loadConfig({ network: 'testnet' });
 * const wallet = HDWallet.fromMnemonic(phrase, '', { config });
 * const address = wallet.deriveAddress(0, 0, 0);
 * ```
 */

export * from './core/index.ts';
export * from './interfaces/index.ts';
export * from './config/index.ts';
export * from './encoders/index.ts';
export * from './errors/index.ts';
export * from './utils/index.ts';

/**
 * HD Wallet Derivation Example
 *
 * Creates a wallet from a mnemonic and derives receive addresses for each
 * supported single-key address format, plus the watch-only account key a
 * server can use to derive the same addresses without the private keys.
 *
 * The phrase below is a well-known test phrase. Never send funds to it.
 */

import { randomBytes } from 'node:crypto';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import {
  ConfigLoader,
  ExtendedPublicKey,
  HDWallet,
  type WalletConfig,
} from '../../src/index.ts';

const TEST_PHRASE = 'abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon about';

export function deriveReceiveAddresses(config: WalletConfig, count = 3): string[] {
  const wallet = HDWallet.fromMnemonic(TEST_PHRASE, '', { config });
  return Array.from({ length: count }, (_, index) => wallet.deriveAddress(0, 0, index).toString());
}

/**
 * Watch-only derivation: only the account xpub/ypub/zpub leaves the signer
 */
export function deriveFromAccountKey(config: WalletConfig): { accountKey: string; firstAddress: string } {
  const wallet = HDWallet.fromMnemonic(TEST_PHRASE, '', { config });
  const accountKey = wallet.deriveAccountPublicKey(0).toString();

  const watchOnly = ExtendedPublicKey.parse(accountKey, wallet.network);
  const firstAddress = watchOnly.derive('m/0/0').toAddress(config.addressFormat).toString();
  return { accountKey, firstAddress };
}

export function createFreshWallet(config: WalletConfig): string {
  return HDWallet.generate((size) => randomBytes(size), '', { config }).toMnemonic().toPhrase();
}

function main(): void {
  // Defaults, then .wallet-primitives.json, then WALLET_* variables
  const base = ConfigLoader.loadConfig();

  for (const addressFormat of ['p2pkh', 'p2sh_p2wpkh', 'bech32'] as const) {
    const config = { ...base, addressFormat };
    console.log(`${addressFormat}:`, deriveReceiveAddresses(config));

    const { accountKey, firstAddress } = deriveFromAccountKey(config);
    console.log(`  account key ${accountKey}`);
    console.log(`  watch-only m/0/0 ${firstAddress}`);
  }

  console.log('\nFresh phrase:', createFreshWallet(base));
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main();
}

/**
 * Address format definitions
 */

export type AddressFormat = 'p2pkh' | 'p2sh_p2wpkh' | 'bech32' | 'p2wsh';

export const ADDRESS_FORMATS: readonly AddressFormat[] = [
  'p2pkh',
  'p2sh_p2wpkh',
  'bech32',
  'p2wsh',
];

/**
 * Formats that have extended key version bytes (a script-hash format has no key)
 */
export type ExtendedKeyFormat = Exclude<AddressFormat, 'p2wsh'>;

export function isAddressFormat(value: unknown): value is AddressFormat {
  return typeof value === 'string' && ADDRESS_FORMATS.some((entry) => entry === value);
}

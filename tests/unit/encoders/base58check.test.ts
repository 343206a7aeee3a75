import { describe, expect, it } from 'vitest';
import { Buffer } from 'node:buffer';

import { decodeBase58, encodeBase58Check, splitChecksum } from '../../../src/encoders/base58check';
import { G_HASH160, G_P2PKH_ADDRESS } from '../../fixtures/keys';

describe('Base58Check', () => {
  const payload = Buffer.concat([Buffer.from([0x00]), Buffer.from(G_HASH160, 'hex')]);

  it('should encode a version byte and hash as a legacy address', () => {
    expect(encodeBase58Check(payload)).toBe(G_P2PKH_ADDRESS);
  });

  it('should split a decoded address into payload and a valid checksum', () => {
    const decoded = decodeBase58(G_P2PKH_ADDRESS);
    expect(decoded).toBeDefined();
    if (!decoded) return;

    const parts = splitChecksum(decoded);
    expect(decoded).toHaveLength(25);
    expect(parts.payload.equals(payload)).toBe(true);
    expect(parts.valid).toBe(true);
    expect(parts.found.equals(parts.expected)).toBe(true);
  });

  it('should report a checksum mismatch', () => {
    const decoded = decodeBase58(G_P2PKH_ADDRESS);
    if (!decoded) throw new Error('fixture did not decode');
    decoded[24] ^= 0x01;

    const parts = splitChecksum(decoded);
    expect(parts.valid).toBe(false);
    expect(parts.found.equals(parts.expected)).toBe(false);
  });

  it('should return undefined for characters outside the alphabet', () => {
    expect(decodeBase58('0OIl')).toBeUndefined();
  });

  it('should keep leading zero bytes as leading ones', () => {
    const text = encodeBase58Check(Buffer.from([0x00, 0x00, 0x01]));
    expect(text.startsWith('11')).toBe(true);
    expect(decodeBase58(text)?.subarray(0, 3).toString('hex')).toBe('000001');
  });
});

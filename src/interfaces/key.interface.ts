/**
 * Key Interfaces
 * Shared types for key generation and derivation
 */

import type { Buffer } from 'node:buffer';

import type { Logger } from '../utils/logger.ts';

/**
 * Cryptographically secure byte source supplied by the caller, e.g.
 * `(size) => crypto.randomBytes(size)`.
 */
export type RandomSource = (size: number) => Buffer;

export interface DeriveOptions {
  logger?: Logger;
}

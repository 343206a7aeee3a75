/**
 * @module Encoders
 * @description Base58Check framing shared by addresses, WIF keys and extended keys.
 */

export * from './base58check.ts';

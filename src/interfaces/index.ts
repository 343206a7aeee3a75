/**
 * Shared types for keys, addresses, networks and transactions
 */

export * from './address.interface.ts';
export * from './key.interface.ts';
export * from './network.interface.ts';
export * from './transaction.interface.ts';

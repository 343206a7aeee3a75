/**
 * Utility Functions
 */

export * from './crypto.ts';
export * from './logger.ts';
export * from './type-guards.ts';

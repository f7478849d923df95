/**
 * Linear provider for credential checks
 */

export * from './types.js';
export * from './auth.js';

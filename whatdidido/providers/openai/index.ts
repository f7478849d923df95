/**
 * OpenAI service integration for credential checks
 */

export * from './types.js';
export * from './auth.js';

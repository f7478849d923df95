/**
 * Shared configuration types and their runtime schemas
 */

export type * from './types.js';
export * from './validation.js';

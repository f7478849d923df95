/**
 * GitHub provider for credential checks
 *
 * Uses the GitHub GraphQL API to confirm who a token belongs to.
 */

export * from './types.js';
export * from './auth.js';
export { VIEWER_QUERY } from './queries.js';

/**
 * Status Command
 *
 * Checks every provider: local completeness first, then one live
 * authentication round trip for the complete ones.
 */

import type { AppContext } from '../context.js';
import { checkProviders, type ProviderCheck } from '../registry.js';
import { ui } from '../ui.js';

export type StatusResult = {
  checks: ProviderCheck[];
  /** Number of providers whose credentials were accepted */
  authenticated: number;
};

export async function status(ctx: AppContext): Promise<StatusResult> {
  await ctx.store.ensureStoreExists();
  const checks = await checkProviders(ctx.store, ctx.providers);
  return {
    checks,
    authenticated: checks.filter((check) => check.status === 'authenticated').length,
  };
}

/**
 * One plain status line per provider
 */
export function describeCheck(check: ProviderCheck): string {
  switch (check.status) {
    case 'not_configured': {
      const { missingKeys, invalidKeys } = check.error;
      const problems = [
        ...(missingKeys.length > 0 ? [`missing ${missingKeys.join(', ')}`] : []),
        ...Object.keys(invalidKeys).map((key) => `invalid ${key}`),
      ];
      return `${check.displayName}: not configured (${problems.join('; ')})`;
    }
    case 'authenticated': {
      const { account, server } = check.result.metadata;
      const who = account ? ` as ${account}` : '';
      const where = server ? ` on ${server}` : '';
      return `${check.displayName}: authenticated${who}${where}`;
    }
    case 'auth_failed':
      return `${check.displayName}: authentication failed (${check.result.reason})`;
  }
}

export function formatCheck(check: ProviderCheck): string {
  const line = describeCheck(check);
  switch (check.status) {
    case 'authenticated':
      return `${ui.symbols.success} ${line}`;
    case 'auth_failed':
      return `${ui.symbols.error} ${line}`;
    case 'not_configured':
      return `${ui.symbols.inactive} ${ui.muted(line)}`;
  }
}

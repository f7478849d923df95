/**
 * Config Command
 *
 * Shows the config file with secret values masked.
 */

import type { AppContext } from '../context.js';
import type { RegisteredProvider } from '../registry.js';

const SENSITIVE_MARKERS = ['API_KEY', 'TOKEN', 'PASSWORD', 'SECRET'];

export type ConfigView = {
  path: string;
  exists: boolean;
  /** Lines as they would be printed, secrets masked */
  lines: string[];
};

/**
 * Keep the first and last four characters of long secrets, hide short ones entirely
 */
export function maskValue(value: string): string {
  if (value.length === 0) {
    return '';
  }
  if (value.length > 8) {
    return `${value.slice(0, 4)}...${value.slice(-4)}`;
  }
  return '****';
}

export function isSecretKey(key: string, providers: readonly RegisteredProvider[]): boolean {
  if (providers.some((provider) => provider.model.secretKeys.includes(key))) {
    return true;
  }
  const upper = key.toUpperCase();
  return SENSITIVE_MARKERS.some((marker) => upper.includes(marker));
}

export async function showConfig(ctx: AppContext): Promise<ConfigView> {
  const exists = await ctx.store.exists();
  const lines = exists ? await ctx.store.readLines() : [];

  return {
    path: ctx.store.path,
    exists,
    lines: lines.map((line) => {
      if (!line.entry || !isSecretKey(line.entry.key, ctx.providers)) {
        return line.raw;
      }
      return `${line.entry.key}=${maskValue(line.entry.value)}`;
    }),
  };
}

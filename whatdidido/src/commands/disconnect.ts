/**
 * Disconnect Command
 *
 * Removes providers' keys from the config file in one write. Keys of other
 * providers and unknown keys stay untouched.
 */

import { findProvider } from '../../providers/index.js';
import type { ProviderId, RawConfig } from '../../schemas/index.js';
import type { AppContext } from '../context.js';
import { WhatDidIDoError } from '../errors.js';
import { log } from '../log.js';
import type { RegisteredProvider } from '../registry.js';

export type DisconnectOptions = {
  /** Provider ids or names; defaults to every provider with stored keys */
  providers?: string[];
};

export type DisconnectResult = {
  removed: Array<{ provider: ProviderId; displayName: string; keys: string[] }>;
};

/**
 * Providers with at least one key present in the file
 */
export function storedProviders(
  providers: readonly RegisteredProvider[],
  raw: RawConfig
): RegisteredProvider[] {
  return providers.filter((provider) =>
    provider.model.keys.some((key) => Object.prototype.hasOwnProperty.call(raw, key))
  );
}

/**
 * Resolve provider names given on the command line
 * @throws WhatDidIDoError for unknown names
 */
export function resolveProviders(
  providers: readonly RegisteredProvider[],
  names: readonly string[]
): RegisteredProvider[] {
  const resolved: RegisteredProvider[] = [];
  const unknown: string[] = [];

  for (const name of names) {
    const provider = findProvider(providers, name);
    if (!provider) {
      unknown.push(name);
    } else if (!resolved.includes(provider)) {
      resolved.push(provider);
    }
  }

  if (unknown.length > 0) {
    const known = providers.map((provider) => provider.id).join(', ');
    throw new WhatDidIDoError(`Unknown provider: ${unknown.join(', ')} (available: ${known})`);
  }

  return resolved;
}

export async function disconnect(
  ctx: AppContext,
  options: DisconnectOptions = {}
): Promise<DisconnectResult> {
  const raw = await ctx.store.readAll();
  const targets =
    options.providers && options.providers.length > 0
      ? resolveProviders(ctx.providers, options.providers)
      : storedProviders(ctx.providers, raw);

  if (targets.length === 0) {
    return { removed: [] };
  }

  const removedKeys = new Set(
    await ctx.store.removeMany(targets.flatMap((provider) => provider.model.keys))
  );

  const removed: DisconnectResult['removed'] = [];
  for (const provider of targets) {
    const keys = provider.model.keys.filter((key) => removedKeys.has(key));
    if (keys.length === 0) {
      log.debug(`${provider.displayName} has no stored keys`);
      continue;
    }
    removed.push({ provider: provider.id, displayName: provider.displayName, keys });
  }

  return { removed };
}

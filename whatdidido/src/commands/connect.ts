/**
 * Connect Command
 *
 * Stores credentials for one provider and checks them. The values are
 * validated against the provider's model before anything is written, and
 * all keys for the provider land in a single batch.
 */

import type { ProviderId } from '../../schemas/index.js';
import type { AppContext } from '../context.js';
import type { ValidationError } from '../errors.js';
import type { ProviderCheck, RegisteredProvider } from '../registry.js';

export type ConnectResult =
  | { saved: false; provider: ProviderId; error: ValidationError }
  | { saved: true; provider: ProviderId; keys: string[]; check: ProviderCheck };

/**
 * Current values for a provider's keys, with defaults for absent optional keys
 */
export async function currentValues(
  ctx: AppContext,
  provider: RegisteredProvider
): Promise<Record<string, string>> {
  const raw = await ctx.store.readAll();
  const values: Record<string, string> = {};
  for (const key of provider.model.keys) {
    const stored = raw[key];
    if (stored !== undefined && stored !== '') {
      values[key] = stored;
    } else if (key in provider.model.optionalKeys) {
      values[key] = provider.model.optionalKeys[key] ?? '';
    }
  }
  return values;
}

/**
 * Validate, persist and authenticate one provider's values
 */
export async function connectProvider(
  ctx: AppContext,
  provider: RegisteredProvider,
  values: Readonly<Record<string, string>>
): Promise<ConnectResult> {
  const entries = provider.model.keys
    .filter((key) => values[key] !== undefined)
    .map((key): [string, string] => [key, (values[key] ?? '').trim()]);

  const raw = await ctx.store.readAll();
  const merged = { ...raw, ...Object.fromEntries(entries) };

  const loaded = provider.model.load(merged);
  if (!loaded.ok) {
    return { saved: false, provider: provider.id, error: loaded.error };
  }

  await ctx.store.upsertMany(entries);
  const check = await provider.verify(await ctx.store.readAll());

  return {
    saved: true,
    provider: provider.id,
    keys: entries.map(([key]) => key),
    check,
  };
}

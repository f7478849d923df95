/**
 * Provider registry
 *
 * Wraps each typed provider descriptor into a uniform RegisteredProvider and
 * runs the per-invocation state machine:
 *
 *   unconfigured -> not_configured
 *   configured   -> authenticated | auth_failed
 *
 * Every state is terminal; retries belong to the caller.
 */

import type {
  AuthFailure,
  AuthSuccess,
  ProviderId,
  ProviderKind,
  RawConfig,
} from '../schemas/index.js';
import type { ProviderDescriptor } from '../providers/types.js';
import type { ProviderConfigModel } from './config-model.js';
import type { CredentialStore } from './config-store.js';
import type { ValidationError } from './errors.js';
import { log } from './log.js';

export type ProviderStatus = 'not_configured' | 'authenticated' | 'auth_failed';

export type ProviderCheck =
  | { status: 'not_configured'; provider: ProviderId; displayName: string; error: ValidationError }
  | { status: 'authenticated'; provider: ProviderId; displayName: string; result: AuthSuccess }
  | { status: 'auth_failed'; provider: ProviderId; displayName: string; result: AuthFailure };

/**
 * A provider with its config type erased, so different providers can share a list
 */
export interface RegisteredProvider {
  readonly id: ProviderId;
  readonly displayName: string;
  readonly kind: ProviderKind;
  readonly model: ProviderConfigModel<unknown>;
  checkConfigured(raw: RawConfig): boolean;
  /**
   * Load the typed config and, when complete, authenticate once
   */
  verify(raw: RawConfig): Promise<ProviderCheck>;
}

export function registerProvider<TConfig>(descriptor: ProviderDescriptor<TConfig>): RegisteredProvider {
  const { id, displayName, kind, model, authenticator } = descriptor;

  return {
    id,
    displayName,
    kind,
    model,
    checkConfigured: (raw) => authenticator.checkConfigured(raw),
    async verify(raw) {
      const loaded = model.load(raw);
      if (!loaded.ok) {
        log.debug(`[${id}] ${loaded.error.message}`);
        return { status: 'not_configured', provider: id, displayName, error: loaded.error };
      }

      const result = await authenticator.authenticate(loaded.config);
      if (result.ok) {
        return { status: 'authenticated', provider: id, displayName, result };
      }
      return { status: 'auth_failed', provider: id, displayName, result };
    },
  };
}

/**
 * Check several providers against one snapshot of the config file.
 * Authentication round trips run concurrently; results keep the input order.
 */
export async function checkProviders(
  store: CredentialStore,
  providers: readonly RegisteredProvider[]
): Promise<ProviderCheck[]> {
  const raw = await store.readAll();
  return Promise.all(providers.map((provider) => provider.verify(raw)));
}

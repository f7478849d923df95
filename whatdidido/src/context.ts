/**
 * Application context: everything a command needs, built once per process
 */

import { listProviders, type ProviderDeps } from '../providers/index.js';
import { CredentialStore } from './config-store.js';
import type { RegisteredProvider } from './registry.js';
import type { Settings } from './settings.js';

export interface AppContext {
  settings: Settings;
  store: CredentialStore;
  providers: RegisteredProvider[];
}

export function createAppContext(
  settings: Settings,
  deps: Pick<ProviderDeps, 'fetch'> = {}
): AppContext {
  return {
    settings,
    store: new CredentialStore(settings.configPath),
    providers: listProviders({ fetch: deps.fetch, timeoutMs: settings.authTimeoutMs }),
  };
}

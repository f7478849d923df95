/**
 * Contract every provider implements
 *
 * A provider bundles a config model (what keys it needs) with an
 * authenticator (one live round trip proving the keys work). The registry
 * only ever talks to providers through these interfaces.
 */

import type { AuthResult, ProviderId, ProviderKind, RawConfig } from '../schemas/index.js';
import type { ProviderConfigModel } from '../src/config-model.js';

export type FetchFn = typeof globalThis.fetch;

/**
 * Collaborators injected into every provider
 */
export interface ProviderDeps {
  /** HTTP implementation, defaults to the global fetch */
  fetch?: FetchFn;
  /** Upper bound for one authentication round trip */
  timeoutMs?: number;
}

export interface ProviderAuthenticator<TConfig> {
  /**
   * Structural check only, no I/O
   */
  checkConfigured(raw: RawConfig): boolean;
  /**
   * One round trip to the provider's identity endpoint.
   * Resolves with a failed AuthResult instead of rejecting.
   */
  authenticate(config: Readonly<TConfig>): Promise<AuthResult>;
}

export interface ProviderDescriptor<TConfig> {
  readonly id: ProviderId;
  readonly displayName: string;
  readonly kind: ProviderKind;
  readonly model: ProviderConfigModel<TConfig>;
  readonly authenticator: ProviderAuthenticator<TConfig>;
}

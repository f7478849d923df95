/**
 * Provider identifiers supported by the configuration subsystem
 */
export type ProviderId = 'jira' | 'github' | 'linear' | 'openai';

/**
 * Data sources yield work items; services (AI summarisation) only consume them
 */
export type ProviderKind = 'data-source' | 'service';

/**
 * Parsed contents of the config file: `KEY -> VALUE`, in file order
 */
export type RawConfig = Record<string, string>;

/**
 * A single `KEY=VALUE` pair
 */
export interface ConfigEntry {
  key: string;
  value: string;
}

/**
 * Provider-reported details shown after a successful check
 */
export interface AuthMetadata {
  /** Account identity, e.g. login or display name with email */
  account?: string;
  /** Server or API host the credentials were checked against */
  server?: string;
  /** Extra provider-specific facts (account id, model count, ...) */
  details: Record<string, string>;
}

/**
 * Why a live authentication attempt failed
 */
export type AuthFailureCause = 'unauthorized' | 'http' | 'network' | 'timeout' | 'malformed';

export interface AuthSuccess {
  ok: true;
  provider: ProviderId;
  metadata: AuthMetadata;
}

export interface AuthFailure {
  ok: false;
  provider: ProviderId;
  /** Human-readable, provider-specific reason */
  reason: string;
  cause: AuthFailureCause;
  /** HTTP status when the remote answered */
  status?: number;
}

/**
 * Outcome of one authentication round trip. Never persisted.
 */
export type AuthResult = AuthSuccess | AuthFailure;

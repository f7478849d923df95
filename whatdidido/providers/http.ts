/**
 * HTTP plumbing shared by the provider authenticators
 *
 * requestJson performs a single request and turns every way it can go wrong
 * into an AuthFailureError; authenticateWith is the boundary that converts
 * those into AuthResult values.
 */

import type { z } from 'zod';
import type { AuthMetadata, AuthResult, ProviderId } from '../schemas/index.js';
import { formatValidationErrors } from '../schemas/index.js';
import { AuthFailureError, getErrorMessage } from '../src/errors.js';
import { log } from '../src/log.js';
import type { FetchFn, ProviderDeps } from './types.js';

export const DEFAULT_TIMEOUT_MS = 10_000;

export const USER_AGENT = 'whatdidido/1.0';

export interface RequestJsonOptions<T> {
  /** Display name used in failure reasons */
  service: string;
  url: string;
  init: RequestInit;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  deps: ProviderDeps;
}

/**
 * Execute one JSON request against a provider API
 * @throws AuthFailureError describing the failure
 */
export async function requestJson<T>(options: RequestJsonOptions<T>): Promise<T> {
  const { service, url, init, schema, deps } = options;
  const fetchFn: FetchFn = deps.fetch ?? globalThis.fetch;
  const timeoutMs = deps.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  log.debug(`${init.method ?? 'GET'} ${url}`);

  let response: Response;
  try {
    response = await fetchFn(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    if (isTimeout(error)) {
      throw new AuthFailureError(`${service} did not respond within ${timeoutMs} ms`, 'timeout');
    }
    throw new AuthFailureError(`Could not reach ${service}: ${describeNetworkError(error)}`, 'network');
  }

  log.debug(`${service} responded ${statusLine(response)}`);

  if (response.status === 401 || response.status === 403) {
    throw new AuthFailureError(
      `${service} rejected the credentials (${statusLine(response)})`,
      'unauthorized',
      response.status
    );
  }

  if (!response.ok) {
    throw new AuthFailureError(
      `${service} API error: ${statusLine(response)}`,
      'http',
      response.status
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    if (isTimeout(error)) {
      throw new AuthFailureError(`${service} did not respond within ${timeoutMs} ms`, 'timeout');
    }
    throw new AuthFailureError(`${service} returned a response that is not JSON`, 'malformed', response.status);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new AuthFailureError(
      `Unexpected response from ${service}: ${formatValidationErrors(parsed.error).join('; ')}`,
      'malformed',
      response.status
    );
  }

  return parsed.data;
}

/**
 * Run an authentication attempt and report its outcome as a value
 */
export async function authenticateWith(
  provider: ProviderId,
  attempt: () => Promise<AuthMetadata>
): Promise<AuthResult> {
  try {
    const metadata = await attempt();
    return { ok: true, provider, metadata };
  } catch (error) {
    if (error instanceof AuthFailureError) {
      log.debug(`[${provider}] ${error.failureCause}: ${error.message}`);
      return {
        ok: false,
        provider,
        reason: error.message,
        cause: error.failureCause,
        status: error.status,
      };
    }
    log.debug(`[${provider}] unexpected failure: ${getErrorMessage(error)}`);
    return { ok: false, provider, reason: getErrorMessage(error), cause: 'network' };
  }
}

function statusLine(response: Response): string {
  return `${response.status} ${response.statusText}`.trim();
}

function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

function isTimeout(error: unknown): boolean {
  const name = errorName(error);
  return name === 'TimeoutError' || name === 'AbortError';
}

function describeNetworkError(error: unknown): string {
  const message = getErrorMessage(error);
  if (error instanceof Error && error.cause !== undefined) {
    return `${message} (${getErrorMessage(error.cause)})`;
  }
  return message;
}

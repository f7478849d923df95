/**
 * Error taxonomy
 *
 * - StorageError: the config location cannot be created, read or written. Fatal.
 * - ValidationError: required keys missing or malformed. Recoverable, re-prompt.
 * - AuthFailureError: raised inside an authenticator only; surfaces as a
 *   failed AuthResult value.
 */

import type { AuthFailureCause, ProviderId } from '../schemas/index.js';

export class WhatDidIDoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class StorageError extends WhatDidIDoError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${getErrorMessage(cause)}`, { cause });
    this.path = path;
  }
}

export class ValidationError extends WhatDidIDoError {
  readonly provider?: ProviderId;
  /** Required keys that are absent or blank */
  readonly missingKeys: readonly string[];
  /** Keys that are present but fail their schema, with the reason */
  readonly invalidKeys: Readonly<Record<string, string>>;

  constructor(options: {
    provider?: ProviderId;
    missingKeys?: readonly string[];
    invalidKeys?: Record<string, string>;
    label?: string;
  }) {
    const missingKeys = options.missingKeys ?? [];
    const invalidKeys = options.invalidKeys ?? {};
    super(
      describeValidation(
        options.label ?? (options.provider ? `${options.provider} configuration` : undefined),
        missingKeys,
        invalidKeys
      )
    );
    this.provider = options.provider;
    this.missingKeys = missingKeys;
    this.invalidKeys = invalidKeys;
  }
}

export class AuthFailureError extends WhatDidIDoError {
  readonly failureCause: AuthFailureCause;
  readonly status?: number;

  constructor(message: string, failureCause: AuthFailureCause, status?: number) {
    super(message);
    this.failureCause = failureCause;
    this.status = status;
  }
}

function describeValidation(
  label: string | undefined,
  missingKeys: readonly string[],
  invalidKeys: Record<string, string>
): string {
  const parts: string[] = [];
  if (missingKeys.length > 0) {
    parts.push(`missing ${missingKeys.join(', ')}`);
  }
  for (const [key, reason] of Object.entries(invalidKeys)) {
    parts.push(`${key}: ${reason}`);
  }
  const prefix = label ? `Invalid ${label}` : 'Invalid configuration';
  return parts.length > 0 ? `${prefix} (${parts.join('; ')})` : prefix;
}

/**
 * Safely extract an error message from any error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

type NodeError = Error & { code?: string };

export function isNodeError(error: unknown): error is NodeError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

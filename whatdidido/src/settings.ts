/**
 * Process-wide settings, resolved once at startup and passed down explicitly.
 *
 * Environment:
 *   WHATDIDIDO_HOME             config directory (default ~/.whatdidido)
 *   WHATDIDIDO_AUTH_TIMEOUT_MS  per-provider authentication timeout (default 10000)
 *   DEBUG                       "1" or "true" enables debug logging
 */

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { formatValidationErrors } from '../schemas/index.js';
import { WhatDidIDoError } from './errors.js';

export const CONFIG_DIRNAME = '.whatdidido';
export const CONFIG_FILENAME = 'config.env';
export const DEFAULT_AUTH_TIMEOUT_MS = 10_000;

export interface Settings {
  configDir: string;
  configPath: string;
  authTimeoutMs: number;
  debug: boolean;
}

const EnvSchema = z.object({
  WHATDIDIDO_HOME: z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined)),
  WHATDIDIDO_AUTH_TIMEOUT_MS: z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined))
    .pipe(z.coerce.number().int().positive().max(300_000).optional()),
  DEBUG: z
    .string()
    .optional()
    .transform((value) => value === '1' || value?.toLowerCase() === 'true'),
});

/**
 * Resolve settings from an environment map
 * @throws WhatDidIDoError listing every invalid variable
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env,
  home: string = homedir()
): Settings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new WhatDidIDoError(
      `Invalid environment: ${formatValidationErrors(parsed.error).join('; ')}`
    );
  }

  const configDir = parsed.data.WHATDIDIDO_HOME ?? join(home, CONFIG_DIRNAME);

  return {
    configDir,
    configPath: join(configDir, CONFIG_FILENAME),
    authTimeoutMs: parsed.data.WHATDIDIDO_AUTH_TIMEOUT_MS ?? DEFAULT_AUTH_TIMEOUT_MS,
    debug: parsed.data.DEBUG,
  };
}

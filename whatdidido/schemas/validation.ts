/**
 * Zod schemas for runtime validation of configuration data.
 * Provider models compose their field schemas from the primitives below.
 */

import { z } from 'zod';

/**
 * Provider identifiers supported by the configuration subsystem
 */
export const ProviderIdSchema = z.enum(['jira', 'github', 'linear', 'openai']);

/**
 * Config keys are uppercase identifiers such as `JIRA_API_KEY`
 */
const CONFIG_KEY_REGEX = /^[A-Z][A-Z0-9_]*$/;

export const ConfigKeySchema = z.string().regex(CONFIG_KEY_REGEX, {
  message: 'Key must be an uppercase identifier (e.g. JIRA_API_KEY)',
});

/**
 * Values are stored one per line, so they cannot carry line breaks
 */
export const ConfigValueSchema = z.string().refine((value) => !/[\r\n]/.test(value), {
  message: 'Value must not contain line breaks',
});

export const ConfigEntrySchema = z.object({
  key: ConfigKeySchema,
  value: ConfigValueSchema,
});

/**
 * Plain setting: present and non-blank
 */
export const SettingSchema = z.string().trim().min(1, 'Value is required');

/**
 * Secret token or API key. Whitespace inside a token is always a paste error.
 */
export const TokenSchema = z
  .string()
  .trim()
  .min(1, 'Value is required')
  .regex(/^\S+$/, { message: 'Token must not contain whitespace' });

/**
 * http(s) URL, normalised without a trailing slash
 */
export const HttpUrlSchema = z
  .string()
  .trim()
  .url({ message: 'Must be a valid URL (e.g. https://example.atlassian.net)' })
  .refine((value) => /^https?:\/\//i.test(value), {
    message: 'URL must start with http:// or https://',
  })
  .transform((value) => value.replace(/\/+$/, ''));

// Type exports inferred from schemas
export type ValidatedProviderId = z.infer<typeof ProviderIdSchema>;
export type ValidatedConfigEntry = z.infer<typeof ConfigEntrySchema>;

/**
 * Validate a key/value pair before it is written
 * @throws ZodError if validation fails
 */
export function validateConfigEntry(data: unknown): ValidatedConfigEntry {
  return ConfigEntrySchema.parse(data);
}

/**
 * Validate a key/value pair safely (returns result object)
 */
export function safeValidateConfigEntry(
  data: unknown
): z.SafeParseReturnType<unknown, ValidatedConfigEntry> {
  return ConfigEntrySchema.safeParse(data);
}

/**
 * Format Zod errors into actionable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

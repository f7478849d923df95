/**
 * Typed provider configuration models
 *
 * A model projects the raw key/value map onto one provider's keys: required
 * keys must be present and non-blank, optional keys fall back to their
 * defaults, and every field passes its zod schema. A config object exists
 * only when all of that holds.
 */

import { z } from 'zod';
import type { ProviderId, ProviderKind, RawConfig } from '../schemas/index.js';
import { ValidationError } from './errors.js';

export type LoadResult<TConfig> =
  | { ok: true; config: Readonly<TConfig> }
  | { ok: false; error: ValidationError };

/**
 * Field-agnostic view of a model, as seen by the registry and the CLI
 */
export interface ProviderConfigModel<TConfig> {
  readonly id: ProviderId;
  readonly displayName: string;
  readonly kind: ProviderKind;
  readonly requiredKeys: readonly string[];
  /** Optional keys and the value used when they are absent */
  readonly optionalKeys: Readonly<Record<string, string>>;
  /** Keys whose values are masked on display and prompted without echo */
  readonly secretKeys: readonly string[];
  /** Every key the model reads, required first */
  readonly keys: readonly string[];
  load(raw: RawConfig): LoadResult<TConfig>;
  isConfigured(raw: RawConfig): boolean;
}

export interface ConfigModelDefinition<TFields extends z.ZodRawShape, TConfig> {
  id: ProviderId;
  displayName: string;
  kind: ProviderKind;
  /** One schema per config key */
  fields: TFields;
  requiredKeys: ReadonlyArray<keyof TFields & string>;
  /** Value used for each optional key when it is absent or blank */
  defaults?: Readonly<Record<string, string>>;
  secretKeys?: ReadonlyArray<keyof TFields & string>;
  toConfig(values: z.output<z.ZodObject<TFields>>): TConfig;
}

type FieldCheck<TValues> =
  | { ok: true; values: TValues }
  | { ok: false; error: ValidationError };

export class ConfigModel<TFields extends z.ZodRawShape, TConfig>
  implements ProviderConfigModel<TConfig>
{
  readonly id: ProviderId;
  readonly displayName: string;
  readonly kind: ProviderKind;
  readonly requiredKeys: readonly string[];
  readonly optionalKeys: Readonly<Record<string, string>>;
  readonly secretKeys: readonly string[];
  readonly keys: readonly string[];

  private readonly schema: z.ZodObject<TFields>;

  constructor(private readonly definition: ConfigModelDefinition<TFields, TConfig>) {
    this.id = definition.id;
    this.displayName = definition.displayName;
    this.kind = definition.kind;
    this.schema = z.object(definition.fields);

    const required = new Set<string>(definition.requiredKeys);
    const optional: Record<string, string> = {};
    for (const key of Object.keys(definition.fields)) {
      if (required.has(key)) {
        continue;
      }
      const fallback = definition.defaults?.[key];
      if (fallback === undefined) {
        throw new Error(`${definition.displayName}: optional key ${key} needs a default`);
      }
      optional[key] = fallback;
    }

    this.requiredKeys = [...definition.requiredKeys];
    this.optionalKeys = Object.freeze(optional);
    this.secretKeys = [...(definition.secretKeys ?? [])];
    this.keys = [...this.requiredKeys, ...Object.keys(optional)];
  }

  /**
   * Build the typed config, or report exactly which keys are missing or malformed
   */
  load(raw: RawConfig): LoadResult<TConfig> {
    const checked = this.check(raw);
    if (!checked.ok) {
      return checked;
    }
    return { ok: true, config: Object.freeze(this.definition.toConfig(checked.values)) };
  }

  isConfigured(raw: RawConfig): boolean {
    return this.check(raw).ok;
  }

  private check(raw: RawConfig): FieldCheck<z.output<z.ZodObject<TFields>>> {
    const missingKeys = this.requiredKeys.filter((key) => readValue(raw, key) === '');

    const projection: Record<string, string> = {};
    for (const key of this.keys) {
      const value = readValue(raw, key);
      projection[key] = value === '' ? (this.optionalKeys[key] ?? '') : value;
    }

    const parsed = this.schema.safeParse(projection);
    if (parsed.success && missingKeys.length === 0) {
      return { ok: true, values: parsed.data };
    }

    const invalidKeys: Record<string, string> = {};
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        const key = String(issue.path[0] ?? '');
        if (key === '' || missingKeys.includes(key) || key in invalidKeys) {
          continue;
        }
        invalidKeys[key] = issue.message;
      }
    }

    return {
      ok: false,
      error: new ValidationError({
        provider: this.id,
        label: `${this.displayName} configuration`,
        missingKeys,
        invalidKeys,
      }),
    };
  }
}

function readValue(raw: RawConfig, key: string): string {
  return Object.prototype.hasOwnProperty.call(raw, key) ? (raw[key] ?? '').trim() : '';
}

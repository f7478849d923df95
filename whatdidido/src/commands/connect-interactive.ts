/**
 * Interactive connect flow
 *
 * Prompts for the providers to set up and their keys, then hands the
 * answers to connectProvider. Invalid answers are re-prompted.
 */

import * as p from '@clack/prompts';
import type { AppContext } from '../context.js';
import { WhatDidIDoError } from '../errors.js';
import { log } from '../log.js';
import type { RegisteredProvider } from '../registry.js';
import { formatCheck } from './status.js';
import { connectProvider, currentValues, type ConnectResult } from './connect.js';
import { resolveProviders } from './disconnect.js';

const MAX_ATTEMPTS = 3;

export class PromptCancelledError extends WhatDidIDoError {
  constructor() {
    super('Setup cancelled');
  }
}

function unwrap<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    throw new PromptCancelledError();
  }
  return value;
}

async function selectProviders(ctx: AppContext): Promise<RegisteredProvider[]> {
  const raw = await ctx.store.readAll();
  const selected = unwrap(
    await p.multiselect({
      message: 'Which integrations would you like to connect?',
      options: ctx.providers.map((provider) => ({
        value: provider.id,
        label: provider.displayName,
        hint: provider.checkConfigured(raw) ? 'configured' : provider.kind,
      })),
      required: true,
    })
  );
  return resolveProviders(ctx.providers, selected.map((value) => String(value)));
}

async function promptValues(
  provider: RegisteredProvider,
  current: Record<string, string>,
  invalid: ReadonlySet<string>
): Promise<Record<string, string>> {
  const values: Record<string, string> = {};
  const { model } = provider;

  for (const key of model.keys) {
    const isRequired = model.requiredKeys.includes(key);
    const existing = current[key] ?? '';
    const flag = invalid.has(key) ? ' (previous value was invalid)' : '';

    if (model.secretKeys.includes(key)) {
      const answer = unwrap(
        await p.password({
          message: `${provider.displayName} ${key}${existing ? ' (leave empty to keep the stored value)' : ''}${flag}`,
          validate: (value) => (!value && !existing && isRequired ? `${key} is required` : undefined),
        })
      );
      values[key] = answer || existing;
      continue;
    }

    const answer = unwrap(
      await p.text({
        message: `${provider.displayName} ${key}${flag}`,
        initialValue: existing,
        placeholder: model.optionalKeys[key],
        validate: (value) => (!value.trim() && isRequired ? `${key} is required` : undefined),
      })
    );
    values[key] = answer.trim() || (model.optionalKeys[key] ?? '');
  }

  return values;
}

async function connectInteractively(
  ctx: AppContext,
  provider: RegisteredProvider
): Promise<ConnectResult | null> {
  const raw = await ctx.store.readAll();
  if (provider.checkConfigured(raw)) {
    const reconfigure = unwrap(
      await p.confirm({
        message: `${provider.displayName} is already configured. Do you want to reconfigure it?`,
        initialValue: false,
      })
    );
    if (!reconfigure) {
      const check = await provider.verify(raw);
      log.info(formatCheck(check));
      return null;
    }
  }

  let invalid = new Set<string>();
  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    const values = await promptValues(provider, await currentValues(ctx, provider), invalid);
    const result = await connectProvider(ctx, provider, values);
    if (result.saved) {
      return result;
    }
    log.warn(result.error.message);
    invalid = new Set([...result.error.missingKeys, ...Object.keys(result.error.invalidKeys)]);
  }

  throw new WhatDidIDoError(`${provider.displayName} was not configured after ${MAX_ATTEMPTS} attempts`);
}

/**
 * Run the interactive setup for the named providers, or ask which ones
 */
export async function runConnect(ctx: AppContext, names: readonly string[]): Promise<ConnectResult[]> {
  await ctx.store.ensureStoreExists();
  p.intro('whatdidido setup');

  const providers =
    names.length > 0 ? resolveProviders(ctx.providers, names) : await selectProviders(ctx);

  const results: ConnectResult[] = [];
  for (const provider of providers) {
    log.info(`Setting up ${provider.displayName}...`);
    const result = await connectInteractively(ctx, provider);
    if (!result) {
      continue;
    }
    if (result.saved) {
      log.info(formatCheck(result.check));
    }
    results.push(result);
  }

  p.outro(`Configuration saved to ${ctx.store.path}`);
  return results;
}

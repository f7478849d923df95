/**
 * OpenAI service integration: config model and credential check
 *
 * GET /models is the cheapest authenticated call; the listing also tells
 * whether the configured models are reachable with this key.
 */

import { ConfigModel } from '../../src/config-model.js';
import { HttpUrlSchema, SettingSchema, TokenSchema } from '../../schemas/index.js';
import { authenticateWith, requestJson, USER_AGENT } from '../http.js';
import type { ProviderAuthenticator, ProviderDeps, ProviderDescriptor } from '../types.js';
import type { OpenAIConfig } from './types.js';
import {
  DEFAULT_OPENAI_BASE_URL,
  DEFAULT_SUMMARY_MODEL,
  DEFAULT_WORKITEM_SUMMARY_MODEL,
  OPENAI_API_KEY,
  OPENAI_BASE_URL,
  OPENAI_SUMMARY_MODEL,
  OPENAI_WORKITEM_SUMMARY_MODEL,
  OpenAIModelListSchema,
} from './types.js';

export const openaiConfigModel = new ConfigModel({
  id: 'openai',
  displayName: 'OpenAI',
  kind: 'service',
  fields: {
    [OPENAI_API_KEY]: TokenSchema,
    [OPENAI_BASE_URL]: HttpUrlSchema,
    [OPENAI_WORKITEM_SUMMARY_MODEL]: SettingSchema,
    [OPENAI_SUMMARY_MODEL]: SettingSchema,
  },
  requiredKeys: [OPENAI_API_KEY],
  defaults: {
    [OPENAI_BASE_URL]: DEFAULT_OPENAI_BASE_URL,
    [OPENAI_WORKITEM_SUMMARY_MODEL]: DEFAULT_WORKITEM_SUMMARY_MODEL,
    [OPENAI_SUMMARY_MODEL]: DEFAULT_SUMMARY_MODEL,
  },
  secretKeys: [OPENAI_API_KEY],
  toConfig: (values): OpenAIConfig => ({
    apiKey: values[OPENAI_API_KEY],
    baseUrl: values[OPENAI_BASE_URL],
    workItemSummaryModel: values[OPENAI_WORKITEM_SUMMARY_MODEL],
    summaryModel: values[OPENAI_SUMMARY_MODEL],
  }),
});

export function createOpenAIAuthenticator(deps: ProviderDeps = {}): ProviderAuthenticator<OpenAIConfig> {
  return {
    checkConfigured: (raw) => openaiConfigModel.isConfigured(raw),
    authenticate: (config) =>
      authenticateWith('openai', async () => {
        const list = await requestJson({
          service: 'OpenAI',
          url: `${config.baseUrl}/models`,
          init: {
            method: 'GET',
            headers: {
              Authorization: `Bearer ${config.apiKey}`,
              Accept: 'application/json',
              'User-Agent': USER_AGENT,
            },
          },
          schema: OpenAIModelListSchema,
          deps,
        });

        const available = new Set(list.data.map((model) => model.id));
        const missing = [config.workItemSummaryModel, config.summaryModel].filter(
          (model) => !available.has(model)
        );

        const details: Record<string, string> = { models: String(list.data.length) };
        if (missing.length > 0) {
          details.unavailableModels = [...new Set(missing)].join(', ');
        }

        return { server: config.baseUrl, details };
      }),
  };
}

export function createOpenAIProvider(deps: ProviderDeps = {}): ProviderDescriptor<OpenAIConfig> {
  return {
    id: 'openai',
    displayName: openaiConfigModel.displayName,
    kind: openaiConfigModel.kind,
    model: openaiConfigModel,
    authenticator: createOpenAIAuthenticator(deps),
  };
}

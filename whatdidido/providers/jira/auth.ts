/**
 * Jira provider: config model and credential check
 *
 * Authenticates with HTTP Basic (username + API token) against
 * GET /rest/api/2/myself, which fails with 401 for bad credentials.
 */

import { ConfigModel } from '../../src/config-model.js';
import { HttpUrlSchema, SettingSchema, TokenSchema } from '../../schemas/index.js';
import type { AuthMetadata } from '../../schemas/index.js';
import { authenticateWith, requestJson, USER_AGENT } from '../http.js';
import type { ProviderAuthenticator, ProviderDeps, ProviderDescriptor } from '../types.js';
import type { JiraConfig, JiraMyself } from './types.js';
import { JIRA_API_KEY, JIRA_URL, JIRA_USERNAME, JiraMyselfSchema } from './types.js';

export const jiraConfigModel = new ConfigModel({
  id: 'jira',
  displayName: 'Jira',
  kind: 'data-source',
  fields: {
    [JIRA_URL]: HttpUrlSchema,
    [JIRA_USERNAME]: SettingSchema,
    [JIRA_API_KEY]: TokenSchema,
  },
  requiredKeys: [JIRA_URL, JIRA_USERNAME, JIRA_API_KEY],
  secretKeys: [JIRA_API_KEY],
  toConfig: (values): JiraConfig => ({
    url: values[JIRA_URL],
    username: values[JIRA_USERNAME],
    apiKey: values[JIRA_API_KEY],
  }),
});

/**
 * Build the Basic auth header value for a Jira account
 */
export function basicAuthHeader(username: string, apiKey: string): string {
  return `Basic ${Buffer.from(`${username}:${apiKey}`, 'utf8').toString('base64')}`;
}

function toMetadata(config: Readonly<JiraConfig>, myself: JiraMyself): AuthMetadata {
  const details: Record<string, string> = {};
  const accountId = myself.accountId ?? myself.key ?? myself.name;
  if (accountId) {
    details.accountId = accountId;
  }

  return {
    account: myself.emailAddress ? `${myself.displayName} (${myself.emailAddress})` : myself.displayName,
    server: config.url,
    details,
  };
}

export function createJiraAuthenticator(deps: ProviderDeps = {}): ProviderAuthenticator<JiraConfig> {
  return {
    checkConfigured: (raw) => jiraConfigModel.isConfigured(raw),
    authenticate: (config) =>
      authenticateWith('jira', async () => {
        const myself = await requestJson({
          service: 'Jira',
          url: `${config.url}/rest/api/2/myself`,
          init: {
            method: 'GET',
            headers: {
              Authorization: basicAuthHeader(config.username, config.apiKey),
              Accept: 'application/json',
              'User-Agent': USER_AGENT,
            },
          },
          schema: JiraMyselfSchema,
          deps,
        });
        return toMetadata(config, myself);
      }),
  };
}

export function createJiraProvider(deps: ProviderDeps = {}): ProviderDescriptor<JiraConfig> {
  return {
    id: 'jira',
    displayName: jiraConfigModel.displayName,
    kind: jiraConfigModel.kind,
    model: jiraConfigModel,
    authenticator: createJiraAuthenticator(deps),
  };
}

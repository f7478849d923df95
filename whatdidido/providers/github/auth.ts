/**
 * GitHub provider: config model and credential check
 *
 * Uses the GraphQL viewer query, which needs no scopes beyond a valid token.
 */

import { ConfigModel } from '../../src/config-model.js';
import { AuthFailureError } from '../../src/errors.js';
import { HttpUrlSchema, TokenSchema } from '../../schemas/index.js';
import type { AuthMetadata } from '../../schemas/index.js';
import { authenticateWith, requestJson, USER_AGENT } from '../http.js';
import type { ProviderAuthenticator, ProviderDeps, ProviderDescriptor } from '../types.js';
import { VIEWER_QUERY } from './queries.js';
import type { GitHubConfig } from './types.js';
import {
  DEFAULT_GITHUB_API_URL,
  GITHUB_API_URL,
  GITHUB_TOKEN,
  GitHubViewerResponseSchema,
} from './types.js';

export const githubConfigModel = new ConfigModel({
  id: 'github',
  displayName: 'GitHub',
  kind: 'data-source',
  fields: {
    [GITHUB_TOKEN]: TokenSchema,
    [GITHUB_API_URL]: HttpUrlSchema,
  },
  requiredKeys: [GITHUB_TOKEN],
  defaults: { [GITHUB_API_URL]: DEFAULT_GITHUB_API_URL },
  secretKeys: [GITHUB_TOKEN],
  toConfig: (values): GitHubConfig => ({
    token: values[GITHUB_TOKEN],
    apiUrl: values[GITHUB_API_URL],
  }),
});

/**
 * Execute a GraphQL query against GitHub API
 */
async function executeViewerQuery(config: Readonly<GitHubConfig>, deps: ProviderDeps): Promise<AuthMetadata> {
  const json = await requestJson({
    service: 'GitHub',
    url: `${config.apiUrl}/graphql`,
    init: {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${config.token}`,
        'Content-Type': 'application/json',
        'User-Agent': USER_AGENT,
      },
      body: JSON.stringify({ query: VIEWER_QUERY, variables: {} }),
    },
    schema: GitHubViewerResponseSchema,
    deps,
  });

  if (json.errors?.length) {
    throw new AuthFailureError(
      `GitHub GraphQL errors: ${json.errors.map((e) => e.message).join(', ')}`,
      'malformed'
    );
  }

  if (!json.data) {
    throw new AuthFailureError('GitHub API returned no data', 'malformed');
  }

  const { login, name } = json.data.viewer;
  return {
    account: name ? `${name} (@${login})` : `@${login}`,
    server: config.apiUrl,
    details: { login },
  };
}

export function createGitHubAuthenticator(deps: ProviderDeps = {}): ProviderAuthenticator<GitHubConfig> {
  return {
    checkConfigured: (raw) => githubConfigModel.isConfigured(raw),
    authenticate: (config) => authenticateWith('github', () => executeViewerQuery(config, deps)),
  };
}

export function createGitHubProvider(deps: ProviderDeps = {}): ProviderDescriptor<GitHubConfig> {
  return {
    id: 'github',
    displayName: githubConfigModel.displayName,
    kind: githubConfigModel.kind,
    model: githubConfigModel,
    authenticator: createGitHubAuthenticator(deps),
  };
}

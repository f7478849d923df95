/**
 * Linear provider: config model and credential check
 */

import { ConfigModel } from '../../src/config-model.js';
import { AuthFailureError } from '../../src/errors.js';
import { TokenSchema } from '../../schemas/index.js';
import { authenticateWith, requestJson, USER_AGENT } from '../http.js';
import type { ProviderAuthenticator, ProviderDeps, ProviderDescriptor } from '../types.js';
import type { LinearConfig } from './types.js';
import {
  LINEAR_API_KEY,
  LINEAR_GRAPHQL_ENDPOINT,
  LinearViewerResponseSchema,
  VIEWER_QUERY,
} from './types.js';

export const linearConfigModel = new ConfigModel({
  id: 'linear',
  displayName: 'Linear',
  kind: 'data-source',
  fields: {
    [LINEAR_API_KEY]: TokenSchema,
  },
  requiredKeys: [LINEAR_API_KEY],
  secretKeys: [LINEAR_API_KEY],
  toConfig: (values): LinearConfig => ({ apiKey: values[LINEAR_API_KEY] }),
});

export function createLinearAuthenticator(deps: ProviderDeps = {}): ProviderAuthenticator<LinearConfig> {
  return {
    checkConfigured: (raw) => linearConfigModel.isConfigured(raw),
    authenticate: (config) =>
      authenticateWith('linear', async () => {
        const json = await requestJson({
          service: 'Linear',
          url: LINEAR_GRAPHQL_ENDPOINT,
          init: {
            method: 'POST',
            headers: {
              Authorization: config.apiKey,
              'Content-Type': 'application/json',
              'User-Agent': USER_AGENT,
            },
            body: JSON.stringify({ query: VIEWER_QUERY }),
          },
          schema: LinearViewerResponseSchema,
          deps,
        });

        // Linear reports a bad key as a GraphQL error with HTTP 200 in some cases
        if (json.errors?.length) {
          throw new AuthFailureError(
            `Linear GraphQL errors: ${json.errors.map((e) => e.message).join(', ')}`,
            'unauthorized'
          );
        }
        if (!json.data) {
          throw new AuthFailureError('Linear API returned no data', 'malformed');
        }

        const { id, name, email } = json.data.viewer;
        return {
          account: email ? `${name} (${email})` : name,
          server: 'api.linear.app',
          details: { id },
        };
      }),
  };
}

export function createLinearProvider(deps: ProviderDeps = {}): ProviderDescriptor<LinearConfig> {
  return {
    id: 'linear',
    displayName: linearConfigModel.displayName,
    kind: linearConfigModel.kind,
    model: linearConfigModel,
    authenticator: createLinearAuthenticator(deps),
  };
}

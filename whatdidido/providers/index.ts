/**
 * Provider implementations for checking credentials against each integration
 *
 * Each provider module exports:
 * - a ConfigModel declaring its required and optional keys
 * - an authenticator doing one identity round trip
 * - a create*Provider factory bundling the two
 *
 * Adding a provider means adding a directory here and one entry below.
 */

import { registerProvider, type RegisteredProvider } from '../src/registry.js';
import { createGitHubProvider } from './github/index.js';
import { createJiraProvider } from './jira/index.js';
import { createLinearProvider } from './linear/index.js';
import { createOpenAIProvider } from './openai/index.js';
import type { ProviderDeps } from './types.js';

export type {
  FetchFn,
  ProviderAuthenticator,
  ProviderDeps,
  ProviderDescriptor,
} from './types.js';
export { authenticateWith, requestJson, DEFAULT_TIMEOUT_MS } from './http.js';
export { createJiraProvider, jiraConfigModel, type JiraConfig } from './jira/index.js';
export { createGitHubProvider, githubConfigModel, type GitHubConfig } from './github/index.js';
export { createLinearProvider, linearConfigModel, type LinearConfig } from './linear/index.js';
export { createOpenAIProvider, openaiConfigModel, type OpenAIConfig } from './openai/index.js';

/**
 * Every known provider, data sources first
 */
export function listProviders(deps: ProviderDeps = {}): RegisteredProvider[] {
  return [
    registerProvider(createJiraProvider(deps)),
    registerProvider(createGitHubProvider(deps)),
    registerProvider(createLinearProvider(deps)),
    registerProvider(createOpenAIProvider(deps)),
  ];
}

/**
 * Look up a provider by id or display name, case-insensitively
 */
export function findProvider(
  providers: readonly RegisteredProvider[],
  name: string
): RegisteredProvider | undefined {
  const needle = name.trim().toLowerCase();
  return providers.find(
    (provider) => provider.id === needle || provider.displayName.toLowerCase() === needle
  );
}

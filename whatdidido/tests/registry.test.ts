import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { CredentialStore } from '../src/config-store.js';
import { checkProviders } from '../src/registry.js';
import { findProvider, listProviders } from '../providers/index.js';
import { getFetchUrl, jsonResponse, routeFetch } from './helpers/fetch.js';
import { makeTempDir, removeTempDir } from './helpers/tmp.js';

let dir: string;
let store: CredentialStore;

describe('provider registry', () => {
  beforeEach(async () => {
    dir = await makeTempDir('registry');
    store = new CredentialStore(join(dir, 'config.env'));
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should list every provider in a fixed order', () => {
    const providers = listProviders();

    expect(providers.map((provider) => provider.id)).toEqual(['jira', 'github', 'linear', 'openai']);
    expect(providers.map((provider) => provider.kind)).toEqual([
      'data-source',
      'data-source',
      'data-source',
      'service',
    ]);
  });

  it('should find providers by id or display name', () => {
    const providers = listProviders();

    expect(findProvider(providers, 'GitHub')?.id).toBe('github');
    expect(findProvider(providers, ' openai ')?.id).toBe('openai');
    expect(findProvider(providers, 'gitlab')).toBeUndefined();
  });

  it('should not make any request when nothing is configured', async () => {
    const fetch = routeFetch({});

    const checks = await checkProviders(store, listProviders({ fetch }));

    expect(checks.map((check) => check.status)).toEqual([
      'not_configured',
      'not_configured',
      'not_configured',
      'not_configured',
    ]);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('should report missing keys for partially configured providers', async () => {
    await store.upsert('JIRA_URL', 'https://example.atlassian.net');

    const [jira] = await checkProviders(store, listProviders({ fetch: routeFetch({}) }));

    expect(jira?.status).toBe('not_configured');
    if (jira?.status === 'not_configured') {
      expect(jira.error.missingKeys).toEqual(['JIRA_USERNAME', 'JIRA_API_KEY']);
    }
  });

  it('should keep provider order whatever order the responses arrive in', async () => {
    await store.upsertMany({
      JIRA_URL: 'https://example.atlassian.net',
      JIRA_USERNAME: 'dev@example.com',
      JIRA_API_KEY: 'test-secret',
      GITHUB_TOKEN: 'test-token',
    });

    const pending = new Map<string, (response: Response) => void>();
    const fetch = vi.fn(
      (input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
        new Promise<Response>((resolve) => {
          pending.set(getFetchUrl(input), resolve);
        })
    );

    const checking = checkProviders(store, listProviders({ fetch }));

    // both requests are in flight before either is answered
    await vi.waitFor(() => expect(pending.size).toBe(2));

    pending.get('https://api.github.com/graphql')?.(
      jsonResponse({ data: { viewer: { login: 'octo-dev', name: null } } })
    );
    pending.get('https://example.atlassian.net/rest/api/2/myself')?.(
      new Response('', { status: 401, statusText: 'Unauthorized' })
    );

    const checks = await checking;

    expect(checks.map((check) => [check.provider, check.status])).toEqual([
      ['jira', 'auth_failed'],
      ['github', 'authenticated'],
      ['linear', 'not_configured'],
      ['openai', 'not_configured'],
    ]);
  });

  it('should not let one failing provider affect another', async () => {
    await store.upsertMany({ GITHUB_TOKEN: 'test-token', LINEAR_API_KEY: 'lin_api_test' });

    const fetch = routeFetch({
      'https://api.github.com/graphql': () => {
        throw new TypeError('fetch failed');
      },
      'https://api.linear.app/graphql': () =>
        jsonResponse({ data: { viewer: { id: 'user-1', name: 'Dev User', email: null } } }),
    });

    const checks = await checkProviders(store, listProviders({ fetch }));

    expect(checks[1]?.status).toBe('auth_failed');
    expect(checks[2]?.status).toBe('authenticated');
  });
});

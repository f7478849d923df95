import { describe, it, expect } from 'vitest';
import { createGitHubAuthenticator, VIEWER_QUERY } from '../providers/github/index.js';
import type { GitHubConfig } from '../providers/github/index.js';
import { jsonResponse, respondWith, routeFetch } from './helpers/fetch.js';

const config: GitHubConfig = {
  token: 'test-token',
  apiUrl: 'https://api.github.com',
};

describe('GitHub authenticator', () => {
  it('should post the viewer query with a bearer token', async () => {
    const fetch = routeFetch({
      'https://api.github.com/graphql': () =>
        jsonResponse({ data: { viewer: { login: 'octo-dev', name: 'Octo Dev' } } }),
    });

    await createGitHubAuthenticator({ fetch }).authenticate(config);

    const init = fetch.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
    expect(JSON.parse(String(init?.body))).toEqual({ query: VIEWER_QUERY, variables: {} });
  });

  it('should return the login and name on success', async () => {
    const fetch = respondWith(() =>
      jsonResponse({ data: { viewer: { login: 'octo-dev', name: 'Octo Dev' } } })
    );

    const result = await createGitHubAuthenticator({ fetch }).authenticate(config);

    expect(result).toEqual({
      ok: true,
      provider: 'github',
      metadata: {
        account: 'Octo Dev (@octo-dev)',
        server: 'https://api.github.com',
        details: { login: 'octo-dev' },
      },
    });
  });

  it('should show only the login when the account has no name', async () => {
    const fetch = respondWith(() => jsonResponse({ data: { viewer: { login: 'octo-dev', name: null } } }));

    const result = await createGitHubAuthenticator({ fetch }).authenticate(config);

    expect(result.ok && result.metadata.account).toBe('@octo-dev');
  });

  it('should talk to an Enterprise Server API root', async () => {
    const fetch = routeFetch({
      'https://github.example.com/api/graphql': () =>
        jsonResponse({ data: { viewer: { login: 'dev', name: null } } }),
    });

    const result = await createGitHubAuthenticator({ fetch }).authenticate({
      ...config,
      apiUrl: 'https://github.example.com/api',
    });

    expect(result.ok && result.metadata.server).toBe('https://github.example.com/api');
  });

  it('should report a bad token as unauthorized', async () => {
    const fetch = respondWith(
      () => new Response(JSON.stringify({ message: 'Bad credentials' }), { status: 401, statusText: 'Unauthorized' })
    );

    const result = await createGitHubAuthenticator({ fetch }).authenticate(config);

    expect(result).toEqual({
      ok: false,
      provider: 'github',
      reason: 'GitHub rejected the credentials (401 Unauthorized)',
      cause: 'unauthorized',
      status: 401,
    });
  });

  it('should report GraphQL errors', async () => {
    const fetch = respondWith(() =>
      jsonResponse({ errors: [{ message: 'Something went wrong' }, { message: 'Try again' }] })
    );

    const result = await createGitHubAuthenticator({ fetch }).authenticate(config);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.cause).toBe('malformed');
      expect(result.reason).toBe('GitHub GraphQL errors: Something went wrong, Try again');
    }
  });

  it('should report a response without data', async () => {
    const fetch = respondWith(() => jsonResponse({ data: null }));

    const result = await createGitHubAuthenticator({ fetch }).authenticate(config);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe('GitHub API returned no data');
    }
  });

  it('should report server errors as http failures', async () => {
    const fetch = respondWith(() => new Response('', { status: 502, statusText: 'Bad Gateway' }));

    const result = await createGitHubAuthenticator({ fetch }).authenticate(config);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.cause).toBe('http');
      expect(result.status).toBe(502);
      expect(result.reason).toBe('GitHub API error: 502 Bad Gateway');
    }
  });
});

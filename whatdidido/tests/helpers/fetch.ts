import { vi } from 'vitest';

type FetchInput = string | URL | Request;

export function getFetchUrl(input: FetchInput): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

/**
 * Fetch stand-in that answers from a URL -> response table and fails on anything else
 */
export function routeFetch(routes: Record<string, () => Response | Promise<Response>>) {
  return vi.fn(async (input: FetchInput, _init?: RequestInit): Promise<Response> => {
    const url = getFetchUrl(input);
    const route = routes[url];
    if (!route) {
      throw new Error(`Unmocked fetch: ${url}`);
    }
    return route();
  });
}

/**
 * Fetch stand-in that always answers with the same response
 */
export function respondWith(response: () => Response) {
  return vi.fn(async (_input: FetchInput, _init?: RequestInit): Promise<Response> => response());
}

/**
 * Fetch stand-in that fails the way undici does when the host is unreachable
 */
export function failWith(error: Error) {
  return vi.fn(async (_input: FetchInput, _init?: RequestInit): Promise<Response> => {
    throw error;
  });
}

/**
 * Fetch stand-in that never answers and rejects once its signal aborts
 */
export function hangingFetch() {
  return vi.fn(
    (_input: FetchInput, init?: RequestInit): Promise<Response> =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        signal?.addEventListener('abort', () => reject(signal.reason));
      })
  );
}

import { vi, type Mock } from 'vitest';
import { textResponse } from './mock-factories.js';

/** What the stub saw for one `fetch` call. */
export interface RecordedRequest {
  method: string;
  url: URL;
  /** Header names lower-cased. */
  headers: Record<string, string>;
  body: string | null;
  /** Parsed JSON body, or `undefined` when the body is not JSON. */
  json: unknown;
}

export type FetchRoute = (request: RecordedRequest) => Response | Promise<Response>;

export interface FetchStub {
  fetch: Mock<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>;
  requests: RecordedRequest[];
  /** Requests whose path matches, in order. */
  requestsTo(pathname: string): RecordedRequest[];
}

function bodyText(body: RequestInit['body']): string | null {
  if (typeof body === 'string') return body;
  if (body instanceof Uint8Array) return Buffer.from(body).toString('utf8');
  return null;
}

function parseJson(text: string | null): unknown {
  if (text === null) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * In-process stand-in for the REST service. Routes are keyed by
 * `"METHOD /path"` or by `/path` alone; anything else answers 404.
 *
 * @example
 * ```ts
 * const stub = createFetchStub({ 'POST /iot/list_devices': () => jsonResponse([]) });
 * vi.stubGlobal('fetch', stub.fetch);
 * ```
 */
export function createFetchStub(routes: Record<string, FetchRoute>): FetchStub {
  const requests: RecordedRequest[] = [];
  const fetch = vi.fn(async (input: string | URL | Request, init: RequestInit = {}): Promise<Response> => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const method = (init.method ?? 'GET').toUpperCase();
    const body = bodyText(init.body);
    const request: RecordedRequest = {
      method,
      url,
      headers: Object.fromEntries(new Headers(init.headers).entries()),
      body,
      json: parseJson(body),
    };
    requests.push(request);
    const route = routes[`${method} ${url.pathname}`] ?? routes[url.pathname];
    return route ? route(request) : textResponse('not found', { status: 404, statusText: 'Not Found' });
  });
  return {
    fetch,
    requests,
    requestsTo: (pathname) => requests.filter((r) => r.url.pathname === pathname),
  };
}

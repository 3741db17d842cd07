/**
 * REST client for the fleet service.
 *
 * @module client/api-client
 */
import fs from 'node:fs';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { z } from 'zod';
import type { DuplexTransport, Logger } from '@fieldlink/device-api';
import type { DeviceApiRequest } from '@fieldlink/shared/device-api-schemas';
import { ApiError, expectShape } from './errors.js';
import { WebSocketTransport } from './websocket-transport.js';

export type QueryValue = string | number | boolean | null | undefined;
export type Query = Record<string, QueryValue>;
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface ApiClientOptions {
  url: string;
  token?: string | null;
  /** Project subdomain sent as the `project` query parameter. */
  project?: string | null;
  logger?: Logger;
  /** Log every request at debug level. */
  trace?: boolean;
}

export interface RequestOptions {
  method?: HttpMethod;
  query?: Query;
  body?: RequestInit['body'];
  headers?: Record<string, string>;
}

export interface CallOptions {
  /** Default: POST */
  method?: HttpMethod;
  query?: Query;
}

/**
 * Thin wrapper over `fetch` that knows the service's conventions: bearer
 * auth, the project query parameter, JSON bodies and {@link ApiError} for
 * non-2xx responses.
 */
export class ApiClient {
  readonly baseUrl: URL;
  private readonly logger: Logger;

  constructor(private readonly options: ApiClientOptions) {
    this.baseUrl = new URL(options.url.endsWith('/') ? options.url : `${options.url}/`);
    this.logger = options.logger ?? console;
  }

  get project(): string | null {
    return this.options.project ?? null;
  }

  /** A client identical to this one but scoped to another project. */
  withProject(project: string | null): ApiClient {
    return new ApiClient({ ...this.options, project });
  }

  /**
   * JSON request/response call.
   *
   * The response is parsed as JSON when the service labels it JSON and
   * returned as text otherwise; an empty body yields `null`.
   *
   * @param params - JSON body (ignored for GET and HEAD)
   * @throws {ApiError} For non-2xx responses
   */
  call(path: string, params?: Record<string, unknown>, options?: CallOptions): Promise<unknown>;
  call<T>(
    path: string,
    params: Record<string, unknown> | undefined,
    options: CallOptions & { schema: z.ZodType<T> },
  ): Promise<T>;
  async call<T>(
    path: string,
    params: Record<string, unknown> = {},
    options: CallOptions & { schema?: z.ZodType<T> } = {},
  ): Promise<unknown> {
    const method = options.method ?? 'POST';
    const hasBody = method !== 'GET' && method !== 'HEAD';
    const response = await this.request(path, {
      method,
      query: options.query,
      body: hasBody ? JSON.stringify(params) : undefined,
      headers: hasBody ? { 'Content-Type': 'application/json' } : {},
    });
    await this.checkStatus(response, path);

    const text = await response.text();
    let result: unknown = text;
    if (text === '') {
      result = null;
    } else if (isJson(response)) {
      result = JSON.parse(text);
    }
    return options.schema ? expectShape(path, result, options.schema) : result;
  }

  /** Send a request and return the raw response without checking its status. */
  async request(path: string, options: RequestOptions = {}): Promise<Response> {
    const method = options.method ?? 'GET';
    const url = this.url(path, options.query);
    const headers: Record<string, string> = { ...options.headers };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }
    if (this.options.trace) {
      this.logger.debug(`${method} ${url.toString()}`);
    }
    return fetch(url.toString(), { method, headers, body: options.body });
  }

  /**
   * @throws {ApiError} When the response status is not 2xx
   */
  async checkStatus(response: Response, path: string): Promise<void> {
    if (response.ok) return;
    const body = await response.text();
    throw new ApiError(
      `Request to '${path}' failed with status ${response.status}: ${body || response.statusText}`,
      response.status,
      path,
      body,
    );
  }

  /** Stream a GET response body into a local file. */
  async download(path: string, destination: string, query?: Query): Promise<void> {
    const response = await this.request(path, { query });
    await this.checkStatus(response, path);
    const out = fs.createWriteStream(destination);
    if (!response.body) {
      out.end();
      return;
    }
    await pipeline(Readable.fromWeb(response.body), out);
  }

  /**
   * Open a WebSocket at the `ws(s)://` form of `path`, authenticated like
   * every other request.
   */
  openTransport<TSend = DeviceApiRequest>(path: string, query?: Query): Promise<DuplexTransport<TSend>> {
    const url = this.url(path, query);
    url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
    if (this.options.trace) {
      this.logger.debug(`WS ${url.toString()}`);
    }
    return WebSocketTransport.connect<TSend>(url.toString(), {
      token: this.options.token,
      logger: this.logger,
    });
  }

  /** Resolve `path` against the base URL and append the query and project. */
  url(path: string, query: Query = {}): URL {
    const url = new URL(path.replace(/^\/+/, ''), this.baseUrl);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined && value !== null) {
        url.searchParams.set(key, String(value));
      }
    }
    if (this.options.project) {
      url.searchParams.set('project', this.options.project);
    }
    return url;
  }
}

function isJson(response: Response): boolean {
  const type = response.headers.get('Content-Type') ?? '';
  return type.split(';')[0]?.trim() === 'application/json';
}

/**
 * HTTP plumbing: one configured connection per client.
 *
 * @module gateway
 */

import type { Logger } from 'pino';
import { APIError } from './errors.js';
import type { ConnectionOptions, HttpResponse, JsonObject, QueryParams } from './types.js';

export interface GatewayConfig {
  baseUrl: string;
  /** Sent as `authorization: Bearer <token>` on every request when set. */
  token?: string;
  connOptions?: ConnectionOptions;
  fetch?: typeof fetch;
  /** Decode `application/json` response bodies. Off means bodies stay text. */
  parseJson: boolean;
  logger: Logger;
}

const JSON_CONTENT_TYPE = /^application\/json/i;

/**
 * A configured HTTP client bound to one base URL.
 */
export class Connection {
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly config: GatewayConfig) {
    this.fetchImpl = config.fetch ?? globalThis.fetch.bind(globalThis);
    this.logger = config.logger.child({ component: 'http' });
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  async get(path: string, query: QueryParams = {}): Promise<HttpResponse> {
    return this.request('GET', path, { query });
  }

  async post(path: string, body: JsonObject = {}): Promise<HttpResponse> {
    return this.request('POST', path, { body });
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    { query = {}, body }: { query?: QueryParams; body?: JsonObject }
  ): Promise<HttpResponse> {
    const url = this.buildUrl(path, query);
    const headers = this.buildHeaders();

    let payload: string | undefined;
    if (body && Object.keys(body).length > 0) {
      payload = JSON.stringify(body);
      headers.set('content-type', 'application/json');
    }

    this.logger.debug({ method, path, query }, 'request');
    const startedAt = Date.now();

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), {
        ...this.config.connOptions,
        method,
        headers,
        body: payload,
      });
    } catch (error) {
      this.logger.error({ err: error, method, path }, 'request failed');
      const reason = error instanceof Error ? error.message : String(error);
      throw new APIError(`Request failed: ${reason}`, { cause: error });
    }

    const result = await this.decode(response);
    this.logger.debug(
      { method, path, status: result.status, durationMs: Date.now() - startedAt },
      'response'
    );
    return result;
  }

  private buildUrl(path: string, query: QueryParams): URL {
    const url = new URL(path, this.config.baseUrl);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.append(key, String(value));
      }
    }
    return url;
  }

  private buildHeaders(): Headers {
    const headers = new Headers(this.config.connOptions?.headers);
    if (this.config.parseJson) {
      headers.set('accept', 'application/json');
    }
    if (this.config.token) {
      headers.set('authorization', `Bearer ${this.config.token}`);
    }
    return headers;
  }

  private async decode(response: Response): Promise<HttpResponse> {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    const text = await response.text();
    const base = { status: response.status, ok: response.ok, headers };

    const contentType = response.headers.get('content-type') ?? '';
    if (!this.config.parseJson || !JSON_CONTENT_TYPE.test(contentType)) {
      return { ...base, body: text };
    }
    if (text.trim() === '') {
      return { ...base, body: null };
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      // Error statuses still go through status classification with the raw text.
      if (!response.ok) {
        return { ...base, body: text };
      }
      throw new APIError(`Invalid JSON response: ${response.status}`, {
        statusCode: response.status,
        response: { ...base, body: text },
        cause: error,
      });
    }
    return { ...base, body };
  }
}

/**
 * Builds the connection for one client configuration and hands out the same instance
 * for the gateway's lifetime.
 */
export class HttpGateway {
  private conn: Connection | undefined;

  constructor(private readonly config: GatewayConfig) {}

  connection(): Connection {
    if (!this.conn) {
      this.conn = new Connection(this.config);
    }
    return this.conn;
  }
}

/**
 * Shared types and constants for the Mintsoft client.
 *
 * @module types
 */

import type { Logger } from 'pino';

/**
 * Default API host for both the auth client and the main client.
 */
export const BASE_URL = 'https://api.mintsoft.co.uk';

/**
 * Fixed API paths. Parameterized paths are built by the resources.
 */
export const ENDPOINTS = {
  auth: '/api/auth',
  orderSearch: '/api/Order/Search',
  order: (id: string | number) => `/api/Order/${encodeURIComponent(String(id))}`,
  returnReasons: '/api/Return/Reasons',
  createReturn: (orderId: number) => `/api/Return/CreateReturn/${orderId}`,
  addReturnItem: (returnId: number) => `/api/Return/${returnId}/AddItem`,
} as const;

/**
 * A decoded JSON value.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/**
 * A decoded JSON object.
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Username/password pair exchanged for a token. Never stored by the library.
 */
export interface Credentials {
  username: string;
  password: string;
}

/**
 * Identifier accepted by the resources before coercion.
 */
export type Identifier = string | number;

/**
 * One completed HTTP exchange, with the body already decoded.
 *
 * `body` is parsed JSON when the connection decodes JSON and the server said
 * `application/json`; otherwise it is the response text.
 */
export interface HttpResponse {
  status: number;
  ok: boolean;
  headers: Record<string, string>;
  body: unknown;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Extra `fetch` options applied to every request. `method` and `body` are owned by the
 * connection.
 */
export type ConnectionOptions = Omit<RequestInit, 'method' | 'body'>;

/**
 * Options shared by both clients.
 */
export interface BaseClientOptions {
  /** API host. Defaults to {@link BASE_URL}. */
  baseUrl?: string;
  /** Extra `fetch` options merged into every request. */
  connOptions?: ConnectionOptions;
  /** Transport override. Defaults to the global `fetch`. */
  fetch?: typeof fetch;
  /** Logger for request tracing. */
  logger?: Logger;
  /** Log requests at debug level when no logger is supplied. */
  debug?: boolean;
}

export interface ClientOptions extends BaseClientOptions {
  /** Bearer token from {@link AuthResource.authenticate}. */
  token: string;
}

export type AuthClientOptions = BaseClientOptions;

/**
 * Item fields accepted by `returns.addItem`. Required fields are checked at runtime.
 */
export interface ReturnItemAttributes {
  product_id?: Identifier | null;
  quantity?: Identifier | null;
  reason_id?: Identifier | null;
  unit_value?: number | string | null;
  notes?: string | null;
}

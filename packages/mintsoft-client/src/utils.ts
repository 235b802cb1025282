/**
 * Utility functions for the Mintsoft client.
 *
 * @module utils
 */

import type { JsonObject, JsonValue } from './types.js';

/**
 * Check for a plain (non-array, non-null) object.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Null and undefined count as missing; every other value, including 0 and '', is present.
 */
export function isPresent<T>(value: T | null | undefined): value is T {
  return value !== undefined && value !== null;
}

/**
 * Coerce a number or numeric-prefixed string to an integer.
 * Anything that does not start with digits coerces to 0.
 *
 * @example
 * toInteger(4.7);     // 4
 * toInteger('12abc'); // 12
 * toInteger('abc');   // 0
 */
export function toInteger(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }
  if (typeof value === 'string') {
    const parsed = Number.parseInt(value.trim(), 10);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  return 0;
}

/**
 * Coerce to a positive integer, or undefined when the value is not one.
 */
export function toPositiveInteger(value: unknown): number | undefined {
  const integer = toInteger(value);
  return integer > 0 ? integer : undefined;
}

/**
 * Best-effort human readable message from an error response body.
 */
export function extractErrorMessage(body: unknown): string {
  if (typeof body === 'string') {
    return body;
  }
  if (isPlainObject(body)) {
    const message = [body.error, body.message].find((value) => isPresent(value) && value !== false);
    if (message !== undefined) {
      return typeof message === 'string' ? message : JSON.stringify(message);
    }
    return JSON.stringify(body);
  }
  return 'Unknown error';
}

/**
 * Strip one layer of surrounding quotes from a double-encoded string response.
 *
 * @example
 * stripQuotes('"abc123"'); // abc123
 * stripQuotes('abc123');   // abc123
 */
export function stripQuotes(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Build a JSON payload from a field mapping, dropping null and undefined values.
 */
export function compactPayload(entries: Array<[string, JsonValue | undefined]>): JsonObject {
  const payload: JsonObject = {};
  for (const [key, value] of entries) {
    if (isPresent(value)) {
      payload[key] = value;
    }
  }
  return payload;
}

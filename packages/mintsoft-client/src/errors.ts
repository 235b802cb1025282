import type { HttpResponse } from './types.js';

/**
 * Context attached to a Mintsoft error.
 */
export interface MintsoftErrorOptions {
  response?: HttpResponse;
  statusCode?: number;
  cause?: unknown;
}

/**
 * Base error for all Mintsoft client errors.
 */
export class MintsoftError extends Error {
  public readonly response?: HttpResponse;
  public readonly statusCode?: number;

  constructor(message: string, options: MintsoftErrorOptions = {}) {
    super(message);
    this.name = 'MintsoftError';
    this.response = options.response;
    this.statusCode = options.statusCode ?? options.response?.status;
    if (options.cause !== undefined) this.cause = options.cause;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      ...(this.statusCode !== undefined && { statusCode: this.statusCode }),
    };
  }
}

/**
 * Catch-all for failed API calls: unexpected statuses, transport failures and payloads
 * the client cannot use.
 */
export class APIError extends MintsoftError {
  constructor(message: string, options: MintsoftErrorOptions = {}) {
    super(message, options);
    this.name = 'APIError';
  }
}

/**
 * Credentials were rejected, or the bearer token is invalid or expired.
 */
export class AuthenticationError extends APIError {
  constructor(message: string, options: MintsoftErrorOptions = {}) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

/**
 * Caller input was rejected, either locally before any request or by the server (400).
 */
export class ValidationError extends APIError {
  constructor(message: string, options: MintsoftErrorOptions = {}) {
    super(message, options);
    this.name = 'ValidationError';
  }
}

/**
 * The server answered 404 on an operation that reports absence as an error.
 */
export class NotFoundError extends APIError {
  constructor(message: string, options: MintsoftErrorOptions = {}) {
    super(message, options);
    this.name = 'NotFoundError';
  }
}

import { describe, expect, it } from 'vitest';
import { APIError, AuthenticationError, MintsoftError, NotFoundError, ValidationError } from './errors.js';
import type { HttpResponse } from './types.js';

const response: HttpResponse = { status: 404, ok: false, headers: {}, body: 'missing' };

describe('error hierarchy', () => {
  it.each([
    ['APIError', new APIError('x'), APIError],
    ['AuthenticationError', new AuthenticationError('x'), AuthenticationError],
    ['ValidationError', new ValidationError('x'), ValidationError],
    ['NotFoundError', new NotFoundError('x'), NotFoundError],
  ])('%s carries its name and extends APIError', (name, error, kind) => {
    expect(error).toBeInstanceOf(kind);
    expect(error).toBeInstanceOf(APIError);
    expect(error).toBeInstanceOf(MintsoftError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe(name);
  });

  it('takes the status code from the response', () => {
    const error = new NotFoundError('Resource not found', { response });

    expect(error.statusCode).toBe(404);
    expect(error.response).toBe(response);
  });

  it('prefers an explicit status code', () => {
    expect(new APIError('x', { response, statusCode: 500 }).statusCode).toBe(500);
  });

  it('keeps the cause', () => {
    const cause = new TypeError('fetch failed');
    expect(new APIError('Request failed: fetch failed', { cause }).cause).toBe(cause);
  });

  it('serializes name, message and status', () => {
    expect(new AuthenticationError('Invalid or expired token', { statusCode: 401 }).toJSON()).toEqual({
      name: 'AuthenticationError',
      message: 'Invalid or expired token',
      statusCode: 401,
    });
    expect(new ValidationError('Order ID required').toJSON()).toEqual({
      name: 'ValidationError',
      message: 'Order ID required',
    });
  });
});

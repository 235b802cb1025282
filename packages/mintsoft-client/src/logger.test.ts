import { describe, expect, it } from 'vitest';
import { AuthClient } from './auth-client.js';
import { MintsoftClient } from './client.js';
import { createLogger, resolveLogger } from './logger.js';
import { jsonResponse, mockFetch } from './test-helpers.js';

function captureLogger() {
  const lines: string[] = [];
  const logger = createLogger({
    level: 'debug',
    destination: {
      write(msg: string) {
        lines.push(msg);
      },
    },
  });
  const entries = (): Array<Record<string, unknown>> => lines.map((line) => JSON.parse(line));
  return { logger, lines, entries };
}

describe('createLogger', () => {
  it('censors credentials and authorization headers', () => {
    const { logger, entries } = captureLogger();

    logger.info(
      { password: 'test-password', token: 'test-token', headers: { authorization: 'Bearer test-token' } },
      'login'
    );

    const [entry] = entries();
    expect(entry?.password).toBe('[REDACTED]');
    expect(entry?.token).toBe('[REDACTED]');
    expect(entry?.headers).toEqual({ authorization: '[REDACTED]' });
    expect(entry?.name).toBe('mintsoft-client');
  });
});

describe('resolveLogger', () => {
  it('is silent by default', () => {
    expect(resolveLogger(undefined, undefined).level).toBe('silent');
  });

  it('logs at debug level in debug mode', () => {
    expect(resolveLogger(undefined, true).level).toBe('debug');
  });

  it('prefers the caller logger', () => {
    const logger = createLogger({ level: 'warn' });
    expect(resolveLogger(logger, true)).toBe(logger);
  });
});

describe('request logging', () => {
  it('logs each request and response', async () => {
    const { logger, entries } = captureLogger();
    const client = new MintsoftClient({ token: 'test-token', fetch: mockFetch(jsonResponse([])), logger });

    await client.returns.reasons();

    const [request, response] = entries();
    expect(request).toMatchObject({
      msg: 'request',
      component: 'http',
      method: 'GET',
      path: '/api/Return/Reasons',
    });
    expect(response).toMatchObject({ msg: 'response', component: 'http', status: 200 });
    expect(typeof response?.durationMs).toBe('number');
  });

  it('never writes the password', async () => {
    const { logger, lines } = captureLogger();
    const client = new AuthClient({ fetch: mockFetch(jsonResponse('abc123')), logger });

    await client.auth.authenticate('test-user', 'test-password');

    expect(lines).toHaveLength(2);
    expect(lines.some((line) => line.includes('test-password'))).toBe(false);
  });

  it('logs transport failures at error level', async () => {
    const { logger, entries } = captureLogger();
    const fetchMock = mockFetch();
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    const client = new MintsoftClient({ token: 'test-token', fetch: fetchMock, logger });

    await expect(client.returns.reasons()).rejects.toThrow('Request failed: fetch failed');

    const failure = entries().find((entry) => entry.msg === 'request failed');
    expect(failure?.level).toBe(50);
    expect(failure?.path).toBe('/api/Return/Reasons');
  });
});

import { vi, type Mock } from 'vitest';

export type FetchMock = Mock<typeof fetch>;

export interface RecordedRequest {
  url: string;
  method: string | undefined;
  headers: Headers;
  body: string | undefined;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8' },
  });
}

export function textResponse(body: string, status = 200, contentType = 'text/plain'): Response {
  return new Response(body, { status, headers: { 'content-type': contentType } });
}

/**
 * A fetch stand-in that answers with the given responses in order.
 */
export function mockFetch(...responses: Response[]): FetchMock {
  const fetchMock = vi.fn<typeof fetch>();
  for (const response of responses) {
    fetchMock.mockResolvedValueOnce(response);
  }
  return fetchMock;
}

export function recordedRequest(fetchMock: FetchMock, index = 0): RecordedRequest {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`No request recorded at index ${index}`);
  }
  const [input, init] = call;
  return {
    url: String(input),
    method: init?.method,
    headers: new Headers(init?.headers),
    body: typeof init?.body === 'string' ? init.body : undefined,
  };
}

import type { Connection } from './gateway.js';
import { APIError, AuthenticationError, NotFoundError, ValidationError } from './errors.js';
import { jsonObjectArraySchema, jsonObjectSchema } from './response-object.js';
import type { HttpResponse, JsonObject, QueryParams } from './types.js';
import { extractErrorMessage } from './utils.js';

/**
 * Anything that can hand a resource its connection.
 */
export interface ConnectionProvider {
  connection(): Connection;
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Map a failed response to its error kind.
 *
 * 400 → ValidationError, 401 → AuthenticationError, 404 → NotFoundError,
 * anything else → APIError.
 */
export function classifyError(response: HttpResponse): APIError {
  const options = { response, statusCode: response.status };
  switch (response.status) {
    case 400:
      return new ValidationError(`Invalid request data: ${extractErrorMessage(response.body)}`, options);
    case 401:
      return new AuthenticationError('Invalid or expired token', options);
    case 404:
      return new NotFoundError('Resource not found', options);
    default:
      return new APIError(`API error: ${response.status} - ${extractErrorMessage(response.body)}`, options);
  }
}

/**
 * Shared request and response handling for the API resources.
 */
export abstract class BaseResource {
  constructor(protected readonly client: ConnectionProvider) {}

  protected async getRequest(path: string, query: QueryParams = {}): Promise<HttpResponse> {
    return this.client.connection().get(path, query);
  }

  protected async postRequest(path: string, body: JsonObject = {}): Promise<HttpResponse> {
    return this.client.connection().post(path, body);
  }

  /**
   * Return the decoded body of a successful response, or throw the classified error.
   */
  protected handleResponse(response: HttpResponse): unknown {
    if (isSuccess(response.status)) {
      return response.body;
    }
    return this.handleError(response);
  }

  protected handleError(response: HttpResponse): never {
    throw classifyError(response);
  }

  /**
   * Wrap a collection payload. A body that is not an array yields an empty list.
   */
  protected wrapCollection<T>(
    data: unknown,
    Wrapper: new (data: JsonObject) => T,
    response: HttpResponse
  ): T[] {
    if (!Array.isArray(data)) {
      return [];
    }
    const parsed = jsonObjectArraySchema.safeParse(data);
    if (!parsed.success) {
      throw new APIError('Unexpected response payload', { response });
    }
    return parsed.data.map((item) => new Wrapper(item));
  }

  /**
   * Require a JSON object payload.
   */
  protected expectObject(data: unknown, response: HttpResponse): JsonObject {
    const parsed = jsonObjectSchema.safeParse(data);
    if (!parsed.success) {
      throw new APIError('Unexpected response payload', { response });
    }
    return parsed.data;
  }
}

/**
 * Credential exchange.
 *
 * @module auth
 */

import { APIError, AuthenticationError, ValidationError } from './errors.js';
import { BaseResource, isSuccess } from './resource.js';
import type { Credentials, HttpResponse } from './types.js';
import { ENDPOINTS } from './types.js';
import { extractErrorMessage, stripQuotes } from './utils.js';

/**
 * Read credentials from MINTSOFT_USERNAME and MINTSOFT_PASSWORD.
 * Returns null when either is missing.
 */
export function getCredentialsFromEnv(env: NodeJS.ProcessEnv = process.env): Credentials | null {
  const username = env.MINTSOFT_USERNAME;
  const password = env.MINTSOFT_PASSWORD;

  if (!username || !password) {
    return null;
  }

  return { username, password };
}

export class AuthResource extends BaseResource {
  /**
   * Exchange a username and password for an API token.
   * The token is returned to the caller and never kept.
   *
   * @example
   * const token = await new AuthClient().auth.authenticate('user', 'pass');
   * const client = new MintsoftClient({ token });
   */
  async authenticate(
    username: string | null | undefined,
    password: string | null | undefined
  ): Promise<string> {
    if (!username) {
      throw new ValidationError('Username required');
    }
    if (!password) {
      throw new ValidationError('Password required');
    }

    const response = await this.postRequest(ENDPOINTS.auth, { username, password });
    if (!isSuccess(response.status)) {
      return this.handleAuthError(response);
    }

    if (typeof response.body !== 'string') {
      throw new APIError('Unexpected response payload', { response });
    }
    // The token arrives JSON-encoded, e.g. "\"xxxx-xx-xxxx\""
    return stripQuotes(response.body);
  }

  private handleAuthError(response: HttpResponse): never {
    const options = { response, statusCode: response.status };
    switch (response.status) {
      case 401:
        throw new AuthenticationError('Invalid credentials', options);
      case 400:
        throw new ValidationError(`Invalid request: ${extractErrorMessage(response.body)}`, options);
      default:
        throw new APIError(
          `Authentication failed: ${response.status} - ${extractErrorMessage(response.body)}`,
          options
        );
    }
  }
}

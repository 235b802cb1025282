import { AuthResource } from './auth.js';
import { parseAuthClientOptions } from './config.js';
import { HttpGateway, type Connection } from './gateway.js';
import { resolveLogger } from './logger.js';
import type { ConnectionProvider } from './resource.js';
import type { AuthClientOptions } from './types.js';

/**
 * Client for the credential exchange. Sends no authorization header and leaves the
 * token response undecoded.
 */
export class AuthClient implements ConnectionProvider {
  readonly baseUrl: string;

  private readonly gateway: HttpGateway;
  private authResource: AuthResource | undefined;

  constructor(options: AuthClientOptions = {}) {
    const { baseUrl } = parseAuthClientOptions(options);
    this.baseUrl = baseUrl;
    this.gateway = new HttpGateway({
      baseUrl,
      connOptions: options.connOptions,
      fetch: options.fetch,
      parseJson: false,
      logger: resolveLogger(options.logger, options.debug),
    });
  }

  connection(): Connection {
    return this.gateway.connection();
  }

  get auth(): AuthResource {
    if (!this.authResource) {
      this.authResource = new AuthResource(this);
    }
    return this.authResource;
  }
}

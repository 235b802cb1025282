import { parseClientOptions } from './config.js';
import { HttpGateway, type Connection } from './gateway.js';
import { resolveLogger } from './logger.js';
import { OrdersResource } from './orders.js';
import type { ConnectionProvider } from './resource.js';
import { ReturnsResource } from './returns.js';
import type { ClientOptions } from './types.js';

/**
 * Mintsoft API client for token-authenticated calls.
 *
 * Every request carries `authorization: Bearer <token>`. Resources are created on first
 * use and reused for the client's lifetime.
 *
 * @example
 * import { AuthClient, MintsoftClient } from 'mintsoft-client';
 *
 * const token = await new AuthClient().auth.authenticate('user', 'pass');
 * const client = new MintsoftClient({ token });
 *
 * const orders = await client.orders.search('ORD-2024-001');
 * const ret = await client.returns.create(123);
 * await client.returns.addItem(ret.id ?? 0, { product_id: 42, quantity: 1, reason_id: 3 });
 */
export class MintsoftClient implements ConnectionProvider {
  readonly token: string;
  readonly baseUrl: string;

  private readonly gateway: HttpGateway;
  private ordersResource: OrdersResource | undefined;
  private returnsResource: ReturnsResource | undefined;

  constructor(options: ClientOptions) {
    const { token, baseUrl } = parseClientOptions(options);
    this.token = token;
    this.baseUrl = baseUrl;
    this.gateway = new HttpGateway({
      baseUrl,
      token,
      connOptions: options.connOptions,
      fetch: options.fetch,
      parseJson: true,
      logger: resolveLogger(options.logger, options.debug),
    });
  }

  connection(): Connection {
    return this.gateway.connection();
  }

  get orders(): OrdersResource {
    if (!this.ordersResource) {
      this.ordersResource = new OrdersResource(this);
    }
    return this.ordersResource;
  }

  get returns(): ReturnsResource {
    if (!this.returnsResource) {
      this.returnsResource = new ReturnsResource(this);
    }
    return this.returnsResource;
  }
}

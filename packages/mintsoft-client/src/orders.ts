/**
 * Order lookups.
 *
 * Search reports "no match" (including a 404) as an empty list; retrieve reports a
 * missing order as null.
 *
 * @module orders
 */

import { ValidationError } from './errors.js';
import { BaseResource } from './resource.js';
import { jsonObjectSchema, Order } from './response-object.js';
import type { Identifier } from './types.js';
import { ENDPOINTS } from './types.js';
import { isPresent } from './utils.js';

export class OrdersResource extends BaseResource {
  /**
   * Find orders by order number.
   *
   * @example
   * const orders = await client.orders.search('ORD-2024-001');
   * console.log(orders[0]?.get('order_number'));
   */
  async search(orderNumber: string | null | undefined): Promise<Order[]> {
    if (!orderNumber) {
      throw new ValidationError('Order number required');
    }

    const response = await this.getRequest(ENDPOINTS.orderSearch, { OrderNumber: orderNumber });
    if (response.status === 404) {
      return [];
    }

    return this.wrapCollection(this.handleResponse(response), Order, response);
  }

  /**
   * Fetch a single order by id. Resolves to null when the order does not exist.
   */
  async retrieve(id: Identifier | null | undefined): Promise<Order | null> {
    if (!isPresent(id) || id === '') {
      throw new ValidationError('ID must be present');
    }

    const response = await this.getRequest(ENDPOINTS.order(id));
    if (response.status === 404) {
      return null;
    }

    const parsed = jsonObjectSchema.safeParse(this.handleResponse(response));
    return parsed.success ? new Order(parsed.data) : null;
  }
}

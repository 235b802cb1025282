/**
 * Return operations: reasons, creating a return and adding items to it.
 *
 * @module returns
 */

import { APIError, ValidationError } from './errors.js';
import { BaseResource } from './resource.js';
import { Return, ReturnReason } from './response-object.js';
import type { HttpResponse, Identifier, JsonObject, ReturnItemAttributes } from './types.js';
import { ENDPOINTS } from './types.js';
import { compactPayload, isPresent, toPositiveInteger } from './utils.js';

const REQUIRED_ITEM_FIELDS = ['product_id', 'quantity', 'reason_id'] as const;

function validateItemAttributes(attributes: ReturnItemAttributes): void {
  for (const field of REQUIRED_ITEM_FIELDS) {
    const value = attributes[field];
    if (!isPresent(value)) {
      throw new ValidationError(`${field} required`);
    }
  }
  if (toPositiveInteger(attributes.quantity) === undefined) {
    throw new ValidationError('Quantity must be positive');
  }
}

/**
 * Rename item fields to the casing the AddItem endpoint expects. Absent optional
 * fields are left out.
 */
export function formatItemPayload(attributes: ReturnItemAttributes): JsonObject {
  return compactPayload([
    ['ProductId', attributes.product_id],
    ['Quantity', attributes.quantity],
    ['ReasonId', attributes.reason_id],
    ['UnitValue', attributes.unit_value],
    ['Notes', attributes.notes],
  ]);
}

export class ReturnsResource extends BaseResource {
  /**
   * List the reasons a return can be raised for.
   */
  async reasons(): Promise<ReturnReason[]> {
    const response = await this.getRequest(ENDPOINTS.returnReasons);
    return this.wrapCollection(this.handleResponse(response), ReturnReason, response);
  }

  /**
   * Create a return for an order.
   *
   * The endpoint does not echo the order id, so it is added to the result as `order_id`.
   *
   * @example
   * const ret = await client.returns.create(456);
   * ret.id;      // from the server
   * ret.orderId; // 456
   */
  async create(orderId: Identifier | null | undefined): Promise<Return> {
    const id = toPositiveInteger(orderId);
    if (id === undefined) {
      throw new ValidationError('Order ID required');
    }

    const response = await this.postRequest(ENDPOINTS.createReturn(id));
    const data = this.expectObject(this.handleResponse(response), response);
    return new Return({ ...data, order_id: id });
  }

  /**
   * Add an item to an existing return. The result reflects the server's response only.
   *
   * @example
   * await client.returns.addItem(123, { product_id: 42, quantity: 1, reason_id: 3 });
   */
  async addItem(returnId: Identifier | null | undefined, attributes: ReturnItemAttributes): Promise<Return> {
    const id = toPositiveInteger(returnId);
    if (id === undefined) {
      throw new ValidationError('Return ID required');
    }
    validateItemAttributes(attributes);

    const response = await this.postRequest(ENDPOINTS.addReturnItem(id), formatItemPayload(attributes));
    const body = this.handleResponse(response);
    const data = typeof body === 'string' ? this.parseText(body, response) : body;
    return new Return(this.expectObject(data, response));
  }

  private parseText(text: string, response: HttpResponse): unknown {
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new APIError(`Invalid JSON response: ${response.status}`, { response, cause: error });
    }
  }
}

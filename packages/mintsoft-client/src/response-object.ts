/**
 * Normalized views over decoded JSON payloads.
 *
 * A {@link ResponseObject} keeps two read paths over one server payload: the
 * normalized view, where every key is lower_snake_case, and `originalResponse`, a
 * deep-frozen copy with the server's exact keys.
 *
 * @module response-object
 */

import { z } from 'zod';
import type { JsonObject, JsonValue } from './types.js';
import { toInteger } from './utils.js';

const literalSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/**
 * Validates an arbitrary value as JSON data.
 */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([literalSchema, z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export const jsonObjectArraySchema = z.array(jsonObjectSchema);

export type ReadonlyJsonValue =
  | string
  | number
  | boolean
  | null
  | readonly ReadonlyJsonValue[]
  | ReadonlyJsonObject;

export interface ReadonlyJsonObject {
  readonly [key: string]: ReadonlyJsonValue;
}

/**
 * A value in the normalized view: scalars as-is, objects wrapped, arrays element-wise.
 */
export type ResponseValue = string | number | boolean | null | ResponseObject | ResponseValue[];

/**
 * Convert a key to lower_snake_case.
 *
 * @example
 * normalizeKey('OrderNumber');  // order_number
 * normalizeKey('CustomerID');   // customer_id
 * normalizeKey('HTTPResponse'); // http_response
 */
export function normalizeKey(key: string): string {
  return key
    .replace(/([A-Z\d]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .replace(/-/g, '_')
    .toLowerCase();
}

function freezeCopy(value: JsonValue): ReadonlyJsonValue {
  if (Array.isArray(value)) {
    return Object.freeze(value.map(freezeCopy));
  }
  if (typeof value === 'object' && value !== null) {
    return freezeObject(value);
  }
  return value;
}

function freezeObject(value: JsonObject): ReadonlyJsonObject {
  const entries = Object.entries(value).map(
    ([key, nested]): [string, ReadonlyJsonValue] => [key, freezeCopy(nested)]
  );
  return Object.freeze(Object.fromEntries(entries));
}

function unwrap(value: ResponseValue): JsonValue {
  if (value instanceof ResponseObject) {
    return value.toHash();
  }
  if (Array.isArray(value)) {
    return value.map(unwrap);
  }
  return value;
}

/**
 * Attribute-style access over one decoded JSON object.
 *
 * @example
 * const order = new ResponseObject({ OrderNumber: 'ORD-1', Items: [{ ProductID: 7 }] });
 * order.get('order_number');             // 'ORD-1'
 * order.getArray('items')?.length;       // 1
 * order.originalResponse.OrderNumber;    // 'ORD-1'
 * order.toHash();                        // { order_number: 'ORD-1', items: [{ product_id: 7 }] }
 */
export class ResponseObject {
  /** The payload exactly as received, deep-frozen. */
  readonly originalResponse: ReadonlyJsonObject;

  private readonly attributes = new Map<string, ResponseValue>();

  constructor(data: JsonObject) {
    this.originalResponse = freezeObject(data);
    for (const [key, value] of Object.entries(data)) {
      this.attributes.set(normalizeKey(key), ResponseObject.wrap(value));
    }
  }

  /**
   * Wrap any JSON value: objects become ResponseObjects, arrays are wrapped element-wise
   * and scalars pass through.
   */
  static wrap(value: JsonValue): ResponseValue {
    if (Array.isArray(value)) {
      return value.map((element) => ResponseObject.wrap(element));
    }
    if (typeof value === 'object' && value !== null) {
      return new ResponseObject(value);
    }
    return value;
  }

  /**
   * Read a field by its normalized key. Unset fields are undefined.
   */
  get(key: string): ResponseValue | undefined {
    return this.attributes.get(key);
  }

  has(key: string): boolean {
    return this.attributes.has(key);
  }

  keys(): string[] {
    return [...this.attributes.keys()];
  }

  getString(key: string): string | undefined {
    const value = this.get(key);
    return typeof value === 'string' ? value : undefined;
  }

  getNumber(key: string): number | undefined {
    const value = this.get(key);
    return typeof value === 'number' ? value : undefined;
  }

  getBoolean(key: string): boolean | undefined {
    const value = this.get(key);
    return typeof value === 'boolean' ? value : undefined;
  }

  getObject(key: string): ResponseObject | undefined {
    const value = this.get(key);
    return value instanceof ResponseObject ? value : undefined;
  }

  getArray(key: string): ResponseValue[] | undefined {
    const value = this.get(key);
    return Array.isArray(value) ? value : undefined;
  }

  /**
   * Numeric or string identifier stored under `key`.
   */
  getIdentifier(key: string): number | string | undefined {
    return this.getNumber(key) ?? this.getString(key);
  }

  /**
   * Plain nested data using the normalized keys.
   */
  toHash(): JsonObject {
    return Object.fromEntries(
      [...this.attributes].map(([key, value]): [string, JsonValue] => [key, unwrap(value)])
    );
  }

  toJSON(): JsonObject {
    return this.toHash();
  }
}

/**
 * An order as returned by the order endpoints.
 */
export class Order extends ResponseObject {
  get id(): number | string | undefined {
    return this.getIdentifier('id');
  }

  get orderNumber(): string | undefined {
    return this.getString('order_number');
  }

  /** The customer-facing reference: `order_number`, else `order_reference`, else `ref`. */
  get orderRef(): number | string | undefined {
    return this.getIdentifier('order_number') ?? this.getIdentifier('order_reference') ?? this.getIdentifier('ref');
  }
}

/**
 * A configured reason a return can be raised for.
 */
export class ReturnReason extends ResponseObject {
  get id(): number | string | undefined {
    return this.getIdentifier('id');
  }

  get name(): string | undefined {
    return this.getString('name');
  }

  get description(): string | undefined {
    return this.getString('description');
  }

  get isActive(): boolean {
    return this.getBoolean('active') === true;
  }
}

/**
 * A return, or the result of adding an item to one.
 */
export class Return extends ResponseObject {
  get id(): number | string | undefined {
    return this.getIdentifier('id');
  }

  get returnId(): number | string | undefined {
    return this.id ?? this.getIdentifier('return_id');
  }

  get orderId(): number | string | undefined {
    return this.getIdentifier('order_id');
  }

  /** Line items from `return_items`, falling back to `items`. */
  get items(): ResponseObject[] {
    const items = this.getArray('return_items') ?? this.getArray('items') ?? [];
    return items.filter((item): item is ResponseObject => item instanceof ResponseObject);
  }

  get itemsCount(): number {
    return this.items.length;
  }

  /** Total quantity across all line items. */
  get itemQuantities(): number {
    return this.items.reduce((sum, item) => sum + toInteger(item.get('quantity')), 0);
  }

  get hasItems(): boolean {
    return this.items.length > 0;
  }
}

import { describe, expect, it } from 'vitest';
import { MintsoftClient } from './client.js';
import { APIError, AuthenticationError, NotFoundError, ValidationError } from './errors.js';
import { Return, ReturnReason } from './response-object.js';
import { formatItemPayload } from './returns.js';
import { jsonResponse, mockFetch, recordedRequest, textResponse, type FetchMock } from './test-helpers.js';
import type { ReturnItemAttributes } from './types.js';

function returnsWith(fetchMock: FetchMock) {
  return new MintsoftClient({ token: 'test-token', fetch: fetchMock }).returns;
}

const STATUS_CASES: Array<[number, typeof APIError]> = [
  [400, ValidationError],
  [401, AuthenticationError],
  [404, NotFoundError],
  [500, APIError],
];

describe('ReturnsResource', () => {
  describe('reasons', () => {
    it('returns ReturnReason objects', async () => {
      const fetchMock = mockFetch(
        jsonResponse([
          { Id: 1, Name: 'Damaged', Description: 'Item damaged', Active: true },
          { Id: 2, Name: 'Wrong Size', Description: 'Wrong size', Active: false },
        ])
      );

      const reasons = await returnsWith(fetchMock).reasons();

      const request = recordedRequest(fetchMock);
      expect(request.method).toBe('GET');
      expect(request.url).toBe('https://api.mintsoft.co.uk/api/Return/Reasons');
      expect(reasons).toHaveLength(2);
      expect(reasons[0]).toBeInstanceOf(ReturnReason);
      expect(reasons[0]?.name).toBe('Damaged');
      expect(reasons[0]?.isActive).toBe(true);
      expect(reasons[1]?.isActive).toBe(false);
    });

    it('classifies 401 with an unparseable JSON body', async () => {
      const fetchMock = mockFetch(textResponse('Unauthorized', 401, 'application/json'));

      await expect(returnsWith(fetchMock).reasons()).rejects.toThrow(
        new AuthenticationError('Invalid or expired token')
      );
    });

    it('returns an empty list for a non-array body', async () => {
      const fetchMock = mockFetch(jsonResponse({ Reasons: [] }));

      await expect(returnsWith(fetchMock).reasons()).resolves.toEqual([]);
    });

    it.each(STATUS_CASES)('maps %i to %O', async (status, kind) => {
      const fetchMock = mockFetch(jsonResponse({ message: 'failed' }, status));

      const error = await returnsWith(fetchMock).reasons().catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(kind);
      expect(error).toHaveProperty('name', kind.name);
    });
  });

  describe('create', () => {
    it.each([[0], [null], [undefined], [-4], ['abc']])('rejects %j with ValidationError', async (orderId) => {
      const fetchMock = mockFetch();

      await expect(returnsWith(fetchMock).create(orderId)).rejects.toThrow(new ValidationError('Order ID required'));
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('posts an empty body to the order path', async () => {
      const fetchMock = mockFetch(jsonResponse({ id: 123 }));

      await returnsWith(fetchMock).create(456);

      const request = recordedRequest(fetchMock);
      expect(request.method).toBe('POST');
      expect(request.url).toBe('https://api.mintsoft.co.uk/api/Return/CreateReturn/456');
      expect(request.body).toBeUndefined();
    });

    it('adds the order id to the returned Return', async () => {
      const fetchMock = mockFetch(jsonResponse({ id: 123, result: { return_id: 123 } }));

      const ret = await returnsWith(fetchMock).create(456);

      expect(ret).toBeInstanceOf(Return);
      expect(ret.id).toBe(123);
      expect(ret.get('order_id')).toBe(456);
      expect(ret.orderId).toBe(456);
      expect(ret.originalResponse.id).toBe(123);
      expect(ret.originalResponse.result).toEqual({ return_id: 123 });
      expect(ret.toHash()).toEqual({ id: 123, result: { return_id: 123 }, order_id: 456 });
    });

    it('coerces a numeric string order id', async () => {
      const fetchMock = mockFetch(jsonResponse({ id: 1 }));

      const ret = await returnsWith(fetchMock).create('456');

      expect(recordedRequest(fetchMock).url).toBe('https://api.mintsoft.co.uk/api/Return/CreateReturn/456');
      expect(ret.orderId).toBe(456);
    });

    it('rejects a body that is not an object', async () => {
      const fetchMock = mockFetch(jsonResponse([1, 2]));

      await expect(returnsWith(fetchMock).create(456)).rejects.toThrow(new APIError('Unexpected response payload'));
    });

    it.each(STATUS_CASES)('maps %i to %O', async (status, kind) => {
      const fetchMock = mockFetch(jsonResponse({ error: 'failed' }, status));

      const error = await returnsWith(fetchMock).create(456).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(kind);
      expect(error).toHaveProperty('name', kind.name);
    });

    it('reports the status in the catch-all message', async () => {
      const fetchMock = mockFetch(jsonResponse({ error: 'Internal failure' }, 500));

      await expect(returnsWith(fetchMock).create(456)).rejects.toThrow('API error: 500 - Internal failure');
    });
  });

  describe('addItem', () => {
    const item: ReturnItemAttributes = {
      product_id: 123,
      quantity: 2,
      reason_id: 1,
      unit_value: 25.5,
      notes: 'Damaged item',
    };

    it('posts the renamed item fields', async () => {
      const fetchMock = mockFetch(jsonResponse({ ID: 789 }));

      await returnsWith(fetchMock).addItem(456, item);

      const request = recordedRequest(fetchMock);
      expect(request.method).toBe('POST');
      expect(request.url).toBe('https://api.mintsoft.co.uk/api/Return/456/AddItem');
      expect(request.headers.get('content-type')).toBe('application/json');
      expect(JSON.parse(request.body ?? '')).toEqual({
        ProductId: 123,
        Quantity: 2,
        ReasonId: 1,
        UnitValue: 25.5,
        Notes: 'Damaged item',
      });
    });

    it('omits optional fields that were not supplied', async () => {
      const fetchMock = mockFetch(jsonResponse({ ID: 789 }));

      await returnsWith(fetchMock).addItem(456, { product_id: 123, quantity: 2, reason_id: 1, notes: null });

      expect(recordedRequest(fetchMock).body).toBe('{"ProductId":123,"Quantity":2,"ReasonId":1}');
    });

    it('wraps the server response without merging caller data', async () => {
      const fetchMock = mockFetch(
        jsonResponse({
          ID: 789,
          Success: true,
          Message: 'Item added successfully',
          WarningMessage: 'Stock level low',
          AllocatedFromReplen: true,
        })
      );

      const ret = await returnsWith(fetchMock).addItem(456, item);

      expect(ret).toBeInstanceOf(Return);
      expect(ret.id).toBe(789);
      expect(ret.get('success')).toBe(true);
      expect(ret.get('message')).toBe('Item added successfully');
      expect(ret.get('warning_message')).toBe('Stock level low');
      expect(ret.get('allocated_from_replen')).toBe(true);
      expect(ret.get('return_id')).toBeUndefined();
      expect(ret.get('item_attributes')).toBeUndefined();
      expect(ret.originalResponse.WarningMessage).toBe('Stock level low');
    });

    it('parses a JSON body delivered as text', async () => {
      const fetchMock = mockFetch(textResponse('{"ID":789,"Success":true}'));

      const ret = await returnsWith(fetchMock).addItem(456, item);

      expect(ret.toHash()).toEqual({ id: 789, success: true });
    });

    it('rejects a text body that is not JSON', async () => {
      const fetchMock = mockFetch(textResponse('OK'));

      await expect(returnsWith(fetchMock).addItem(456, item)).rejects.toThrow('Invalid JSON response: 200');
    });

    describe('validation', () => {
      it.each([[0], [null], ['x']])('rejects return id %j', async (returnId) => {
        const fetchMock = mockFetch();

        await expect(returnsWith(fetchMock).addItem(returnId, item)).rejects.toThrow(
          new ValidationError('Return ID required')
        );
        expect(fetchMock).not.toHaveBeenCalled();
      });

      it.each([
        [{ quantity: 2, reason_id: 1 }, 'product_id required'],
        [{ product_id: 123, reason_id: 1 }, 'quantity required'],
        [{ product_id: 123, quantity: 2 }, 'reason_id required'],
        [{ product_id: 123, quantity: null, reason_id: 1 }, 'quantity required'],
        [{ reason_id: 1 }, 'product_id required'],
        [{ product_id: 123, quantity: 0 }, 'reason_id required'],
      ])('rejects %j with "%s"', async (attributes: ReturnItemAttributes, message: string) => {
        const fetchMock = mockFetch();

        await expect(returnsWith(fetchMock).addItem(456, attributes)).rejects.toThrow(new ValidationError(message));
        expect(fetchMock).not.toHaveBeenCalled();
      });

      it.each([[0], [-1], ['abc']])('rejects quantity %j as not positive', async (quantity) => {
        const fetchMock = mockFetch();

        await expect(returnsWith(fetchMock).addItem(456, { ...item, quantity })).rejects.toThrow(
          new ValidationError('Quantity must be positive')
        );
      });

      it('checks the return id before the item fields', async () => {
        await expect(returnsWith(mockFetch()).addItem(0, {})).rejects.toThrow(new ValidationError('Return ID required'));
      });
    });

    it.each(STATUS_CASES)('maps %i to %O', async (status, kind) => {
      const fetchMock = mockFetch(jsonResponse({ message: 'failed' }, status));

      const error = await returnsWith(fetchMock).addItem(456, item).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(kind);
      expect(error).toHaveProperty('name', kind.name);
    });
  });
});

describe('formatItemPayload', () => {
  it('renames fields and keeps caller values unchanged', () => {
    expect(formatItemPayload({ product_id: 'P-1', quantity: '3', reason_id: 2, unit_value: '9.99' })).toEqual({
      ProductId: 'P-1',
      Quantity: '3',
      ReasonId: 2,
      UnitValue: '9.99',
    });
  });
});

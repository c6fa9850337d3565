import { createOzonClient, OzonApi } from '../../services/marketplaces/ozon/ozonApi';
import { AuthError, TransientError } from '../../utils/errors';
import { installFakeApi, sequence } from '../helpers/fakeApi';

function setup(handler: Parameters<typeof installFakeApi>[1]) {
  const client = createOzonClient({ clientId: '123456', apiKey: 'test-api-key', timeoutMs: 1000 });
  const calls = installFakeApi(client, handler);
  return { api: new OzonApi(client), calls };
}

describe('OzonApi', () => {
  describe('fetchCatalogPage', () => {
    it('should send auth headers and the list filter', async () => {
      const { api, calls } = setup(() => ({
        status: 200,
        data: { result: { items: [{ product_id: 9001, offer_id: 'W-100' }], total: 1, last_id: 'bnVsbA' } },
      }));

      const page = await api.fetchCatalogPage(null);

      expect(calls[0].method).toBe('POST');
      expect(calls[0].url).toBe('/v2/product/list');
      expect(calls[0].headers.get('Client-Id')).toBe('123456');
      expect(calls[0].headers.get('Api-Key')).toBe('test-api-key');
      expect(calls[0].body).toEqual({ filter: { visibility: 'ALL' }, last_id: '', limit: 1000 });
      expect(page).toEqual({ offers: [{ offerId: 'W-100', productId: 9001 }], nextCursor: 'bnVsbA' });
    });

    it('should pass the cursor and end on an empty page', async () => {
      const { api, calls } = setup(() => ({ status: 200, data: { result: { items: [], total: 1, last_id: '' } } }));

      const page = await api.fetchCatalogPage('bnVsbA');

      expect(calls[0].body).toEqual({ filter: { visibility: 'ALL' }, last_id: 'bnVsbA', limit: 1000 });
      expect(page).toEqual({ offers: [], nextCursor: null });
    });

    it('should raise AuthError on 401', async () => {
      const { api } = setup(() => ({ status: 401, data: { code: 16, message: 'Client-Id and Api-Key headers are required' } }));

      await expect(api.fetchCatalogPage(null)).rejects.toBeInstanceOf(AuthError);
    });

    it('should treat a malformed body as transient', async () => {
      const { api } = setup(() => ({ status: 200, data: { items: [] } }));

      await expect(api.fetchCatalogPage(null)).rejects.toBeInstanceOf(TransientError);
    });
  });

  describe('updatePrices', () => {
    it('should format prices and report per-item results', async () => {
      const { api, calls } = setup(() => ({
        status: 200,
        data: {
          result: [
            { product_id: 9001, offer_id: 'W-100', updated: true, errors: [] },
            {
              product_id: 9002,
              offer_id: 'W-200',
              updated: false,
              errors: [{ code: 'PRICE_TOO_LOW', message: 'price is too low' }],
            },
          ],
        },
      }));

      const results = await api.updatePrices([
        { offerId: 'W-100', productId: 9001, price: 5990, currency: 'RUB' },
        { offerId: 'W-200', productId: 9002, price: 1, currency: 'RUB' },
        { offerId: 'W-300', productId: 9003, price: 100, currency: 'RUB' },
      ]);

      expect(calls[0].url).toBe('/v1/product/import/prices');
      expect(calls[0].body).toEqual({
        prices: [
          { offer_id: 'W-100', product_id: 9001, price: '5990', old_price: '0', currency_code: 'RUB', auto_action_enabled: 'UNKNOWN' },
          { offer_id: 'W-200', product_id: 9002, price: '1', old_price: '0', currency_code: 'RUB', auto_action_enabled: 'UNKNOWN' },
          { offer_id: 'W-300', product_id: 9003, price: '100', old_price: '0', currency_code: 'RUB', auto_action_enabled: 'UNKNOWN' },
        ],
      });
      expect(results).toEqual([
        { id: 'W-100', ok: true, errors: [] },
        { id: 'W-200', ok: false, errors: ['PRICE_TOO_LOW: price is too low'] },
        { id: 'W-300', ok: false, errors: ['no result reported for item'] },
      ]);
    });
  });

  describe('updateStocks', () => {
    it('should send stocks with the warehouse id', async () => {
      const { api, calls } = setup(
        sequence({
          status: 200,
          data: { result: [{ warehouse_id: 22000, product_id: 9001, offer_id: 'W-100', updated: true, errors: [] }] },
        })
      );

      const results = await api.updateStocks([{ offerId: 'W-100', productId: 9001, warehouseId: 22000, quantity: 100 }]);

      expect(calls[0].url).toBe('/v2/products/stocks');
      expect(calls[0].body).toEqual({
        stocks: [{ offer_id: 'W-100', product_id: 9001, stock: 100, warehouse_id: 22000 }],
      });
      expect(results).toEqual([{ id: 'W-100', ok: true, errors: [] }]);
    });
  });
});

/**
 * Ozon Seller API
 * Каталог, цены и остатки. Авторизация заголовками Client-Id / Api-Key.
 */

import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { OZON } from '../../../config/constants';
import { CatalogPage, ItemResult, MarketplaceApi, PriceUpdate, StockUpdate } from '../../../types/marketplace';
import { createApiClient, request } from '../httpClient';
import { matchItemResults } from '../itemResults';

export interface OzonCredentials {
  clientId: string;
  apiKey: string;
  baseUrl?: string;
  timeoutMs: number;
}

const ozonItemError = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
});

const productListSchema = z.object({
  result: z.object({
    items: z.array(
      z.object({
        product_id: z.number(),
        offer_id: z.string(),
      })
    ),
    total: z.number().optional(),
    last_id: z.string().optional(),
  }),
});

const updateResultSchema = z.object({
  result: z.array(
    z.object({
      offer_id: z.string(),
      product_id: z.number().optional(),
      updated: z.boolean(),
      errors: z.array(ozonItemError).optional(),
    })
  ),
});

type UpdateResult = z.infer<typeof updateResultSchema>;

function toReported(body: UpdateResult) {
  return body.result.map((item) => ({
    id: item.offer_id,
    ok: item.updated && (item.errors?.length ?? 0) === 0,
    errors: (item.errors ?? []).map((e) => [e.code, e.message].filter(Boolean).join(': ')),
  }));
}

export function createOzonClient(credentials: OzonCredentials): AxiosInstance {
  return createApiClient({
    baseURL: credentials.baseUrl ?? OZON.BASE_URL,
    timeoutMs: credentials.timeoutMs,
    headers: {
      'Client-Id': credentials.clientId,
      'Api-Key': credentials.apiKey,
    },
  });
}

export class OzonApi implements MarketplaceApi {
  name = 'Ozon';

  constructor(private client: AxiosInstance) {}

  async fetchCatalogPage(cursor: string | null): Promise<CatalogPage> {
    const body = await request(
      this.client,
      {
        method: 'POST',
        url: OZON.PRODUCT_LIST_PATH,
        data: {
          filter: { visibility: 'ALL' },
          last_id: cursor ?? '',
          limit: OZON.LIST_PAGE_SIZE,
        },
      },
      productListSchema
    );

    const { items, last_id: lastId } = body.result;
    return {
      offers: items.map((item) => ({ offerId: item.offer_id, productId: item.product_id })),
      nextCursor: items.length > 0 && lastId ? lastId : null,
    };
  }

  async updatePrices(batch: PriceUpdate[]): Promise<ItemResult[]> {
    const body = await request(
      this.client,
      {
        method: 'POST',
        url: OZON.IMPORT_PRICES_PATH,
        data: {
          prices: batch.map((update) => ({
            offer_id: update.offerId,
            product_id: update.productId,
            price: String(update.price),
            old_price: '0',
            currency_code: update.currency,
            auto_action_enabled: 'UNKNOWN',
          })),
        },
      },
      updateResultSchema
    );

    return matchItemResults(batch.map((update) => update.offerId), toReported(body));
  }

  async updateStocks(batch: StockUpdate[]): Promise<ItemResult[]> {
    const body = await request(
      this.client,
      {
        method: 'POST',
        url: OZON.STOCKS_PATH,
        data: {
          stocks: batch.map((update) => ({
            offer_id: update.offerId,
            product_id: update.productId,
            stock: update.quantity,
            warehouse_id: update.warehouseId,
          })),
        },
      },
      updateResultSchema
    );

    return matchItemResults(batch.map((update) => update.offerId), toReported(body));
  }
}

export default OzonApi;

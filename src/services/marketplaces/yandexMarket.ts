/**
 * Yandex.Market Partner API
 * Каталог кампании, цены и остатки. Авторизация Bearer-токеном.
 */

import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { YANDEX_MARKET, yandexMarketPaths } from '../../config/constants';
import { CatalogPage, ItemResult, MarketplaceApi, PriceUpdate, StockUpdate } from '../../types/marketplace';
import { createApiClient, request } from './httpClient';
import { batchResults } from './itemResults';

export interface YandexMarketCredentials {
  token: string;
  baseUrl?: string;
  timeoutMs: number;
}

const mappingEntriesSchema = z.object({
  result: z.object({
    paging: z.object({ nextPageToken: z.string().optional() }).optional(),
    offerMappingEntries: z.array(
      z.object({
        offer: z.object({ shopSku: z.string() }),
        mapping: z.object({ marketSku: z.number().optional() }).optional(),
      })
    ),
  }),
});

const statusSchema = z.object({
  status: z.enum(['OK', 'ERROR']),
  errors: z
    .array(z.object({ code: z.string().optional(), message: z.string().optional() }))
    .optional(),
});

type StatusBody = z.infer<typeof statusSchema>;

// updatedAt в формате YYYY-MM-DDTHH:mm:ssZ
export function formatUpdatedAt(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function fromStatus(sentIds: string[], body: StatusBody): ItemResult[] {
  if (body.status === 'OK') {
    return batchResults(sentIds, true);
  }
  const errors = (body.errors ?? []).map((e) => [e.code, e.message].filter(Boolean).join(': '));
  return batchResults(sentIds, false, errors.length > 0 ? errors : ['batch rejected']);
}

export function createYandexMarketClient(credentials: YandexMarketCredentials): AxiosInstance {
  return createApiClient({
    baseURL: credentials.baseUrl ?? YANDEX_MARKET.BASE_URL,
    timeoutMs: credentials.timeoutMs,
    headers: { Authorization: `Bearer ${credentials.token}` },
  });
}

export class YandexMarketAdapter implements MarketplaceApi {
  name: string;
  private updatedAt: string;

  // runStartedAt уходит в updatedAt всех остатков прогона
  constructor(
    private client: AxiosInstance,
    private campaignId: string,
    runStartedAt: Date = new Date()
  ) {
    this.name = `Яндекс.Маркет #${campaignId}`;
    this.updatedAt = formatUpdatedAt(runStartedAt);
  }

  async fetchCatalogPage(cursor: string | null): Promise<CatalogPage> {
    const body = await request(
      this.client,
      {
        method: 'GET',
        url: yandexMarketPaths.offerMappingEntries(this.campaignId),
        params: cursor ? { page_token: cursor, limit: YANDEX_MARKET.LIST_PAGE_SIZE } : { limit: YANDEX_MARKET.LIST_PAGE_SIZE },
      },
      mappingEntriesSchema
    );

    const { offerMappingEntries, paging } = body.result;
    return {
      offers: offerMappingEntries.map((entry) => ({
        offerId: entry.offer.shopSku,
        sku: entry.mapping?.marketSku,
      })),
      nextCursor: paging?.nextPageToken || null,
    };
  }

  async updatePrices(batch: PriceUpdate[]): Promise<ItemResult[]> {
    const body = await request(
      this.client,
      {
        method: 'POST',
        url: yandexMarketPaths.offerPriceUpdates(this.campaignId),
        data: {
          offers: batch.map((update) => ({
            id: update.offerId,
            price: { value: update.price, currencyId: update.currency },
          })),
        },
      },
      statusSchema
    );

    return fromStatus(batch.map((update) => update.offerId), body);
  }

  async updateStocks(batch: StockUpdate[]): Promise<ItemResult[]> {
    const { updatedAt } = this;
    const body = await request(
      this.client,
      {
        method: 'PUT',
        url: yandexMarketPaths.offerStocks(this.campaignId),
        data: {
          skus: batch.map((update) => ({
            sku: update.offerId,
            warehouseId: update.warehouseId,
            items: [{ count: update.quantity, type: YANDEX_MARKET.STOCK_TYPE, updatedAt }],
          })),
        },
      },
      statusSchema
    );

    return fromStatus(batch.map((update) => update.offerId), body);
  }
}

export default YandexMarketAdapter;

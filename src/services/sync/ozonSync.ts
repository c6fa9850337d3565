import { OzonConfig, PriceSourceConfig } from '../../config/env';
import { OZON } from '../../config/constants';
import { MarketplaceApi } from '../../types/marketplace';
import { PriceSourceResult } from '../../types/priceSource';
import logger, { logSync } from '../../utils/logger';
import { createOzonClient, OzonApi } from '../marketplaces/ozon/ozonApi';
import { loadFromSource } from '../priceSource/priceSourceService';
import { sendInBatches } from './batchUpdater';
import { fetchCatalog } from './catalogFetcher';
import { mapRecords, missingOffers } from './identifierMapper';
import { buildPriceUpdates, buildStockUpdates } from './payloads';
import { createReport, recordOutcome, recordUnmapped, summarize, SyncReport } from './syncReport';

export interface SyncDeps {
  api?: MarketplaceApi;
  loadRecords?: (source: PriceSourceConfig) => PriceSourceResult;
}

/**
 * Прайс -> каталог Ozon -> сопоставление -> цены -> остатки
 */
export async function runOzonSync(config: OzonConfig, deps: SyncDeps = {}): Promise<SyncReport> {
  const report = createReport('Ozon');
  const { records, rejected } = (deps.loadRecords ?? loadFromSource)(config.priceSource);
  report.rejectedRows = rejected.length;

  if (records.length === 0) {
    logger.warn('Ozon: price source is empty, nothing to update');
    return report;
  }

  const api =
    deps.api ??
    new OzonApi(
      createOzonClient({
        clientId: config.clientId,
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
        timeoutMs: config.sync.httpTimeoutMs,
      })
    );
  const policy = config.sync.retry;

  const offers = await fetchCatalog(api, policy);
  const { mapped, unmapped } = mapRecords(records, offers);

  recordUnmapped(report, unmapped.map((record) => record.productId));
  for (const record of unmapped) {
    logger.warn(`Ozon: no offer for product ${record.productId}, skipped`);
  }

  const prices = buildPriceUpdates(mapped, OZON.CURRENCY);
  recordOutcome(
    report.prices,
    await sendInBatches(prices, OZON.PRICE_BATCH_SIZE, (batch) => api.updatePrices(batch), policy, 'Ozon prices'),
    'Ozon prices'
  );

  const stocks = buildStockUpdates(
    mapped,
    missingOffers(offers, mapped),
    config.warehouseId,
    config.sync.zeroMissingStock
  );
  recordOutcome(
    report.stocks,
    await sendInBatches(stocks, OZON.STOCK_BATCH_SIZE, (batch) => api.updateStocks(batch), policy, 'Ozon stocks'),
    'Ozon stocks'
  );

  logSync(summarize(report));
  return report;
}

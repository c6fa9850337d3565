import { YandexMarketCampaign, YandexMarketConfig } from '../../config/env';
import { YANDEX_MARKET } from '../../config/constants';
import { MarketplaceApi } from '../../types/marketplace';
import { LocalPriceRecord } from '../../types/priceSource';
import { RetryPolicy } from '../../utils/retry';
import logger, { logSync } from '../../utils/logger';
import { createYandexMarketClient, YandexMarketAdapter } from '../marketplaces/yandexMarket';
import { loadFromSource } from '../priceSource/priceSourceService';
import { sendInBatches } from './batchUpdater';
import { fetchCatalog } from './catalogFetcher';
import { mapRecords, missingOffers } from './identifierMapper';
import { buildPriceUpdates, buildStockUpdates } from './payloads';
import { SyncDeps } from './ozonSync';
import { createReport, recordOutcome, recordUnmapped, summarize, SyncReport } from './syncReport';

export interface YandexMarketSyncDeps extends Omit<SyncDeps, 'api'> {
  createApi?: (campaign: YandexMarketCampaign, runStartedAt: Date) => MarketplaceApi;
  now?: () => Date;
}

export interface CampaignReport {
  campaign: YandexMarketCampaign;
  report: SyncReport;
}

async function syncCampaign(
  api: MarketplaceApi,
  campaign: YandexMarketCampaign,
  records: LocalPriceRecord[],
  policy: RetryPolicy,
  zeroMissingStock: boolean
): Promise<SyncReport> {
  const report = createReport(`Яндекс.Маркет ${campaign.model} #${campaign.campaignId}`);

  const offers = await fetchCatalog(api, policy);
  const { mapped, unmapped } = mapRecords(records, offers);

  recordUnmapped(report, unmapped.map((record) => record.productId));
  if (unmapped.length > 0) {
    logger.warn(`${report.marketplace}: ${unmapped.length} product(s) not listed, skipped`, {
      productIds: unmapped.map((record) => record.productId),
    });
  }

  const stocks = buildStockUpdates(mapped, missingOffers(offers, mapped), campaign.warehouseId, zeroMissingStock);
  recordOutcome(
    report.stocks,
    await sendInBatches(stocks, YANDEX_MARKET.STOCK_BATCH_SIZE, (batch) => api.updateStocks(batch), policy, `${campaign.model} stocks`),
    `${campaign.model} stocks`
  );

  const prices = buildPriceUpdates(mapped, YANDEX_MARKET.CURRENCY);
  recordOutcome(
    report.prices,
    await sendInBatches(prices, YANDEX_MARKET.PRICE_BATCH_SIZE, (batch) => api.updatePrices(batch), policy, `${campaign.model} prices`),
    `${campaign.model} prices`
  );

  logSync(summarize(report));
  return report;
}

/**
 * Для каждой кампании (FBS, затем DBS): каталог -> остатки -> цены
 */
export async function runYandexMarketSync(
  config: YandexMarketConfig,
  deps: YandexMarketSyncDeps = {}
): Promise<CampaignReport[]> {
  const { records, rejected } = (deps.loadRecords ?? loadFromSource)(config.priceSource);

  if (records.length === 0) {
    logger.warn('Яндекс.Маркет: price source is empty, nothing to update');
    return config.campaigns.map((campaign) => {
      const report = createReport(`Яндекс.Маркет ${campaign.model} #${campaign.campaignId}`);
      report.rejectedRows = rejected.length;
      return { campaign, report };
    });
  }

  const runStartedAt = (deps.now ?? (() => new Date()))();
  let createApi = deps.createApi;
  if (!createApi) {
    // Одна HTTP-сессия на все кампании
    const client = createYandexMarketClient({
      token: config.token,
      baseUrl: config.baseUrl,
      timeoutMs: config.sync.httpTimeoutMs,
    });
    createApi = (campaign, startedAt) => new YandexMarketAdapter(client, campaign.campaignId, startedAt);
  }

  const reports: CampaignReport[] = [];
  for (const campaign of config.campaigns) {
    const report = await syncCampaign(createApi(campaign, runStartedAt), campaign, records, config.sync.retry, config.sync.zeroMissingStock);
    report.rejectedRows = rejected.length;
    reports.push({ campaign, report });
  }

  return reports;
}

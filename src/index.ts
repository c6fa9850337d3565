export { loadOzonConfig, loadYandexMarketConfig } from './config/env';
export type { OzonConfig, YandexMarketConfig, YandexMarketCampaign, SyncOptions } from './config/env';
export { OzonApi, createOzonClient } from './services/marketplaces/ozon/ozonApi';
export { YandexMarketAdapter, createYandexMarketClient } from './services/marketplaces/yandexMarket';
export { loadPriceRecords, normalizeRows } from './services/priceSource/priceSourceService';
export { runOzonSync } from './services/sync/ozonSync';
export { runYandexMarketSync } from './services/sync/yandexMarketSync';
export { mapRecords } from './services/sync/identifierMapper';
export { summarize } from './services/sync/syncReport';
export type { SyncReport } from './services/sync/syncReport';
export * from './types/marketplace';
export * from './types/priceSource';
export * from './utils/errors';

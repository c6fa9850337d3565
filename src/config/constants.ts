/**
 * Application Constants
 * Лимиты и адреса партнёрских API маркетплейсов
 */

// Ozon Seller API
export const OZON = {
  BASE_URL: 'https://api-seller.ozon.ru',
  PRODUCT_LIST_PATH: '/v2/product/list',
  IMPORT_PRICES_PATH: '/v1/product/import/prices',
  STOCKS_PATH: '/v2/products/stocks',
  LIST_PAGE_SIZE: 1000,
  PRICE_BATCH_SIZE: 1000,
  STOCK_BATCH_SIZE: 100,
  CURRENCY: 'RUB',
} as const;

// Yandex.Market Partner API
export const YANDEX_MARKET = {
  BASE_URL: 'https://api.partner.market.yandex.ru',
  LIST_PAGE_SIZE: 200,
  PRICE_BATCH_SIZE: 500,
  STOCK_BATCH_SIZE: 2000,
  CURRENCY: 'RUR',
  STOCK_TYPE: 'FIT',
} as const;

export const yandexMarketPaths = {
  offerMappingEntries: (campaignId: string) => `/campaigns/${campaignId}/offer-mapping-entries`,
  offerPriceUpdates: (campaignId: string) => `/campaigns/${campaignId}/offer-prices/updates`,
  offerStocks: (campaignId: string) => `/campaigns/${campaignId}/offers/stocks`,
};

// Sync defaults (переопределяются через env)
export const SYNC = {
  MAX_RETRIES: 3,
  RETRY_DELAY_MS: 5000,
  RATE_LIMIT_MAX_RETRIES: 1,
  RATE_LIMIT_DELAY_MS: 10000,
  HTTP_TIMEOUT_MS: 30000,
  ZERO_MISSING_STOCK: true,
} as const;

// Колонки выгрузки остатков поставщика
export const PRICE_SOURCE_COLUMNS = {
  ID: 'Код',
  PRICE: 'Цена',
  STOCK: 'Количество',
} as const;

// Поставщик пишет ">10" для большого остатка и "1" для последней единицы
export const STOCK_MARKERS = {
  PLENTY: '>10',
  PLENTY_QUANTITY: 100,
  LAST_ITEM: '1',
} as const;

// HTTP Status Codes
export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

// Error Codes
export const ERROR_CODES = {
  CONFIG_INVALID: 'CONFIG_INVALID',
  AUTH_REJECTED: 'AUTH_REJECTED',
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
  TRANSIENT_FAILURE: 'TRANSIENT_FAILURE',
  REQUEST_REJECTED: 'REQUEST_REJECTED',
  ITEM_REJECTED: 'ITEM_REJECTED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export default {
  OZON,
  YANDEX_MARKET,
  SYNC,
  PRICE_SOURCE_COLUMNS,
  STOCK_MARKERS,
  HTTP_STATUS,
  ERROR_CODES,
};

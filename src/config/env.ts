/**
 * Environment Variables Validation
 * Валидация и типизация переменных окружения перед запуском синхронизации.
 * Конфиг возвращается значением и передаётся явно, глобального состояния нет.
 */

import { ConfigError } from '../utils/errors';
import { OZON, YANDEX_MARKET, SYNC, PRICE_SOURCE_COLUMNS } from './constants';
import { PriceSourceColumns } from '../types/priceSource';
import { RetryPolicy } from '../utils/retry';

export type EnvSource = Record<string, string | undefined>;

export type FulfillmentModel = 'FBS' | 'DBS';

export interface SyncOptions {
  retry: RetryPolicy;
  httpTimeoutMs: number;
  zeroMissingStock: boolean;
}

export interface PriceSourceConfig {
  path: string;
  columns: PriceSourceColumns;
}

export interface OzonConfig {
  clientId: string;
  apiKey: string;
  warehouseId: number;
  baseUrl: string;
  priceSource: PriceSourceConfig;
  sync: SyncOptions;
}

export interface YandexMarketCampaign {
  model: FulfillmentModel;
  campaignId: string;
  warehouseId: number;
}

export interface YandexMarketConfig {
  token: string;
  baseUrl: string;
  campaigns: YandexMarketCampaign[];
  priceSource: PriceSourceConfig;
  sync: SyncOptions;
}

export class EnvValidator {
  private errors: string[] = [];

  constructor(private source: EnvSource) {}

  getString(key: string, required: boolean = false, defaultValue?: string): string {
    const value = this.source[key]?.trim() || defaultValue;

    if (required && !value) {
      this.errors.push(`Missing required environment variable: ${key}`);
      return '';
    }

    return value || '';
  }

  getNumber(key: string, required: boolean = false, defaultValue?: number): number {
    const value = this.source[key]?.trim();

    if (!value) {
      if (required) {
        this.errors.push(`Missing required environment variable: ${key}`);
        return 0;
      }
      return defaultValue ?? 0;
    }

    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
      this.errors.push(`Invalid number for environment variable: ${key}`);
      return defaultValue ?? 0;
    }

    return parsed;
  }

  getBoolean(key: string, defaultValue: boolean = false): boolean {
    const value = this.source[key]?.trim();
    if (!value) return defaultValue;
    return ['true', '1', 'yes'].includes(value.toLowerCase());
  }

  addError(message: string): void {
    this.errors.push(message);
  }

  priceSource(): PriceSourceConfig {
    return {
      path: this.getString('PRICE_SOURCE_PATH', true),
      columns: {
        id: this.getString('PRICE_SOURCE_ID_COLUMN', false, PRICE_SOURCE_COLUMNS.ID),
        price: this.getString('PRICE_SOURCE_PRICE_COLUMN', false, PRICE_SOURCE_COLUMNS.PRICE),
        stock: this.getString('PRICE_SOURCE_STOCK_COLUMN', false, PRICE_SOURCE_COLUMNS.STOCK),
      },
    };
  }

  syncOptions(): SyncOptions {
    return {
      retry: {
        maxRetries: this.getNumber('SYNC_MAX_RETRIES', false, SYNC.MAX_RETRIES),
        delayMs: this.getNumber('SYNC_RETRY_DELAY_MS', false, SYNC.RETRY_DELAY_MS),
        rateLimitMaxRetries: this.getNumber('SYNC_RATE_LIMIT_MAX_RETRIES', false, SYNC.RATE_LIMIT_MAX_RETRIES),
        rateLimitDelayMs: this.getNumber('SYNC_RATE_LIMIT_DELAY_MS', false, SYNC.RATE_LIMIT_DELAY_MS),
      },
      httpTimeoutMs: this.getNumber('HTTP_TIMEOUT_MS', false, SYNC.HTTP_TIMEOUT_MS),
      zeroMissingStock: this.getBoolean('SYNC_ZERO_MISSING_STOCK', SYNC.ZERO_MISSING_STOCK),
    };
  }

  /**
   * Бросает ConfigError со всеми накопленными проблемами сразу
   */
  assertValid(scope: string): void {
    if (this.errors.length > 0) {
      throw new ConfigError(`Invalid ${scope} configuration: ${this.errors.join('; ')}`, [...this.errors]);
    }
  }
}

export function loadOzonConfig(source: EnvSource = process.env): OzonConfig {
  const env = new EnvValidator(source);

  const config: OzonConfig = {
    clientId: env.getString('OZON_CLIENT_ID', true),
    apiKey: env.getString('OZON_API_KEY', true),
    warehouseId: env.getNumber('OZON_WAREHOUSE_ID', true),
    baseUrl: env.getString('OZON_API_URL', false, OZON.BASE_URL),
    priceSource: env.priceSource(),
    sync: env.syncOptions(),
  };

  env.assertValid('Ozon');
  return config;
}

export function loadYandexMarketConfig(source: EnvSource = process.env): YandexMarketConfig {
  const env = new EnvValidator(source);
  const campaigns: YandexMarketCampaign[] = [];

  // Каждая кампания (FBS / DBS) отгружает со своего склада
  const pairs: Array<[FulfillmentModel, string, string]> = [
    ['FBS', 'FBS_ID', 'WAREHOUSE_FBS_ID'],
    ['DBS', 'DBS_ID', 'WAREHOUSE_DBS_ID'],
  ];

  for (const [model, campaignKey, warehouseKey] of pairs) {
    const campaignId = env.getString(campaignKey);
    const hasWarehouse = Boolean(source[warehouseKey]?.trim());

    if (!campaignId && !hasWarehouse) {
      continue;
    }
    if (!campaignId) {
      env.addError(`${warehouseKey} is set but ${campaignKey} is missing`);
      continue;
    }

    campaigns.push({ model, campaignId, warehouseId: env.getNumber(warehouseKey, true) });
  }

  if (campaigns.length === 0) {
    env.addError('At least one campaign is required: set FBS_ID or DBS_ID');
  }

  const config: YandexMarketConfig = {
    token: env.getString('MARKET_TOKEN', true),
    baseUrl: env.getString('MARKET_API_URL', false, YANDEX_MARKET.BASE_URL),
    campaigns,
    priceSource: env.priceSource(),
    sync: env.syncOptions(),
  };

  env.assertValid('Yandex.Market');
  return config;
}

// Типы для маркетплейсов

export interface RemoteOffer {
  offerId: string;
  // Ozon product_id
  productId?: number;
  // Yandex.Market marketSku
  sku?: number;
}

export interface CatalogPage {
  offers: RemoteOffer[];
  nextCursor: string | null;
}

export interface PriceUpdate {
  offerId: string;
  productId?: number;
  price: number;
  currency: string;
}

export interface StockUpdate {
  offerId: string;
  productId?: number;
  warehouseId: number;
  quantity: number;
}

export interface ItemResult {
  id: string;
  ok: boolean;
  errors: string[];
}

export interface MarketplaceApi {
  name: string;
  fetchCatalogPage(cursor: string | null): Promise<CatalogPage>;
  updatePrices(batch: PriceUpdate[]): Promise<ItemResult[]>;
  updateStocks(batch: StockUpdate[]): Promise<ItemResult[]>;
}

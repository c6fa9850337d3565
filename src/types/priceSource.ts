// Типы локального прайса поставщика

export interface LocalPriceRecord {
  productId: string;
  price: number;
  stock: number;
}

export type RawPriceRow = Record<string, unknown>;

export interface PriceSourceColumns {
  id: string;
  price: string;
  stock: string;
}

export interface RejectedRow {
  row: number;
  productId?: string;
  reason: string;
}

export interface PriceSourceResult {
  records: LocalPriceRecord[];
  rejected: RejectedRow[];
}

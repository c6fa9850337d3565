import { PriceUpdate, RemoteOffer, StockUpdate } from '../../types/marketplace';
import { MappedRecord } from './identifierMapper';

export function buildPriceUpdates(mapped: MappedRecord[], currency: string): PriceUpdate[] {
  return mapped.map(({ record, offer }) => ({
    offerId: offer.offerId,
    productId: offer.productId,
    price: record.price,
    currency,
  }));
}

/**
 * Остатки по прайсу; при zeroMissing всё, чего нет в прайсе, обнуляется
 */
export function buildStockUpdates(
  mapped: MappedRecord[],
  missing: RemoteOffer[],
  warehouseId: number,
  zeroMissing: boolean
): StockUpdate[] {
  const updates: StockUpdate[] = mapped.map(({ record, offer }) => ({
    offerId: offer.offerId,
    productId: offer.productId,
    warehouseId,
    quantity: record.stock,
  }));

  if (zeroMissing) {
    for (const offer of missing) {
      updates.push({ offerId: offer.offerId, productId: offer.productId, warehouseId, quantity: 0 });
    }
  }

  return updates;
}

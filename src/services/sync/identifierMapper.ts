import { LocalPriceRecord } from '../../types/priceSource';
import { RemoteOffer } from '../../types/marketplace';

export interface MappedRecord {
  record: LocalPriceRecord;
  offer: RemoteOffer;
}

export interface MappingResult {
  mapped: MappedRecord[];
  unmapped: LocalPriceRecord[];
}

// Код товара в прайсе совпадает с артикулом продавца (offer_id / shopSku)
const joinKey = (value: string) => value.trim();

export function mapRecords(records: LocalPriceRecord[], offers: RemoteOffer[]): MappingResult {
  const byOfferId = new Map<string, RemoteOffer>();
  for (const offer of offers) {
    const key = joinKey(offer.offerId);
    if (!byOfferId.has(key)) {
      byOfferId.set(key, offer);
    }
  }

  const mapped: MappedRecord[] = [];
  const unmapped: LocalPriceRecord[] = [];

  for (const record of records) {
    const offer = byOfferId.get(joinKey(record.productId));
    if (offer) {
      mapped.push({ record, offer });
    } else {
      unmapped.push(record);
    }
  }

  return { mapped, unmapped };
}

/**
 * Офферы каталога, которых больше нет в прайсе
 */
export function missingOffers(offers: RemoteOffer[], mapped: MappedRecord[]): RemoteOffer[] {
  const present = new Set(mapped.map((m) => joinKey(m.offer.offerId)));
  return offers.filter((offer) => !present.has(joinKey(offer.offerId)));
}

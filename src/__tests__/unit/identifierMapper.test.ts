import { mapRecords, missingOffers } from '../../services/sync/identifierMapper';
import { LocalPriceRecord } from '../../types/priceSource';
import { RemoteOffer } from '../../types/marketplace';

const catalog: RemoteOffer[] = [
  { offerId: 'W-100', productId: 9001 },
  { offerId: 'W-200', productId: 9002 },
  { offerId: 'W-300', productId: 9003 },
];

describe('mapRecords', () => {
  it('should resolve matching ids and report the rest as unmapped', () => {
    const records: LocalPriceRecord[] = [
      { productId: 'W-100', price: 1500, stock: 4 },
      { productId: 'W-300', price: 2990, stock: 0 },
      { productId: 'W-999', price: 700, stock: 2 },
    ];

    const { mapped, unmapped } = mapRecords(records, catalog);

    expect(mapped).toEqual([
      { record: records[0], offer: catalog[0] },
      { record: records[1], offer: catalog[2] },
    ]);
    expect(unmapped).toEqual([records[2]]);
  });

  it('should ignore surrounding whitespace in ids', () => {
    const { mapped } = mapRecords([{ productId: ' W-200 ', price: 1, stock: 1 }], catalog);

    expect(mapped).toHaveLength(1);
    expect(mapped[0].offer.productId).toBe(9002);
  });

  it('should map nothing against an empty catalog', () => {
    const records = [{ productId: 'W-100', price: 1, stock: 1 }];

    expect(mapRecords(records, [])).toEqual({ mapped: [], unmapped: records });
  });
});

describe('missingOffers', () => {
  it('should list catalog offers absent from the price list', () => {
    const { mapped } = mapRecords([{ productId: 'W-200', price: 10, stock: 1 }], catalog);

    expect(missingOffers(catalog, mapped).map((o) => o.offerId)).toEqual(['W-100', 'W-300']);
  });
});

import { parsePrice, parseStock } from '../../utils/priceFormat';

describe('parsePrice', () => {
  it('should strip separators, currency and kopecks', () => {
    expect(parsePrice("5'990.00 руб.")).toBe(5990);
    expect(parsePrice('1 250')).toBe(1250);
    expect(parsePrice('1500')).toBe(1500);
  });

  it('should truncate numeric cells', () => {
    expect(parsePrice(1999.99)).toBe(1999);
    expect(parsePrice(0)).toBe(0);
  });

  it('should return null for values without digits', () => {
    expect(parsePrice('руб.')).toBeNull();
    expect(parsePrice('')).toBeNull();
    expect(parsePrice(undefined)).toBeNull();
    expect(parsePrice(-5)).toBeNull();
  });

  it('should reject negative prices given as text', () => {
    expect(parsePrice('-5')).toBeNull();
    expect(parsePrice(' -1 200 руб.')).toBeNull();
  });
});

describe('parseStock', () => {
  it('should translate supplier markers', () => {
    expect(parseStock('>10')).toBe(100);
    expect(parseStock('1')).toBe(0);
    expect(parseStock(1)).toBe(0);
  });

  it('should keep plain quantities and clamp negatives', () => {
    expect(parseStock('15')).toBe(15);
    expect(parseStock(7)).toBe(7);
    expect(parseStock('0')).toBe(0);
    expect(parseStock('-3')).toBe(0);
  });

  it('should reject garbage', () => {
    expect(parseStock('много')).toBeNull();
    expect(parseStock('2.5')).toBeNull();
    expect(parseStock('')).toBeNull();
    expect(parseStock(null)).toBeNull();
  });
});

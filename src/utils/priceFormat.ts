import { STOCK_MARKERS } from '../config/constants';

/**
 * Цена из прайса поставщика в целых рублях.
 * "5'990.00 руб." -> 5990, копейки отбрасываются, отрицательные отклоняются.
 */
export function parsePrice(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) && raw >= 0 ? Math.trunc(raw) : null;
  }
  if (typeof raw !== 'string') {
    return null;
  }

  if (raw.trim().startsWith('-')) {
    return null;
  }

  const [whole] = raw.split('.');
  const digits = whole.replace(/[^0-9]/g, '');
  return digits ? parseInt(digits, 10) : null;
}

/**
 * Остаток из прайса: ">10" -> 100, "1" -> 0, отрицательные обнуляются
 */
export function parseStock(raw: unknown): number | null {
  const value = typeof raw === 'number' ? String(raw) : typeof raw === 'string' ? raw.trim() : null;
  if (value === null || value === '') {
    return null;
  }

  if (value === STOCK_MARKERS.PLENTY) return STOCK_MARKERS.PLENTY_QUANTITY;
  if (value === STOCK_MARKERS.LAST_ITEM) return 0;

  if (!/^-?\d+$/.test(value)) {
    return null;
  }
  return Math.max(0, parseInt(value, 10));
}

import fs from 'fs';
import path from 'path';
import * as XLSX from 'xlsx';
import { PRICE_SOURCE_COLUMNS } from '../../config/constants';
import { PriceSourceConfig } from '../../config/env';
import { ConfigError } from '../../utils/errors';
import logger from '../../utils/logger';
import { parsePrice, parseStock } from '../../utils/priceFormat';
import {
  LocalPriceRecord,
  PriceSourceColumns,
  PriceSourceResult,
  RawPriceRow,
  RejectedRow,
} from '../../types/priceSource';

const SPREADSHEET_EXTENSIONS = ['.xlsx', '.xls', '.csv'];

export const DEFAULT_COLUMNS: PriceSourceColumns = {
  id: PRICE_SOURCE_COLUMNS.ID,
  price: PRICE_SOURCE_COLUMNS.PRICE,
  stock: PRICE_SOURCE_COLUMNS.STOCK,
};

function isRow(value: unknown): value is RawPriceRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJsonRows(filePath: string): RawPriceRow[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Price source ${filePath} is not valid JSON: ${reason}`);
  }

  if (!Array.isArray(parsed) || !parsed.every(isRow)) {
    throw new ConfigError(`Price source ${filePath} must contain an array of row objects`);
  }
  return parsed;
}

function readSpreadsheetRows(filePath: string, extension: string): RawPriceRow[] {
  // CSV: строка UTF-8, значения без автоопределения типов
  const workbook =
    extension === '.csv'
      ? XLSX.read(fs.readFileSync(filePath, 'utf-8'), { type: 'string', raw: true })
      : XLSX.readFile(filePath);
  const sheetName = workbook.SheetNames[0];

  if (!sheetName) {
    throw new ConfigError(`Price source ${filePath} has no sheets`);
  }
  return XLSX.utils.sheet_to_json<RawPriceRow>(workbook.Sheets[sheetName], { defval: '' });
}

function cellToId(value: unknown): string {
  if (typeof value === 'number') return String(value);
  if (typeof value === 'string') return value.trim();
  return '';
}

/**
 * Приводит строки прайса к LocalPriceRecord. Битые строки и дубли кодов
 * уходят в rejected, первая строка с кодом побеждает.
 * firstRow: номер первой строки данных в источнике (в таблице с заголовком это 2).
 */
export function normalizeRows(
  rows: RawPriceRow[],
  columns: PriceSourceColumns = DEFAULT_COLUMNS,
  firstRow: number = 1
): PriceSourceResult {
  const records: LocalPriceRecord[] = [];
  const rejected: RejectedRow[] = [];
  const seen = new Set<string>();

  rows.forEach((raw, index) => {
    const row = index + firstRow;
    const productId = cellToId(raw[columns.id]);

    if (!productId) {
      rejected.push({ row, reason: `empty ${columns.id}` });
      return;
    }
    if (seen.has(productId)) {
      rejected.push({ row, productId, reason: 'duplicate product id' });
      return;
    }

    const price = parsePrice(raw[columns.price]);
    if (price === null) {
      rejected.push({ row, productId, reason: `unparseable ${columns.price}: ${String(raw[columns.price])}` });
      return;
    }

    const stock = parseStock(raw[columns.stock]);
    if (stock === null) {
      rejected.push({ row, productId, reason: `unparseable ${columns.stock}: ${String(raw[columns.stock])}` });
      return;
    }

    seen.add(productId);
    records.push({ productId, price, stock });
  });

  return { records, rejected };
}

/**
 * Загружает прайс из .xlsx/.xls/.csv (первый лист) или .json
 */
export function loadPriceRecords(filePath: string, columns: PriceSourceColumns = DEFAULT_COLUMNS): PriceSourceResult {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Price source not found: ${filePath}`);
  }

  const extension = path.extname(filePath).toLowerCase();
  let rows: RawPriceRow[];
  let firstRow = 1;

  if (extension === '.json') {
    rows = readJsonRows(filePath);
  } else if (SPREADSHEET_EXTENSIONS.includes(extension)) {
    rows = readSpreadsheetRows(filePath, extension);
    firstRow = 2;
  } else {
    throw new ConfigError(`Unsupported price source format: ${extension || filePath}`);
  }

  const result = normalizeRows(rows, columns, firstRow);

  logger.info(`📄 Loaded ${result.records.length} price records from ${path.basename(filePath)}`);
  for (const rejected of result.rejected) {
    logger.warn(`Skipping price source row ${rejected.row}: ${rejected.reason}`, { productId: rejected.productId });
  }

  return result;
}

export function loadFromSource(source: PriceSourceConfig): PriceSourceResult {
  return loadPriceRecords(source.path, source.columns);
}

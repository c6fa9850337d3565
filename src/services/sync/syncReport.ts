import { ItemResult } from '../../types/marketplace';
import { ItemError } from '../../utils/errors';
import logger from '../../utils/logger';
import { BatchOutcome } from './batchUpdater';

export interface OperationReport {
  updated: number;
  failed: number;
  batches: number;
  failedBatches: number;
  itemErrors: ItemError[];
}

export interface SyncReport {
  marketplace: string;
  unmapped: string[];
  rejectedRows: number;
  prices: OperationReport;
  stocks: OperationReport;
}

export function createOperationReport(): OperationReport {
  return { updated: 0, failed: 0, batches: 0, failedBatches: 0, itemErrors: [] };
}

export function createReport(marketplace: string): SyncReport {
  return {
    marketplace,
    unmapped: [],
    rejectedRows: 0,
    prices: createOperationReport(),
    stocks: createOperationReport(),
  };
}

export function recordResults(report: OperationReport, results: ItemResult[], label: string): void {
  for (const result of results) {
    if (result.ok) {
      report.updated++;
      continue;
    }
    const itemError = new ItemError(result.id, result.errors);
    report.failed++;
    report.itemErrors.push(itemError);
    logger.warn(`${label}: ${itemError.message}`, { itemId: itemError.itemId, reasons: itemError.reasons });
  }
}

export function recordOutcome(report: OperationReport, outcome: BatchOutcome, label: string): void {
  report.batches += outcome.batches;
  report.failedBatches += outcome.failedBatches;
  recordResults(report, outcome.results, label);
}

export function recordUnmapped(report: SyncReport, productIds: string[]): void {
  report.unmapped.push(...productIds);
}

export function skippedCount(report: SyncReport): number {
  return report.unmapped.length + report.rejectedRows;
}

export function summarize(report: SyncReport): string {
  const { prices, stocks } = report;
  return (
    `${report.marketplace}: prices ${prices.updated} updated / ${prices.failed} failed, ` +
    `stocks ${stocks.updated} updated / ${stocks.failed} failed, ` +
    `${skippedCount(report)} skipped (${report.unmapped.length} unmapped)`
  );
}

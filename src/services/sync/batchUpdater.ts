import { ItemResult } from '../../types/marketplace';
import { chunk } from '../../utils/batching';
import { ApiRequestError, TransientError } from '../../utils/errors';
import logger from '../../utils/logger';
import { RetryPolicy, withRetry } from '../../utils/retry';
import { batchResults } from '../marketplaces/itemResults';

export interface BatchOutcome {
  results: ItemResult[];
  batches: number;
  failedBatches: number;
}

/**
 * Отправляет позиции пачками по batchSize, строго последовательно.
 * Пачка, не прошедшая после повторов, помечается неуспешной целиком,
 * фатальные ошибки (авторизация, исчерпанный лимит запросов) прерывают прогон.
 */
export async function sendInBatches<T extends { offerId: string }>(
  items: T[],
  batchSize: number,
  send: (batch: T[]) => Promise<ItemResult[]>,
  policy: RetryPolicy,
  label: string
): Promise<BatchOutcome> {
  const batches = chunk(items, batchSize);
  const outcome: BatchOutcome = { results: [], batches: batches.length, failedBatches: 0 };

  for (const [index, batch] of batches.entries()) {
    const batchLabel = `${label} batch ${index + 1}/${batches.length}`;

    try {
      const results = await withRetry(() => send(batch), policy, batchLabel);
      outcome.results.push(...results);
      logger.debug(`${batchLabel}: ${results.filter((r) => r.ok).length}/${batch.length} accepted`);
    } catch (error) {
      if (!(error instanceof TransientError || error instanceof ApiRequestError)) {
        throw error;
      }

      outcome.failedBatches++;
      logger.error(`${batchLabel} skipped: ${error.message}`);
      outcome.results.push(...batchResults(batch.map((item) => item.offerId), false, [error.message]));
    }
  }

  return outcome;
}

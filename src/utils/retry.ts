/**
 * Bounded retry
 * Повтор запроса при 429 и временных сбоях с фиксированной задержкой
 */

import { RateLimitError, TransientError, toSyncError } from './errors';
import logger from './logger';

export interface RetryPolicy {
  maxRetries: number;
  delayMs: number;
  rateLimitMaxRetries: number;
  rateLimitDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

interface RetryPlan {
  limit: number;
  delay: number;
}

// Retry-After (секунды) не даёт повторить раньше, чем просит API
function retryPlan(error: unknown, policy: RetryPolicy): RetryPlan | null {
  if (error instanceof RateLimitError) {
    const requested = error.retryAfter !== undefined ? error.retryAfter * 1000 : 0;
    return { limit: policy.rateLimitMaxRetries, delay: Math.max(policy.rateLimitDelayMs, requested) };
  }
  if (error instanceof TransientError) {
    return { limit: policy.maxRetries, delay: policy.delayMs };
  }
  return null;
}

/**
 * Выполняет fn, повторяя 429 не более rateLimitMaxRetries раз, а временные сбои не более maxRetries.
 * Итоговая ошибка пробрасывается.
 */
export async function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy, label: string): Promise<T> {
  const wait = policy.sleep ?? sleep;
  let rateLimited = 0;
  let transient = 0;

  for (;;) {
    try {
      return await fn();
    } catch (raw) {
      const error = toSyncError(raw);
      const plan = retryPlan(error, policy);
      const attempt = error instanceof RateLimitError ? rateLimited : transient;

      if (plan === null || attempt >= plan.limit) {
        throw error;
      }

      if (error instanceof RateLimitError) rateLimited++;
      else transient++;

      logger.warn(`${label}: ${error.message}. Retry ${attempt + 1}/${plan.limit} in ${plan.delay}ms`);
      await wait(plan.delay);
    }
  }
}

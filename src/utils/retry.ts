/**
 * Exponential backoff retry utility
 */

import type { RetryConfig } from '../types/index.js';
import { logger } from './logger.js';

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 2000,
  maxDelayMs: 30000,
  factor: 2,
};

/**
 * Run `fn` until it resolves or `maxAttempts` is reached.
 *
 * The wait after attempt n is `min(initialDelayMs * factor^(n-1), maxDelayMs)`,
 * so the defaults give `min(2^n s, 30 s)`.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {},
  label = 'operation'
): Promise<T> {
  const { maxAttempts, initialDelayMs, maxDelayMs, factor } = {
    ...DEFAULT_RETRY_CONFIG,
    ...config,
  };

  let lastError: Error | undefined;
  let delay = initialDelayMs;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = toError(error);

      if (attempt === maxAttempts) {
        logger.error({ error: lastError, attempt, maxAttempts, label }, 'All retry attempts exhausted');
        throw lastError;
      }

      logger.warn(
        { error: lastError.message, attempt, maxAttempts, nextDelayMs: delay, label },
        'Retry attempt failed, waiting before next attempt'
      );

      await sleep(delay);
      delay = Math.min(delay * factor, maxDelayMs);
    }
  }

  throw lastError ?? new Error(`${label} was not attempted`);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export { sleep };

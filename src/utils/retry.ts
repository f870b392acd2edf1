/**
 * Retry and delay helpers
 */

import { logger } from '../logger.js';
import { errorMessage } from '../errors.js';

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface RetryOptions {
  retries: number;      // total attempts
  delayMs: number;      // fixed pause between attempts
  label?: string;
}

/**
 * Run fn up to `retries` times; rethrows the last error
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.retries);
  const label = options.label ?? 'request';
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      logger.warn('Retry', `Attempt ${attempt}/${attempts} failed for ${label}: ${errorMessage(err)}`);
      if (attempt < attempts && options.delayMs > 0) {
        await sleep(options.delayMs);
      }
    }
  }

  throw lastError;
}

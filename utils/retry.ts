import { logger } from './logger';
import { ExternalServiceError, SyncUnavailableError, TimeoutError } from '../services/base/ServiceError';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Decides whether a failure is worth another attempt. */
  isRetryable?: (error: unknown) => boolean;
  /** Injected in tests to avoid real waiting. */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Transient failures: timeouts, network-level fetch failures and remote
 * errors flagged retryable (5xx, 429).
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof ExternalServiceError) {
    return error.retryable;
  }
  if (error instanceof TimeoutError) {
    return true;
  }
  // fetch() rejects with a TypeError when the connection itself fails
  return error instanceof TypeError && /fetch failed|network/i.test(error.message);
}

/**
 * Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt - 1));
}

/**
 * Runs `fn` until it succeeds, fails with a non-retryable error (rethrown
 * as is), or runs out of attempts (SyncUnavailableError).
 */
export async function withRetry<T>(operation: string, fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const isRetryable = options.isRetryable ?? isTransientError;
  const sleep = options.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      lastError = error;
      if (attempt < options.maxAttempts) {
        const delay = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
        logger.warn(`[Retry] ${operation} failed (attempt ${attempt}/${options.maxAttempts}), retrying in ${delay}ms:`, error instanceof Error ? error.message : error);
        await sleep(delay);
      }
    }
  }

  throw new SyncUnavailableError(operation, options.maxAttempts, lastError);
}

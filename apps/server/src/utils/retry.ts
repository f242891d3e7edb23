/**
 * Bounded retry with capped linear backoff.
 *
 * Used by orchestrating services around upstream calls; the Jellyfin client
 * itself never retries.
 */

import { isAppError } from './errors.js';

export interface RetryOptions {
  /** Total attempts including the first (default 3) */
  attempts?: number;
  /** Delay unit; attempt n waits n * baseDelayMs (default 250) */
  baseDelayMs?: number;
  /** Cap for a single delay (default 2000) */
  maxDelayMs?: number;
  /** Absolute epoch-ms deadline; no attempt starts after it */
  deadline?: number;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  onRetry?: (error: unknown, attempt: number) => void;
}

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** Retry only errors the taxonomy marks as retryable */
export function isRetryable(error: unknown): boolean {
  return isAppError(error) && error.retryable;
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const baseDelayMs = options.baseDelayMs ?? 250;
  const maxDelayMs = options.maxDelayMs ?? 2000;
  const shouldRetry = options.shouldRetry ?? isRetryable;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) throw error;

      const delay = Math.min(attempt * baseDelayMs, maxDelayMs);
      if (options.deadline !== undefined && now() + delay >= options.deadline) throw error;

      options.onRetry?.(error, attempt);
      await sleep(delay);
    }
  }
}

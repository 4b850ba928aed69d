// packages/core/src/utils/retry.ts

import { sleep } from './sleep.js';

export interface RetryOptions {
  attempts: number;
  backoff: number;
  retryOn?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
  /** Stops waiting between attempts; the last error is rethrown. */
  signal?: AbortSignal;
}

const defaultOptions: RetryOptions = {
  attempts: 3,
  backoff: 1000,
};

/**
 * Retry an async function with exponential backoff.
 * Throws the last error once every attempt is used up, or immediately when
 * `retryOn` rejects the error or `signal` aborts during the backoff.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: Partial<RetryOptions>,
): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (opts.retryOn && !opts.retryOn(error)) throw error;
      if (attempt < opts.attempts) {
        opts.onRetry?.(error, attempt);
        const waited = await sleep(opts.backoff * 2 ** (attempt - 1), opts.signal);
        if (!waited) throw error;
      }
    }
  }

  throw lastError;
}

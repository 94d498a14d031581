/**
 * Exponential backoff for transient backend failures.
 * Only BackendOverloadedError is retried; anything else propagates on first occurrence.
 */

import { BackendOverloadedError, BackendUnavailableError } from "../errors";
import type { BackendKind } from "../adapters/llm/types";

export interface RetryOptions {
  /** Retries after the first attempt (default 3, so at most 4 calls). */
  maxRetries: number;
  /** Base delay for exponential backoff (ms). */
  baseDelayMs: number;
  /** Upper bound for a single delay (ms). */
  maxDelayMs: number;
  /** Jitter factor as decimal (0.1 = up to 10% longer). */
  jitter: number;
  /** Called before each wait, with the 1-based number of the attempt that failed. */
  onRetry?: (attempt: number, delayMs: number, err: BackendOverloadedError) => void;
  /** Injectable for tests. */
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  jitter: 0.1,
};

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** delay = min(base * 2^retryIndex, max) * (1 + random * jitter) */
export function backoffDelay(retryIndex: number, options: RetryOptions, random: () => number = Math.random): number {
  const exponential = options.baseDelayMs * Math.pow(2, retryIndex);
  const capped = Math.min(exponential, options.maxDelayMs);
  return capped * (1 + random() * options.jitter);
}

/**
 * Run `fn` until it succeeds, fails with a non-transient error, or the retry budget is spent.
 * Exhaustion throws BackendUnavailableError whose cause is the last transient error.
 */
export async function withRetry<T>(
  backend: BackendKind,
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS
): Promise<RetryResult<T>> {
  const sleep = options.sleep ?? delay;
  const random = options.random ?? Math.random;
  const maxAttempts = options.maxRetries + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await fn(attempt);
      return { value, attempts: attempt };
    } catch (err) {
      if (!(err instanceof BackendOverloadedError)) throw err;
      if (attempt >= maxAttempts) throw new BackendUnavailableError(backend, attempt, err);
      const waitMs = backoffDelay(attempt - 1, options, random);
      options.onRetry?.(attempt, waitMs, err);
      await sleep(waitMs);
    }
  }
}

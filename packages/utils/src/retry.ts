/**
 * Retry Logic
 *
 * Configurable retry wrapper with exponential backoff.
 */

import { sleep } from './time.js';

export interface RetryOptions {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  /** Override the computed backoff for a given failure (e.g. a server-supplied retry-after) */
  delayFor?: (error: unknown, attempt: number, backoff: number) => number;
  wait?: (ms: number) => Promise<void>;
}

export const defaultRetryOptions: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

/**
 * Backoff before the retry that follows failed attempt `attempt` (1-based)
 */
export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'initialDelay' | 'maxDelay' | 'backoffMultiplier'>
): number {
  const raw = options.initialDelay * Math.pow(options.backoffMultiplier, attempt - 1);
  return Math.min(raw, options.maxDelay);
}

/**
 * Execute a function with automatic retry on failure.
 * The function receives the 1-based attempt number.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...defaultRetryOptions, ...options };
  const wait = opts.wait ?? sleep;

  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }

      if (attempt === opts.maxAttempts) {
        throw error;
      }

      const backoff = backoffDelay(attempt, opts);
      const delay = opts.delayFor ? opts.delayFor(error, attempt, backoff) : backoff;

      opts.onRetry?.(error, attempt, delay);

      await wait(delay);
    }
  }

  throw lastError;
}

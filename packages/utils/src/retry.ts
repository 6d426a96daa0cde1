/**
 * Retry Logic
 *
 * Configurable retry wrapper with exponential backoff and jitter.
 */

import { sleep } from './time.js';

export interface BackoffOptions {
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  /** Fraction of the computed delay added as random jitter (0..1). */
  jitterRatio?: number;
  random?: () => number;
}

export interface RetryOptions extends BackoffOptions {
  maxAttempts: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

const defaultOptions: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
  jitterRatio: 0,
};

/**
 * Delay before the retry that follows the given (1-based) failed attempt
 */
export function backoffDelay(attempt: number, options: BackoffOptions): number {
  const { initialDelay, maxDelay, backoffMultiplier, jitterRatio = 0, random = Math.random } = options;
  const exponent = Math.max(0, attempt - 1);
  const base = Math.min(maxDelay, initialDelay * Math.pow(backoffMultiplier, exponent));
  const ratio = Math.min(1, Math.max(0, jitterRatio));
  const jitter = Math.floor(base * ratio * Math.min(1, Math.max(0, random())));
  return Math.min(maxDelay, base + jitter);
}

/**
 * Execute a function with automatic retry on failure
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...defaultOptions, ...options };

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

      const delayMs = backoffDelay(attempt, opts);
      opts.onRetry?.(error, attempt, delayMs);

      await sleep(delayMs, opts.signal);
    }
  }

  throw lastError;
}

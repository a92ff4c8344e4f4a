/**
 * Retry utility with exponential backoff and jitter
 *
 * Only failures classified as `transient` are retried. Backoff sleeps end early
 * when the caller's AbortSignal fires.
 */

import { classifyError } from '../errors/index.js';
import { createLogger } from './logger.js';

const logger = createLogger('Retry');

export interface RetryOptions {
  /**
   * Maximum number of retry attempts AFTER the initial attempt.
   * Total attempts = 1 (initial) + maxRetries.
   *
   * @default 2
   */
  maxRetries: number;

  /**
   * Initial delay in milliseconds
   * @default 500
   */
  baseDelayMs: number;

  /**
   * Maximum delay in milliseconds
   * @default 10000
   */
  maxDelayMs: number;

  /**
   * Exponential backoff factor
   * @default 2
   */
  backoffFactor: number;

  /** Cancels pending backoff sleeps and prevents further attempts */
  signal?: AbortSignal;

  /** Called before each backoff sleep */
  onRetry?: (info: RetryAttemptInfo) => void;

  /** Source of randomness for jitter, in [0, 1) */
  random?: () => number;
}

export interface RetryAttemptInfo {
  /** 1-based number of the retry about to happen */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export const DEFAULT_RETRY_OPTIONS: Readonly<RetryOptions> = {
  maxRetries: 2,
  baseDelayMs: 500,
  maxDelayMs: 10000,
  backoffFactor: 2,
};

/**
 * Calculate delay with exponential backoff and jitter
 *
 * The delay for retry N (0-based) lies in [cap / 2, cap] where
 * cap = min(baseDelayMs * backoffFactor^N, maxDelayMs).
 */
export function calculateBackoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'backoffFactor'>,
  random: () => number = Math.random
): number {
  const exponentialDelay = options.baseDelayMs * Math.pow(options.backoffFactor, attempt);
  const cappedDelay = Math.min(exponentialDelay, options.maxDelayMs);

  // Half-jitter: always wait at least half the calculated delay
  const minDelay = cappedDelay * 0.5;
  return minDelay + random() * (cappedDelay - minDelay);
}

/**
 * Sleep for the specified duration, rejecting with the signal's reason on abort
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute a function, retrying transient failures
 *
 * @param fn - Receives the 0-based attempt number
 * @returns The first successful result
 * @throws The last error when it is not transient, retries are exhausted, or the signal aborted
 *
 * @example
 * ```typescript
 * // Up to 4 attempts (1 initial + 3 retries)
 * const result = await withRetry(() => unit.execute(input, signal), { maxRetries: 3, signal });
 * ```
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: Partial<RetryOptions>
): Promise<T> {
  const opts: RetryOptions = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
  };

  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      const shouldRetry = classifyError(error) === 'transient';
      const hasRetriesLeft = attempt < opts.maxRetries;

      if (!shouldRetry || !hasRetriesLeft || opts.signal?.aborted) {
        throw error;
      }

      const delayMs = calculateBackoffDelay(attempt, opts, opts.random);

      logger.debug(
        {
          attempt: attempt + 1,
          maxRetries: opts.maxRetries,
          delayMs: Math.round(delayMs),
          error: error instanceof Error ? error.message : String(error),
        },
        'Retry attempt'
      );

      opts.onRetry?.({ attempt: attempt + 1, delayMs, error });

      await sleep(delayMs, opts.signal);
    }
  }

  // Unreachable: the loop either returns or throws
  throw lastError;
}

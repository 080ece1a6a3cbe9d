import { classifyError } from '../errors.js';
import type { Logger } from '../logger.js';

export interface RetryOptions {
  maxAttempts: number;
  /** Delay after the first failed attempt; doubles after each further failure. */
  baseDelayMs: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_FETCH_RETRY: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 4000,
};

export function calculateDelay(attempt: number, options: RetryOptions): number {
  const delay = options.baseDelayMs * 2 ** attempt;
  return options.maxDelayMs === undefined ? delay : Math.min(delay, options.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `operation` until it yields a value.
 *
 * A null result or a retryable error triggers another attempt after an exponential delay.
 * A non-retryable error (see classifyError) is rethrown at once. When attempts run out the
 * last error is rethrown, or null is returned if the last attempt came back empty.
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T | null>,
  options: RetryOptions,
  logger: Logger,
  operationName = 'operation',
): Promise<T | null> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown = null;

  for (let attempt = 0; attempt < options.maxAttempts; attempt++) {
    try {
      const result = await operation(attempt);
      if (result !== null) return result;
      lastError = null;
      logger.debug({ operation: operationName, attempt: attempt + 1 }, 'empty result');
    } catch (err) {
      const classified = classifyError(err);
      if (!classified.retryable) throw err;
      lastError = err;
      logger.warn(
        { operation: operationName, attempt: attempt + 1, code: classified.code, err: classified.message },
        'attempt failed',
      );
    }

    if (attempt < options.maxAttempts - 1) {
      await wait(calculateDelay(attempt, options));
    }
  }

  if (lastError !== null) throw lastError;
  return null;
}

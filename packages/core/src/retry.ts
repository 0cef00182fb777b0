import { OperatorError } from './errors.js';
import type { RetryStrategy } from './types.js';

/**
 * Compute delay for a given attempt using the retry strategy.
 */
export function computeDelay(strategy: RetryStrategy, attempt: number): number {
  let delay: number;

  switch (strategy.backoff) {
    case 'constant':
      delay = strategy.baseDelayMs;
      break;
    case 'linear':
      delay = strategy.baseDelayMs * (attempt + 1);
      break;
    case 'exponential':
      delay = strategy.baseDelayMs * Math.pow(2, attempt);
      break;
  }

  return Math.min(delay, strategy.maxDelayMs);
}

/**
 * Execute a function with retry logic.
 *
 * Only an OperatorError with retryable=true is retried; anything else is
 * rethrown on the spot. `onRetry` is told about every failed attempt that
 * will be retried.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  strategy: RetryStrategy,
  onRetry?: (error: OperatorError, attempt: number, delayMs: number) => void,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (!(error instanceof OperatorError) || !error.retryable || attempt >= strategy.maxRetries) {
        throw error;
      }
      const delay = computeDelay(strategy, attempt);
      onRetry?.(error, attempt, delay);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}

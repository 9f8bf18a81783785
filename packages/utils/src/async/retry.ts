import { sleep as defaultSleep } from './sleep';

export interface RetryAttemptInfo {
  /** 1-based number of the attempt that just failed */
  attempt: number;
  /** Wait before the next attempt */
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  /** Total attempts, the first one included */
  maxAttempts: number;
  /** Wait after the first failure; doubles after every further failure */
  baseDelayMs: number;
  /** Errors for which this returns false are rethrown at once */
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Delay before retry number `attempt` (1-based): base, 2x base, 4x base, ...
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

/**
 * Run `operation` until it succeeds, a non-retryable error is thrown,
 * or `maxAttempts` attempts have failed (the last error is rethrown).
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!options.shouldRetry(error) || attempt >= options.maxAttempts) {
        throw error;
      }

      const delayMs = backoffDelay(options.baseDelayMs, attempt);
      options.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
    }
  }
}

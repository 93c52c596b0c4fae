/**
 * @closeout/hub-client — Retry with exponential backoff.
 *
 * Used for idempotent lookups only. Mutations are never retried here; the
 * settlement lifecycle decides what to do when one fails.
 *
 * Backoff formula: min(baseDelayMs * 2^attempt, maxDelayMs)
 */

export interface RetryConfig {
  /** Maximum number of attempts (including the first try) */
  readonly maxAttempts: number;
  /** Delay in ms before the first retry */
  readonly baseDelayMs: number;
  /** Maximum delay in ms between retries */
  readonly maxDelayMs: number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function computeDelay(attempt: number, config: RetryConfig): number {
  return Math.min(config.baseDelayMs * Math.pow(2, attempt), config.maxDelayMs);
}

/**
 * Execute a function with retry on failure.
 *
 * Errors rejected by `shouldRetry`, and the error of the last attempt, are
 * rethrown unchanged.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig,
  shouldRetry: (error: unknown) => boolean = () => true,
  sleepFn: (ms: number) => Promise<void> = sleep,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt + 1 >= config.maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      await sleepFn(computeDelay(attempt, config));
    }
  }
}

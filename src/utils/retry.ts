export interface RetryOptions {
  /** Additional attempts after the first one. */
  retries: number;
  baseDelayMs: number;
  factor?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  factor = 2,
  maxDelayMs = Number.POSITIVE_INFINITY,
): number {
  return Math.min(baseDelayMs * factor ** (attempt - 1), maxDelayMs);
}

/**
 * Runs `fn` until it resolves or the retry budget is spent. `attempt` passed
 * to the callbacks is 1 for the first retry.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { retries, baseDelayMs, factor, maxDelayMs, shouldRetry, onRetry } =
    options;

  let attempt = 0;
  for (;;) {
    try {
      return await fn(attempt);
    } catch (error) {
      attempt++;
      if (attempt > retries || (shouldRetry && !shouldRetry(error, attempt))) {
        throw error;
      }
      const delay = backoffDelay(attempt, baseDelayMs, factor, maxDelayMs);
      onRetry?.(error, attempt, delay);
      if (delay > 0) await sleep(delay);
    }
  }
}

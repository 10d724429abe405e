export interface RetryOptions {
  attempts: number;
  initialDelayMs: number;
  /** Multiplier applied to the pause after every failed attempt. Defaults to 2. */
  backoffFactor?: number;
  onRetry?: (failedAttempt: number, error: unknown, waitMs: number) => void;
}

const pause = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Calls `operation` until it resolves or `attempts` calls have failed, pausing
 * `initialDelayMs * backoffFactor^(n-1)` after the n-th failure. The last
 * failure is rethrown as is.
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  { attempts, initialDelayMs, backoffFactor = 2, onRetry }: RetryOptions
): Promise<T> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts) {
        throw error;
      }
      const waitMs = initialDelayMs * backoffFactor ** (attempt - 1);
      onRetry?.(attempt, error, waitMs);
      await pause(waitMs);
    }
  }
}

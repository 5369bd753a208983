export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions extends BackoffPolicy {
  maxAttempts: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before the retry that follows `attempt` (1-based):
 * base * 2^(attempt - 1), capped at maxDelayMs.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.baseDelayMs * 2 ** exponent, policy.maxDelayMs);
}

export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await operation(attempt);
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!retryable || attempt >= options.maxAttempts) {
        throw error;
      }
      const delayMs = computeBackoffDelay(attempt, options);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
    }
  }
}

import { isRetryableError } from './errors.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const nextBackoffMs = (attempt: number, policy: RetryPolicy) =>
  Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);

/**
 * Runs `fn` until it succeeds, a non-retryable error is thrown, or the attempt
 * budget is spent. A provider Retry-After hint wins over the computed backoff,
 * capped at maxDelayMs.
 */
export const withRetry = async <T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: {
    wait?: (ms: number) => Promise<void>;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  } = {},
): Promise<T> => {
  const wait = options.wait ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts - 1 || !isRetryableError(error)) {
        throw error;
      }
      const hint = error.retryAfterMs;
      const delayMs = hint !== null && hint > 0
        ? Math.min(hint, policy.maxDelayMs)
        : nextBackoffMs(attempt, policy);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
    }
  }
};

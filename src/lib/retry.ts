/**
 * RepoPulse — Retry Policy
 *
 * Single retry-with-backoff abstraction shared by the GitHub client and the
 * connection manager. Delays grow as baseDelayMs * 2^(attempt - 1), no jitter.
 */

import pRetry, { AbortError, type FailedAttemptError } from 'p-retry';

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the second attempt; doubles afterwards */
  baseDelayMs: number;
  /** Errors for which another attempt is worthwhile */
  isRetryable: (error: unknown) => boolean;
  /** Called after every failed attempt that will be retried or is the last one */
  onFailedAttempt?: (error: Error, attemptNumber: number, retriesLeft: number) => void;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run an operation under a retry policy.
 * Non-retryable errors are rethrown unchanged after the first attempt;
 * retryable ones are rethrown after the last attempt.
 */
export async function withRetry<T>(
  operation: (attemptNumber: number) => Promise<T>,
  policy: RetryPolicy
): Promise<T> {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
  }

  return pRetry(
    async (attemptNumber) => {
      try {
        return await operation(attemptNumber);
      } catch (error) {
        if (!policy.isRetryable(error)) {
          throw new AbortError(toError(error));
        }
        throw toError(error);
      }
    },
    {
      retries: policy.maxAttempts - 1,
      factor: 2,
      minTimeout: policy.baseDelayMs,
      maxTimeout: Number.POSITIVE_INFINITY,
      randomize: false,
      onFailedAttempt: (error: FailedAttemptError) => {
        policy.onFailedAttempt?.(error, error.attemptNumber, error.retriesLeft);
      },
    }
  );
}

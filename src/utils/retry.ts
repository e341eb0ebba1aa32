/**
 * Bounded retry with backoff for connector calls.
 *
 * Attempt counters live in the call, never in module state, so two
 * operations against the same service never share a budget.
 */

import {
  RateLimitError,
  isRetryable,
  normalizeError,
  type ConnectorError,
} from "../errors.js";

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Wait before retrying a rate-limited call without Retry-After */
  rateLimitDelayMs: number;
}

export interface RetryAttempt {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: ConnectorError;
}

export interface RetryOptions extends RetryPolicy {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: RetryAttempt) => void;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 2000,
  maxDelayMs: 60_000,
  backoffMultiplier: 2,
  rateLimitDelayMs: 2000,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the retry that follows the given 0-based attempt
 */
export function computeDelay(
  error: ConnectorError,
  attempt: number,
  policy: RetryPolicy
): number {
  const raw =
    error instanceof RateLimitError
      ? (error.retryAfterMs ?? policy.rateLimitDelayMs)
      : policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt);

  return Math.min(raw, policy.maxDelayMs);
}

/**
 * Run `operation`, retrying rate-limit and transient network failures.
 * Every other error, and the last retryable one, is rethrown normalized.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (thrown) {
      const error = normalizeError(thrown);

      if (!isRetryable(error) || attempt + 1 >= maxAttempts) {
        throw error;
      }

      const delayMs = computeDelay(error, attempt, options);
      options.onRetry?.({
        attempt: attempt + 1,
        maxAttempts,
        delayMs,
        error,
      });
      await wait(delayMs);
    }
  }
}

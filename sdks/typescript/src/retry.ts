/**
 * Time-budgeted retry with exponential backoff.
 *
 * This module handles:
 * - Retrying transient transport failures with exponential backoff
 * - Bounding the total time spent retrying by a configured budget
 * - Respecting idempotency semantics (non-idempotent calls are never retried)
 */

import { RetryExhaustedError } from '@shardscroll/client/errors';
import type { RetryConfig } from '@shardscroll/client/types';

/**
 * Context for a retry operation.
 */
export interface RetryContext {
  /** Current attempt number (1-indexed) */
  attempt: number;

  /** Last error encountered */
  lastError?: Error;

  /** Whether this operation is idempotent */
  isIdempotent: boolean;
}

/**
 * Everything withRetry needs besides the operation itself.
 */
export interface RetryPolicy {
  /** Backoff tuning */
  backoff: Required<RetryConfig>;

  /** Total time budget in milliseconds; 0 disables retries */
  budgetMs: number;

  /** Whether an error is a transient failure worth retrying */
  isTransient: (error: Error) => boolean;

  /** Called before sleeping ahead of the next attempt */
  onRetry?: (info: { attempt: number; delayMs: number; error: Error }) => void;

  /** Clock and sleep, replaceable in tests */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Default backoff configuration.
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  initialDelayMs: 50,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
  jitterMs: 25,
};

/**
 * Compute the delay before the next retry attempt.
 */
export function computeRetryDelay(
  attempt: number,
  config: Required<RetryConfig>
): number {
  // Exponential backoff: delay = initialDelay * (multiplier ^ (attempt - 1))
  const exponentialDelay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);

  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  // Jitter in [-jitterMs, +jitterMs]
  const jitter = (Math.random() - 0.5) * 2 * config.jitterMs;

  return Math.max(0, cappedDelay + jitter);
}

/**
 * Sleep for a given duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run an operation, retrying transient failures until the time budget is
 * spent.
 *
 * Non-transient errors, and any error from a non-idempotent operation, are
 * rethrown as-is.
 *
 * @throws RetryExhaustedError when the budget runs out; lastError holds the
 *   final transient failure
 */
export async function withRetry<T>(
  operation: (ctx: RetryContext) => Promise<T>,
  policy: RetryPolicy,
  context: Omit<RetryContext, 'attempt' | 'lastError'>
): Promise<T> {
  const now = policy.now ?? Date.now;
  const wait = policy.sleep ?? sleep;
  const deadline = now() + policy.budgetMs;

  let lastError: Error | undefined;

  for (let attempt = 1; ; attempt++) {
    const ctx: RetryContext = {
      ...context,
      attempt,
      lastError,
    };

    try {
      return await operation(ctx);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!context.isIdempotent || !policy.isTransient(lastError)) {
        throw lastError;
      }

      const remaining = deadline - now();
      if (remaining <= 0) {
        throw new RetryExhaustedError(
          `Operation failed after ${attempt} attempts`,
          attempt,
          lastError
        );
      }

      const delayMs = Math.min(computeRetryDelay(attempt, policy.backoff), remaining);
      policy.onRetry?.({ attempt, delayMs, error: lastError });
      await wait(delayMs);
    }
  }
}

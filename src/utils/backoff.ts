/**
 * Exponential backoff bounded by attempt count and wall-clock time.
 */

import { ConnectionExhaustedError } from "../types/errors.js";

export interface BackoffPolicy {
  maxAttempts: number;
  maxElapsedMs: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** Delay multiplier between attempts (default 2) */
  factor?: number;
}

export interface BackoffHooks {
  /** Only errors for which this returns true are retried */
  isRetryable: (err: unknown) => boolean;
  onRetry?: (attempt: number, delayMs: number, err: unknown) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Delay before the retry that follows attempt `attempt` (1-based) */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  const factor = policy.factor ?? 2;
  const delay = policy.initialDelayMs * Math.pow(factor, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, or the
 * budget runs out. Non-retryable errors propagate unchanged; exhausting
 * the budget throws ConnectionExhaustedError carrying the last error.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  policy: BackoffPolicy,
  hooks: BackoffHooks
): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;
  const now = hooks.now ?? Date.now;
  const startedAt = now();

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!hooks.isRetryable(err)) throw err;

      const elapsed = now() - startedAt;
      if (attempt >= policy.maxAttempts || elapsed >= policy.maxElapsedMs) {
        throw new ConnectionExhaustedError(attempt, elapsed, err);
      }

      // never sleep past the wall-clock budget
      const delay = Math.min(backoffDelay(policy, attempt), policy.maxElapsedMs - elapsed);
      hooks.onRetry?.(attempt, delay, err);
      await sleep(delay);
    }
  }
}

/**
 * Retry / back-off policy for calls to the payment provider.
 */

import type { StructuredLogger } from './logger.js';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffFactor: 2,
};

export interface RetryResult<T> {
  success: boolean;
  value?: T;
  attempts: number;
  errors: string[];
  /** Last thrown value, kept so callers can rethrow with its original code. */
  lastError?: unknown;
}

export interface RetryOptions {
  policy?: RetryPolicy;
  /** Errors for which this returns false end the loop immediately. */
  isRetryable?: (err: unknown) => boolean;
  logger?: StructuredLogger;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute `fn` with exponential back-off.
 */
export async function withRetry<T>(
  fn: () => T | Promise<T>,
  options: RetryOptions = {},
): Promise<RetryResult<T>> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const sleep = options.sleep ?? defaultSleep;
  const errors: string[] = [];
  let delay = policy.initialDelayMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      const value = await fn();
      return { success: true, value, attempts: attempt, errors };
    } catch (err) {
      lastError = err;
      const msg = err instanceof Error ? err.message : String(err);
      errors.push(`attempt ${attempt}: ${msg}`);

      if (options.isRetryable && !options.isRetryable(err)) {
        return { success: false, attempts: attempt, errors, lastError };
      }

      if (attempt < policy.maxAttempts) {
        const wait = Math.min(delay, policy.maxDelayMs);
        options.logger?.warn('retry.backoff', `Attempt ${attempt} failed, retrying in ${wait}ms`, { error: msg });
        await sleep(wait);
        delay *= policy.backoffFactor;
      }
    }
  }

  return { success: false, attempts: policy.maxAttempts, errors, lastError };
}

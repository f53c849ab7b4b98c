import { addSpanEvent } from '../telemetry/tracing.js';
import { NdjsonLogger, errorMessage } from './logger.js';

const logger = new NdjsonLogger('retry');

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  /** Decides whether a failed attempt may be retried. */
  shouldRetry: (error: unknown, attempt: number) => boolean;
}

export const retryEverything = (): boolean => true;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 2000,
  shouldRetry: retryEverything,
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  sleep?: Sleep;
  label?: string;
}

/**
 * Runs `operation` until it succeeds or the policy gives up.
 * The n-th retry waits `baseDelayMs * n`; the last error is rethrown.
 */
export async function callWithRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (err) {
      lastError = err;
      logger.warn('call_failed', {
        message: `${options.label ?? 'API call'} failed (attempt ${attempt}/${maxAttempts}): ${errorMessage(err)}`,
        attempt,
        maxAttempts,
      });

      if (attempt >= maxAttempts || !policy.shouldRetry(err, attempt)) {
        break;
      }
      const delayMs = policy.baseDelayMs * attempt;
      addSpanEvent('retry', { attempt, delayMs });
      await wait(delayMs);
    }
  }

  throw lastError;
}

/**
 * Reactive retry: exponential backoff on rate-limit failures only
 */

import type { RetryOptions, Sleep } from '../types';
import { isRateLimitError, RetryExhaustedError } from './errors';

export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_BASE_DELAY_MS = 5000;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryHooks {
  sleep?: Sleep;
  random?: () => number;
  /** Decides which failures are worth another attempt */
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export class RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly jitterRatio: number;

  constructor(options: Partial<RetryOptions> = {}) {
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
    this.jitterRatio = options.jitterRatio ?? 0;
  }

  /**
   * Wait before retry number `attempt + 1`: baseDelay * 2^attempt, plus jitter
   */
  delayFor(attempt: number, random: () => number = Math.random): number {
    const delay = this.baseDelayMs * 2 ** attempt;
    if (this.jitterRatio <= 0) return delay;
    return delay + Math.round(random() * delay * this.jitterRatio);
  }

  /**
   * Run `fn`, retrying on retryable failures. Resolves with the value and the
   * number of attempts; rejects with the first non-retryable error, or with a
   * RetryExhaustedError once the retries are used up.
   */
  async run<T>(
    fn: (attempt: number) => Promise<T>,
    hooks: RetryHooks = {}
  ): Promise<{ value: T; attempts: number }> {
    const wait = hooks.sleep ?? sleep;
    const isRetryable = hooks.isRetryable ?? isRateLimitError;

    for (let attempt = 0; ; attempt++) {
      try {
        const value = await fn(attempt);
        return { value, attempts: attempt + 1 };
      } catch (error) {
        if (!isRetryable(error)) throw error;
        if (attempt >= this.maxRetries) {
          throw new RetryExhaustedError(attempt + 1, error);
        }

        const delayMs = this.delayFor(attempt, hooks.random);
        hooks.onRetry?.({ attempt, delayMs, error });
        await wait(delayMs);
      }
    }
  }
}

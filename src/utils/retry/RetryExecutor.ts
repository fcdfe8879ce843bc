/**
 * Fixed-delay retry loop
 */

import { RetryOptions, RetryResult } from './types';
import { abortableDelay } from '../async';

export class RetryManager {
  private readonly options: RetryOptions;

  constructor(options: RetryOptions) {
    this.options = options;
  }

  /**
   * Run `fn` until it resolves, an error is not retryable, the attempts run
   * out or the signal aborts. Never throws.
   */
  async executeWithDetails<T>(fn: () => Promise<T>): Promise<RetryResult<T>> {
    const { maxAttempts, delay, shouldRetry, onRetry, signal } = this.options;
    const sleep = this.options.sleep ?? abortableDelay;
    let lastError = new Error('Operation was not attempted');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const result = await fn();
        return { result, attempts: attempt, success: true, aborted: false };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        const retryable = shouldRetry?.(lastError, attempt) ?? true;
        if (!retryable || attempt >= maxAttempts) {
          return { error: lastError, attempts: attempt, success: false, aborted: false };
        }

        onRetry?.(lastError, attempt, delay);
        await sleep(delay, signal);
        if (signal?.aborted) {
          return { error: lastError, attempts: attempt, success: false, aborted: true };
        }
      }
    }

    return { error: lastError, attempts: maxAttempts, success: false, aborted: false };
  }
}

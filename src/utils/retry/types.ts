/**
 * Retry type definitions
 */

/**
 * Retry configuration options
 */
export interface RetryOptions {
  /** Maximum number of attempts, the first one included */
  maxAttempts: number;
  /** Fixed wait between attempts in milliseconds */
  delay: number;
  /** Decides whether an error allows another attempt; a false stops the loop */
  shouldRetry?: (error: Error, attempt: number) => boolean;
  /** Called before waiting for the next attempt */
  onRetry?: (error: Error, attempt: number, delay: number) => void;
  /** Stops the loop before the next attempt once aborted */
  signal?: AbortSignal;
  /** Wait between attempts; resolves early when the signal aborts */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RetryResult<T> {
  result?: T;
  /** Error of the last attempt when none succeeded */
  error?: Error;
  /** Number of attempts made */
  attempts: number;
  success: boolean;
  /** The signal stopped the loop before the attempts ran out */
  aborted: boolean;
}

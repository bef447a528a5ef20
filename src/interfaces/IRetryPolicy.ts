/**
 * Retry policy interface
 */

import { CopyOutcome } from "./ICopyOutcome";

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Delay before the first retry, doubled for each further retry */
  baseDelayMs: number;
  /** Exhausted locked errors become `skipped(locked)` instead of `failed` */
  skipLocked: boolean;
  /** Log retries of locked files at debug level only */
  silentLocked?: boolean;
}

/**
 * Explicit state of one execute() call
 */
export interface RetryState {
  /** Zero-based number of the current attempt, equal to the retries so far */
  attempt: number;
  /** Delay to wait before the next attempt */
  nextDelayMs: number;
}

/**
 * What a successful attempt wrote
 */
export interface CopyTarget {
  destination: string;
  bucket: string;
  bytes?: number;
}

/**
 * Operation wrapped by the policy; receives the zero-based attempt number
 */
export type RetryableOperation = (attempt: number) => Promise<CopyTarget>;

export interface IRetryPolicy {
  /**
   * Run an operation with bounded retries and exponential backoff
   *
   * Locked and transient errors are retried, fatal errors end the call
   * immediately. The promise never rejects: every path ends in an outcome.
   *
   * @param source - Source path the outcome is reported for
   * @param operation - Copy attempt
   * @param signal - Cancels pending backoff waits
   */
  execute(
    source: string,
    operation: RetryableOperation,
    signal?: AbortSignal
  ): Promise<CopyOutcome>;
}

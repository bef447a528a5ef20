/**
 * Retry policy implementation
 *
 * Exponential backoff: the wait before retry n (1-based) is
 * baseDelayMs * 2^(n - 1). Waiting only suspends the calling task.
 */

import { CopyOutcome, ErrorKind } from "../interfaces/ICopyOutcome";
import { ILogger } from "../interfaces/ILogger";
import {
  IRetryPolicy,
  RetryableOperation,
  RetryOptions,
  RetryState,
} from "../interfaces/IRetryPolicy";
import { ErrorClassifier } from "./ErrorClassifier";

/**
 * Longest delay a Node.js timer accepts; larger values fire after 1ms
 */
export const MAX_DELAY_MS = 2 ** 31 - 1;

/**
 * Waits `ms` milliseconds. Resolves false if `signal` aborted first.
 */
export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export interface RetryPolicyDependencies {
  logger?: ILogger;
  sleep?: SleepFunction;
  /** Platform whose errno conventions classify errors */
  platform?: NodeJS.Platform;
}

export const sleep: SleepFunction = (ms, signal) =>
  new Promise<boolean>((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, Math.min(Math.max(0, ms), MAX_DELAY_MS));
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export class RetryPolicy implements IRetryPolicy {
  private logger?: ILogger;
  private sleep: SleepFunction;
  private platform: NodeJS.Platform;

  constructor(
    private readonly options: RetryOptions,
    dependencies: RetryPolicyDependencies = {}
  ) {
    this.logger = dependencies.logger;
    this.sleep = dependencies.sleep ?? sleep;
    this.platform = dependencies.platform ?? process.platform;
  }

  /**
   * Delay before the retry that follows attempt `attempt` (zero-based),
   * capped at MAX_DELAY_MS
   */
  delayFor(attempt: number): number {
    const delay = Math.max(0, this.options.baseDelayMs) * Math.pow(2, attempt);
    return Math.min(delay, MAX_DELAY_MS);
  }

  async execute(
    source: string,
    operation: RetryableOperation,
    signal?: AbortSignal
  ): Promise<CopyOutcome> {
    const state: RetryState = { attempt: 0, nextDelayMs: this.delayFor(0) };

    for (;;) {
      try {
        const target = await operation(state.attempt);
        return {
          status: "copied",
          source,
          destination: target.destination,
          bucket: target.bucket,
          bytes: target.bytes,
          retries: state.attempt,
        };
      } catch (error) {
        const kind = ErrorClassifier.classify(error, this.platform);
        const description = ErrorClassifier.describe(error);

        if (
          !ErrorClassifier.isRetryable(kind) ||
          state.attempt >= this.options.maxRetries
        ) {
          return this.giveUp(source, kind, description, state.attempt);
        }

        this.logRetry(source, kind, description, state);

        const waited = await this.sleep(state.nextDelayMs, signal);
        if (!waited) {
          return {
            status: "skipped",
            source,
            reason: "cancelled",
            retries: state.attempt,
            error: description,
          };
        }

        state.attempt++;
        state.nextDelayMs = this.delayFor(state.attempt);
      }
    }
  }

  private giveUp(
    source: string,
    kind: ErrorKind,
    description: string,
    retries: number
  ): CopyOutcome {
    if (kind === ErrorKind.LOCKED && this.options.skipLocked) {
      return {
        status: "skipped",
        source,
        reason: "locked",
        retries,
        error: description,
      };
    }
    return {
      status: "failed",
      source,
      kind,
      retries,
      error: description,
    };
  }

  private logRetry(
    source: string,
    kind: ErrorKind,
    description: string,
    state: RetryState
  ): void {
    const message =
      `Copy of ${source} failed (${description}). ` +
      `Retry #${state.attempt + 1} of ${this.options.maxRetries} in ${state.nextDelayMs}ms`;

    if (kind === ErrorKind.LOCKED && this.options.silentLocked) {
      this.logger?.debug(message);
    } else {
      this.logger?.warn(message);
    }
  }
}

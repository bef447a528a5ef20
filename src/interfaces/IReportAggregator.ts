/**
 * Report aggregator interface
 */

import { CopyOutcome, ErrorKind } from "./ICopyOutcome";

export interface FailureRecord {
  path: string;
  kind: ErrorKind;
  retries: number;
  error: string;
}

export interface SkipCounts {
  locked: number;
  excluded: number;
  cancelled: number;
  total: number;
}

/**
 * Final, frozen result of a run
 */
export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  total: number;
  copied: number;
  bytesCopied: number;
  skipped: SkipCounts;
  failed: number;
  failures: readonly FailureRecord[];
  /** Whether the run was cancelled before traversal finished */
  cancelled: boolean;
}

export interface IReportAggregator {
  /** Record one outcome; order is not significant */
  add(outcome: CopyOutcome): void;

  /** Freeze the accumulated counts into a summary */
  summarize(options?: { cancelled?: boolean }): RunSummary;
}

/**
 * Scheduler and copy task interfaces
 */

import { CopyOutcome, FileEntry } from "./ICopyOutcome";
import { RunSummary } from "./IReportAggregator";

export type SchedulerState = "idle" | "traversing" | "draining" | "done";

export interface ICopyTask {
  /**
   * Copy one file into its bucket
   *
   * Never rejects; failures are returned as outcomes.
   */
  run(entry: FileEntry, signal?: AbortSignal): Promise<CopyOutcome>;
}

export interface IScheduler {
  /** Current state of the run */
  readonly state: SchedulerState;

  /**
   * Walk the source tree and copy every file it yields
   *
   * Can be called once per scheduler. Resolves when every dispatched task
   * has finished, with the summary of all outcomes.
   *
   * @param signal - Cancels the run: traversal stops, queued entries are
   *   reported as `skipped(cancelled)`, in-flight copies finish
   *
   * @example
   * ```typescript
   * const controller = new AbortController();
   * process.once("SIGINT", () => controller.abort());
   * const summary = await scheduler.run(controller.signal);
   * ```
   */
  run(signal?: AbortSignal): Promise<RunSummary>;
}

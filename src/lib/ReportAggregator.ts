/**
 * Report aggregator implementation
 */

import { v4 as uuidv4 } from "uuid";
import { CopyOutcome } from "../interfaces/ICopyOutcome";
import {
  FailureRecord,
  IReportAggregator,
  RunSummary,
  SkipCounts,
} from "../interfaces/IReportAggregator";
import { ErrorClassifier } from "./ErrorClassifier";

export class ReportAggregator implements IReportAggregator {
  private runId: string;
  private startedAt: Date;
  private total = 0;
  private copied = 0;
  private bytesCopied = 0;
  private skipped: SkipCounts = { locked: 0, excluded: 0, cancelled: 0, total: 0 };
  private failures: FailureRecord[] = [];

  constructor(runId: string = uuidv4(), now: Date = new Date()) {
    this.runId = runId;
    this.startedAt = now;
  }

  add(outcome: CopyOutcome): void {
    this.total++;

    switch (outcome.status) {
      case "copied":
        this.copied++;
        this.bytesCopied += outcome.bytes ?? 0;
        break;
      case "skipped":
        this.skipped[outcome.reason]++;
        this.skipped.total++;
        break;
      case "failed":
        this.failures.push({
          path: outcome.source,
          kind: outcome.kind,
          retries: outcome.retries,
          error: outcome.error,
        });
        break;
    }
  }

  summarize(options: { cancelled?: boolean; now?: Date } = {}): RunSummary {
    const finishedAt = options.now ?? new Date();
    const failures = this.failures.map((failure) => Object.freeze({ ...failure }));

    return Object.freeze({
      runId: this.runId,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: Math.max(0, finishedAt.getTime() - this.startedAt.getTime()),
      total: this.total,
      copied: this.copied,
      bytesCopied: this.bytesCopied,
      skipped: Object.freeze({ ...this.skipped }),
      failed: this.failures.length,
      failures: Object.freeze(failures),
      cancelled: options.cancelled ?? false,
    });
  }

  /**
   * Human-readable summary lines
   */
  static format(summary: RunSummary): string[] {
    const lines = [
      "=".repeat(60),
      summary.cancelled ? "Run cancelled" : "Run complete",
      "=".repeat(60),
      `Total:     ${summary.total}`,
      `Copied:    ${summary.copied} (${summary.bytesCopied} bytes)`,
      `Skipped:   ${summary.skipped.total} (locked ${summary.skipped.locked}, excluded ${summary.skipped.excluded}, cancelled ${summary.skipped.cancelled})`,
      `Failed:    ${summary.failed}`,
      `Duration:  ${(summary.durationMs / 1000).toFixed(2)}s`,
    ];

    if (summary.failures.length > 0) {
      lines.push("-".repeat(60), "Failures:");
      for (const failure of summary.failures) {
        lines.push(
          `  ${failure.path} [${failure.kind}, ${failure.retries} retries]: ${failure.error}`,
          `    -> ${ErrorClassifier.getRemediation(failure.kind)}`
        );
      }
    }
    lines.push("=".repeat(60));
    return lines;
  }
}

/**
 * Copy outcome types
 *
 * Every entry discovered during a run produces exactly one CopyOutcome,
 * which is handed to the ReportAggregator.
 */

/**
 * Failure classes used for retry decisions and in the final report
 */
export enum ErrorKind {
  /** File held open by another process */
  LOCKED = "LOCKED",
  /** Temporary resource exhaustion or interrupted call */
  TRANSIENT_IO = "TRANSIENT_IO",
  /** Anything that will not go away by waiting */
  FATAL = "FATAL",
}

/**
 * Why an entry was not copied without being a failure
 */
export type SkipReason = "locked" | "excluded" | "cancelled";

/**
 * A discovered file, immutable once created by the tree walker
 */
export interface FileEntry {
  /** Absolute source path */
  sourcePath: string;
  /** Path relative to the source root, always with `/` separators */
  relativePath: string;
  /** Size in bytes, informational */
  size?: number;
}

export interface CopiedOutcome {
  status: "copied";
  source: string;
  /** Final destination path, after collision resolution */
  destination: string;
  bucket: string;
  bytes?: number;
  /** Number of retries needed before the copy succeeded */
  retries: number;
}

export interface SkippedOutcome {
  status: "skipped";
  source: string;
  reason: SkipReason;
  retries?: number;
  /** Last error seen, for locked skips */
  error?: string;
}

export interface FailedOutcome {
  status: "failed";
  source: string;
  kind: ErrorKind;
  retries: number;
  error: string;
}

export type CopyOutcome = CopiedOutcome | SkippedOutcome | FailedOutcome;

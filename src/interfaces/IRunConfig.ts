/**
 * Run configuration interface
 *
 * A RunConfig is built once by the ConfigLoader before traversal starts and is
 * frozen for the rest of the run. Every component receives it (or the part of
 * it it needs) explicitly.
 */

/**
 * Verbosity of the console logger. `silent` disables all log output.
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface RunConfig {
  /** Absolute path of the directory tree to scan */
  sourceRoot: string;
  /** Absolute path of the directory that receives the bucket folders */
  destinationRoot: string;
  /** Maximum number of copy operations running at the same time */
  maxConcurrency: number;
  /** Maximum number of retries for locked or transient errors */
  maxRetries: number;
  /** Base delay of the exponential backoff, in milliseconds */
  retryBaseDelayMs: number;
  /** Report locked files that never unlock as skipped instead of failed */
  skipLocked: boolean;
  /** Do not warn about skipped locked files */
  silentLocked: boolean;
  /** Glob patterns pruning source subtrees and files */
  excludeGlobs: readonly string[];
  /** Console logger verbosity */
  logLevel: LogLevel;
  /** Optional path of a JSON file receiving the run summary */
  reportFile?: string;
}

/**
 * Common types for ext-sorter
 *
 * This module defines the error types shared by every component.
 */

/**
 * Configuration error - thrown when the run cannot start
 *
 * Configuration errors are raised before any file is copied and abort the
 * whole run. They indicate input that has to be corrected by the user.
 *
 * Common causes:
 * - Unknown command-line flag
 * - Non-numeric or out-of-range value (concurrency, retries, delay)
 * - Source root missing or not a directory
 * - Destination root equal to the source root
 * - Unreadable or malformed config file
 *
 * @example
 * ```typescript
 * throw new ConfigError("Source directory does not exist: /media/card");
 * ```
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Filesystem error - thrown when a filesystem step owned by ext-sorter fails
 *
 * Carries the errno code of the underlying Node.js error when there is one,
 * so the error can still be classified as locked, transient or fatal.
 *
 * @example
 * ```typescript
 * throw new FileSystemError("Bucket path is not a directory: out/jpg", "ENOTDIR");
 * ```
 */
export class FileSystemError extends Error {
  readonly code?: string;

  constructor(message: string, code?: string) {
    super(message);
    this.name = "FileSystemError";
    this.code = code;
  }
}

/**
 * Narrow an unknown thrown value to a Node.js system error
 *
 * Shape check only: errors raised in another realm (a VM context, Jest's
 * sandbox) are not `instanceof Error`.
 */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  );
}

/**
 * Human-readable message for an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}

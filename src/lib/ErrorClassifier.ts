/**
 * Error classifier for copy failures
 * Maps Node.js system errors onto the retry classes of the copy engine
 */

import { ErrorKind } from "../interfaces/ICopyOutcome";
import { errorMessage, isNodeError } from "../types";

/**
 * errno codes raised while another process holds the file
 */
const LOCKED_CODES = new Set(["EBUSY", "ETXTBSY", "ELOCKED"]);

/**
 * Sharing violations surface as access errors on Windows
 */
const WIN32_LOCKED_CODES = new Set(["EPERM", "EACCES"]);

/**
 * errno codes that usually clear up on their own
 */
const TRANSIENT_CODES = new Set([
  "EAGAIN",
  "EMFILE",
  "ENFILE",
  "EINTR",
  "ETIMEDOUT",
  "ENOMEM",
]);

/**
 * Error classifier class
 * Static helpers to classify and describe errors raised by copy attempts
 */
export class ErrorClassifier {
  /**
   * Classify an error into a retry class
   *
   * @param error - Anything thrown by a copy attempt
   * @param platform - Platform whose errno conventions apply
   */
  static classify(
    error: unknown,
    platform: NodeJS.Platform = process.platform
  ): ErrorKind {
    if (!isNodeError(error) || error.code === undefined) {
      return ErrorKind.FATAL;
    }

    const code = error.code;
    if (LOCKED_CODES.has(code)) {
      return ErrorKind.LOCKED;
    }
    if (platform === "win32" && WIN32_LOCKED_CODES.has(code)) {
      return ErrorKind.LOCKED;
    }
    if (TRANSIENT_CODES.has(code)) {
      return ErrorKind.TRANSIENT_IO;
    }
    return ErrorKind.FATAL;
  }

  /**
   * Whether an error class is worth another attempt
   */
  static isRetryable(kind: ErrorKind): boolean {
    return kind === ErrorKind.LOCKED || kind === ErrorKind.TRANSIENT_IO;
  }

  /**
   * One-line description including the errno code when known
   */
  static describe(error: unknown): string {
    const message = errorMessage(error);
    if (isNodeError(error) && error.code && !message.includes(error.code)) {
      return `${error.code}: ${message}`;
    }
    return message;
  }

  /**
   * Remediation hint printed next to failures in the summary
   */
  static getRemediation(kind: ErrorKind): string {
    switch (kind) {
      case ErrorKind.LOCKED:
        return "Close the program holding the file, or rerun with --skip-locked";
      case ErrorKind.TRANSIENT_IO:
        return "Lower --concurrency or raise --retries and try again";
      case ErrorKind.FATAL:
        return "Check permissions and free space on the destination";
    }
  }
}

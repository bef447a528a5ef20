/**
 * Console logger
 *
 * Diagnostics go to stderr so stdout only carries the run summary.
 */

import { ILogger } from "../interfaces/ILogger";
import { LogLevel } from "../interfaces/IRunConfig";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_PREFIX = "[ext-sorter]";

export class ConsoleLogger implements ILogger {
  private threshold: number;

  constructor(level: LogLevel = "info") {
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string): void {
    this.write("error", message);
  }

  isEnabled(level: LogLevel): boolean {
    return level !== "silent" && LEVEL_ORDER[level] >= this.threshold;
  }

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }
    console.error(
      `${new Date().toISOString()} ${LOG_PREFIX} [${level.toUpperCase()}] ${message}`
    );
  }
}

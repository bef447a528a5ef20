/**
 * ext-sorter
 *
 * Copies every file of a directory tree into folders named after the
 * file's extension, concurrently, retrying locked files and never
 * overwriting existing names.
 */

export * from "./interfaces";
export * from "./lib";
export * from "./types";

import * as fs from "fs";
import { ILogger } from "./interfaces/ILogger";
import { RunConfig } from "./interfaces/IRunConfig";
import { RunSummary } from "./interfaces/IReportAggregator";
import { ConfigLoader } from "./lib/ConfigLoader";
import { ConsoleLogger, LOG_PREFIX } from "./lib/Logger";
import { ReportAggregator } from "./lib/ReportAggregator";
import { Scheduler, SchedulerDependencies } from "./lib/Scheduler";
import { ConfigError, FileSystemError, errorMessage } from "./types";

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURES: 1,
  CONFIG_ERROR: 2,
  CANCELLED: 130,
} as const;

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  /** Cancels the run from outside */
  signal?: AbortSignal;
  /** Cancel on SIGINT/SIGTERM; the command-line entry point turns this on */
  handleSignals?: boolean;
  /** Replaces the console logger built from the config */
  logger?: ILogger;
  /** Receives summary lines; defaults to stdout */
  print?: (line: string) => void;
  /** Extra collaborators handed to the scheduler */
  dependencies?: Omit<SchedulerDependencies, "logger">;
}

/**
 * Run ext-sorter with command-line arguments and return the exit code
 *
 * @example
 * ```typescript
 * const code = await runExtensionSorter(["./card", "./sorted", "--skip-locked"]);
 * ```
 */
export async function runExtensionSorter(
  argv: readonly string[],
  options: RunOptions = {}
): Promise<number> {
  const print = options.print ?? ((line: string) => console.log(line));

  let config: RunConfig;
  try {
    if (ConfigLoader.parseArgv(argv).help) {
      print(ConfigLoader.usage());
      return EXIT_CODES.SUCCESS;
    }
    config = await ConfigLoader.loadConfig(argv, options.env ?? process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`${LOG_PREFIX} Configuration error: ${error.message}`);
      console.error(`${LOG_PREFIX} Run with --help for usage.`);
      return EXIT_CODES.CONFIG_ERROR;
    }
    throw error;
  }

  const logger = options.logger ?? new ConsoleLogger(config.logLevel);
  logger.info(`Source: ${config.sourceRoot}`);
  logger.info(`Destination: ${config.destinationRoot}`);
  logger.info(
    `Concurrency ${config.maxConcurrency}, retries ${config.maxRetries}, base delay ${config.retryBaseDelayMs}ms`
  );

  const controller = new AbortController();
  const cancel = (reason: string) => {
    if (!controller.signal.aborted) {
      logger.warn(`${reason}: finishing in-flight copies, skipping the rest`);
      controller.abort();
    }
  };
  const onSignal = (signal: NodeJS.Signals) => cancel(`Received ${signal}`);
  const onExternalAbort = () => cancel("Run cancelled");

  options.signal?.addEventListener("abort", onExternalAbort, { once: true });
  if (options.signal?.aborted) {
    onExternalAbort();
  }
  if (options.handleSignals) {
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }

  let summary: RunSummary;
  try {
    const scheduler = new Scheduler(config, {
      ...options.dependencies,
      logger,
    });
    summary = await scheduler.run(controller.signal);
  } catch (error) {
    if (error instanceof FileSystemError) {
      logger.error(error.message);
      return EXIT_CODES.CONFIG_ERROR;
    }
    throw error;
  } finally {
    options.signal?.removeEventListener("abort", onExternalAbort);
    if (options.handleSignals) {
      process.removeListener("SIGINT", onSignal);
      process.removeListener("SIGTERM", onSignal);
    }
  }

  for (const line of ReportAggregator.format(summary)) {
    print(line);
  }

  if (config.reportFile) {
    await writeReport(config.reportFile, summary, logger);
  }

  if (summary.cancelled) {
    return EXIT_CODES.CANCELLED;
  }
  return summary.failed > 0 ? EXIT_CODES.FAILURES : EXIT_CODES.SUCCESS;
}

async function writeReport(
  reportFile: string,
  summary: RunSummary,
  logger: ILogger
): Promise<void> {
  try {
    await fs.promises.writeFile(reportFile, JSON.stringify(summary, null, 2));
    logger.info(`Report saved to ${reportFile}`);
  } catch (error) {
    logger.error(`Failed to save report ${reportFile}: ${errorMessage(error)}`);
  }
}

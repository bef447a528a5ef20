/**
 * Scheduler implementation
 *
 * The tree walker produces entries into a bounded queue; a fixed pool of
 * `maxConcurrency` workers consumes them, one CopyTask at a time each.
 *
 *   idle -> traversing -> draining -> done
 */

import * as fs from "fs";
import { ICollisionResolver } from "../interfaces/ICollisionResolver";
import { CopyOutcome, ErrorKind, FileEntry } from "../interfaces/ICopyOutcome";
import { IFileCopier } from "../interfaces/IFileCopier";
import { ILogger } from "../interfaces/ILogger";
import { IPathClassifier } from "../interfaces/IPathClassifier";
import { IRetryPolicy } from "../interfaces/IRetryPolicy";
import { IReportAggregator, RunSummary } from "../interfaces/IReportAggregator";
import { RunConfig } from "../interfaces/IRunConfig";
import {
  ICopyTask,
  IScheduler,
  SchedulerState,
} from "../interfaces/IScheduler";
import { ITreeWalker } from "../interfaces/ITreeWalker";
import { FileSystemError, errorMessage, isNodeError } from "../types";
import { BoundedQueue } from "./BoundedQueue";
import { CollisionResolver } from "./CollisionResolver";
import { CopyTask } from "./CopyTask";
import { ErrorClassifier } from "./ErrorClassifier";
import { FileCopier } from "./FileCopier";
import { PathClassifier } from "./PathClassifier";
import { ReportAggregator } from "./ReportAggregator";
import { RetryPolicy } from "./RetryPolicy";
import { TreeWalker } from "./TreeWalker";

/**
 * Collaborators of a run. Anything left out is built from the config.
 */
export interface SchedulerDependencies {
  logger: ILogger;
  classifier?: IPathClassifier;
  resolver?: ICollisionResolver;
  retryPolicy?: IRetryPolicy;
  copier?: IFileCopier;
  walker?: ITreeWalker;
  task?: ICopyTask;
  aggregator?: IReportAggregator;
  /** Entries buffered between walker and workers; defaults to 2 per worker */
  queueCapacity?: number;
}

export class Scheduler implements IScheduler {
  private currentState: SchedulerState = "idle";
  private logger: ILogger;
  private walker: ITreeWalker;
  private task: ICopyTask;
  private aggregator: IReportAggregator;
  private queueCapacity: number;

  constructor(
    private readonly config: RunConfig,
    deps: SchedulerDependencies
  ) {
    this.logger = deps.logger;

    const classifier = deps.classifier ?? new PathClassifier(config.excludeGlobs);
    this.walker =
      deps.walker ??
      new TreeWalker({
        classifier,
        skipDirectories: [config.destinationRoot],
        logger: deps.logger,
      });
    this.task =
      deps.task ??
      new CopyTask({
        classifier,
        resolver: deps.resolver ?? new CollisionResolver(config.destinationRoot),
        retryPolicy:
          deps.retryPolicy ??
          new RetryPolicy(
            {
              maxRetries: config.maxRetries,
              baseDelayMs: config.retryBaseDelayMs,
              skipLocked: config.skipLocked,
              silentLocked: config.silentLocked,
            },
            { logger: deps.logger }
          ),
        copier: deps.copier ?? new FileCopier(deps.logger),
      });
    this.aggregator = deps.aggregator ?? new ReportAggregator();
    this.queueCapacity = deps.queueCapacity ?? config.maxConcurrency * 2;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  async run(signal?: AbortSignal): Promise<RunSummary> {
    if (this.currentState !== "idle") {
      throw new Error(`Scheduler already ${this.currentState}; create a new one per run`);
    }

    try {
      await fs.promises.mkdir(this.config.destinationRoot, { recursive: true });
    } catch (error) {
      this.transition("done");
      throw new FileSystemError(
        `Cannot create destination ${this.config.destinationRoot}: ${errorMessage(error)}`,
        isNodeError(error) ? error.code : undefined
      );
    }

    this.transition("traversing");
    const queue = new BoundedQueue<FileEntry>(this.queueCapacity);
    const workers = Array.from({ length: this.config.maxConcurrency }, () =>
      this.work(queue, signal)
    );

    try {
      await this.produce(queue, signal);
    } catch (error) {
      // The walk itself broke down; what was already queued still runs
      this.record({
        status: "failed",
        source: this.config.sourceRoot,
        kind: ErrorKind.FATAL,
        retries: 0,
        error: ErrorClassifier.describe(error),
      });
    } finally {
      queue.close();
    }

    this.transition("draining");
    await Promise.all(workers);
    this.transition("done");

    return this.aggregator.summarize({ cancelled: signal?.aborted ?? false });
  }

  private async produce(
    queue: BoundedQueue<FileEntry>,
    signal?: AbortSignal
  ): Promise<void> {
    for await (const event of this.walker.walk(this.config.sourceRoot, signal)) {
      switch (event.type) {
        case "file":
          await queue.put(event.entry);
          break;
        case "excluded":
          this.record({ status: "skipped", source: event.path, reason: "excluded" });
          break;
        case "error":
          this.record({
            status: "failed",
            source: event.path,
            kind: ErrorKind.FATAL,
            retries: 0,
            error: ErrorClassifier.describe(event.error),
          });
          break;
      }
    }
  }

  private async work(
    queue: BoundedQueue<FileEntry>,
    signal?: AbortSignal
  ): Promise<void> {
    for (;;) {
      const entry = await queue.take();
      if (entry === undefined) {
        return;
      }

      if (signal?.aborted) {
        this.record({ status: "skipped", source: entry.sourcePath, reason: "cancelled" });
        continue;
      }

      let outcome: CopyOutcome;
      try {
        outcome = await this.task.run(entry, signal);
      } catch (error) {
        outcome = {
          status: "failed",
          source: entry.sourcePath,
          kind: ErrorKind.FATAL,
          retries: 0,
          error: ErrorClassifier.describe(error),
        };
      }
      this.record(outcome);
    }
  }

  private record(outcome: CopyOutcome): void {
    this.aggregator.add(outcome);

    switch (outcome.status) {
      case "copied":
        this.logger.debug(`Copied ${outcome.source} -> ${outcome.destination}`);
        break;
      case "skipped":
        if (outcome.reason === "locked") {
          const message = `Skipped locked file: ${outcome.source}`;
          if (this.config.silentLocked) {
            this.logger.debug(message);
          } else {
            this.logger.warn(message);
          }
        } else {
          this.logger.debug(`Skipped (${outcome.reason}): ${outcome.source}`);
        }
        break;
      case "failed":
        this.logger.error(
          `Failed to copy ${outcome.source} after ${outcome.retries} retries [${outcome.kind}]: ${outcome.error}`
        );
        break;
    }
  }

  private transition(next: SchedulerState): void {
    this.logger.debug(`Scheduler ${this.currentState} -> ${next}`);
    this.currentState = next;
  }
}

/**
 * Copy task implementation
 *
 * One file: pick the bucket, reserve a destination name, copy under the
 * retry policy, then commit the name or hand it back.
 */

import * as path from "path";
import {
  ICollisionResolver,
  ReservedPath,
} from "../interfaces/ICollisionResolver";
import { CopyOutcome, FileEntry } from "../interfaces/ICopyOutcome";
import { IFileCopier } from "../interfaces/IFileCopier";
import { IPathClassifier } from "../interfaces/IPathClassifier";
import { IRetryPolicy } from "../interfaces/IRetryPolicy";
import { ICopyTask } from "../interfaces/IScheduler";
import { ErrorClassifier } from "./ErrorClassifier";

export interface CopyTaskDependencies {
  classifier: IPathClassifier;
  resolver: ICollisionResolver;
  retryPolicy: IRetryPolicy;
  copier: IFileCopier;
}

export class CopyTask implements ICopyTask {
  constructor(private readonly deps: CopyTaskDependencies) {}

  async run(entry: FileEntry, signal?: AbortSignal): Promise<CopyOutcome> {
    const bucket = this.deps.classifier.classifyBucket(entry.sourcePath);
    const fileName = path.basename(entry.sourcePath);

    let reserved: ReservedPath;
    try {
      reserved = await this.deps.resolver.reserve(bucket, fileName);
    } catch (error) {
      return {
        status: "failed",
        source: entry.sourcePath,
        kind: ErrorClassifier.classify(error),
        retries: 0,
        error: ErrorClassifier.describe(error),
      };
    }

    const destination = reserved.path;
    try {
      // Waiting for the bucket lock may outlast a cancellation
      if (signal?.aborted) {
        return { status: "skipped", source: entry.sourcePath, reason: "cancelled" };
      }
      const outcome = await this.deps.retryPolicy.execute(
        entry.sourcePath,
        async () => {
          await this.deps.copier.copy(entry.sourcePath, destination);
          return { destination, bucket, bytes: entry.size };
        },
        signal
      );
      if (outcome.status === "copied") {
        reserved.commit();
      }
      return outcome;
    } finally {
      reserved.release();
    }
  }
}

/**
 * Collision resolver implementation
 *
 * Keeps, per bucket, the names reserved by copies still in flight and
 * checks the destination folder for everything already written. Both
 * checks and the claim happen under the bucket's lock. A committed name is
 * forgotten: its file on disk holds it from then on, so memory stays
 * proportional to the copies in flight.
 */

import * as fs from "fs";
import * as path from "path";
import {
  DestinationCandidate,
  ICollisionResolver,
  ReservedPath,
} from "../interfaces/ICollisionResolver";
import { FileSystemError, errorMessage, isNodeError } from "../types";
import { KeyedMutex } from "./KeyedMutex";

export interface CollisionResolverOptions {
  /**
   * Compare names case-insensitively. Defaults to true on platforms whose
   * default filesystems ignore case (win32, darwin).
   */
  caseInsensitive?: boolean;
}

export class CollisionResolver implements ICollisionResolver {
  private locks = new KeyedMutex();
  /** bucket -> normalised names reserved and not yet settled */
  private claims: Map<string, Set<string>> = new Map();
  private createdBuckets: Set<string> = new Set();
  private caseInsensitive: boolean;

  constructor(
    private readonly destinationRoot: string,
    options: CollisionResolverOptions = {}
  ) {
    this.caseInsensitive =
      options.caseInsensitive ??
      (process.platform === "win32" || process.platform === "darwin");
  }

  async reserve(bucket: string, desiredName: string): Promise<ReservedPath> {
    const bucketDir = path.join(this.destinationRoot, bucket);

    return this.locks.runExclusive(bucket, async () => {
      await this.ensureBucket(bucket, bucketDir);

      const candidate: DestinationCandidate = {
        bucket,
        baseName: desiredName,
        suffixIndex: 0,
      };

      for (;;) {
        const fileName = candidateName(candidate);
        const key = this.normalize(fileName);
        const fullPath = path.join(bucketDir, fileName);

        if (!this.isClaimed(bucket, key) && !(await pathExists(fullPath))) {
          this.claimsFor(bucket).add(key);
          return this.createReservation(bucket, fileName, fullPath, key);
        }
        candidate.suffixIndex++;
      }
    });
  }

  pendingCount(bucket?: string): number {
    if (bucket !== undefined) {
      return this.claims.get(bucket)?.size ?? 0;
    }
    let pending = 0;
    for (const names of this.claims.values()) {
      pending += names.size;
    }
    return pending;
  }

  private createReservation(
    bucket: string,
    fileName: string,
    fullPath: string,
    key: string
  ): ReservedPath {
    let settled = false;
    // Commit and release both drop the claim; they differ only in intent
    const settle = () => {
      if (settled) {
        return;
      }
      settled = true;
      this.forget(bucket, key);
    };

    return {
      bucket,
      fileName,
      path: fullPath,
      commit: settle,
      release: settle,
    };
  }

  private claimsFor(bucket: string): Set<string> {
    let names = this.claims.get(bucket);
    if (!names) {
      names = new Set();
      this.claims.set(bucket, names);
    }
    return names;
  }

  private isClaimed(bucket: string, key: string): boolean {
    return this.claims.get(bucket)?.has(key) ?? false;
  }

  private forget(bucket: string, key: string): void {
    const names = this.claims.get(bucket);
    if (!names) {
      return;
    }
    names.delete(key);
    if (names.size === 0) {
      this.claims.delete(bucket);
    }
  }

  private async ensureBucket(bucket: string, bucketDir: string): Promise<void> {
    if (this.createdBuckets.has(bucket)) {
      return;
    }
    try {
      await fs.promises.mkdir(bucketDir, { recursive: true });
    } catch (error) {
      throw new FileSystemError(
        `Cannot create bucket directory ${bucketDir}: ${errorMessage(error)}`,
        isNodeError(error) ? error.code : undefined
      );
    }
    this.createdBuckets.add(bucket);
  }

  private normalize(fileName: string): string {
    return this.caseInsensitive ? fileName.toLowerCase() : fileName;
  }
}

/**
 * File name for a probe: `name.ext`, `name (1).ext`, `name (2).ext`, ...
 */
export function candidateName(candidate: DestinationCandidate): string {
  if (candidate.suffixIndex === 0) {
    return candidate.baseName;
  }
  const { stem, extension } = splitExtension(candidate.baseName);
  return `${stem} (${candidate.suffixIndex})${extension}`;
}

/**
 * Split the last extension off a file name; a leading dot is part of the stem
 */
export function splitExtension(fileName: string): {
  stem: string;
  extension: string;
} {
  const lastDot = fileName.lastIndexOf(".");
  if (lastDot <= 0) {
    return { stem: fileName, extension: "" };
  }
  return {
    stem: fileName.slice(0, lastDot),
    extension: fileName.slice(lastDot),
  };
}

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.promises.lstat(p);
    return true;
  } catch (error) {
    if (isNodeError(error) && error.code === "ENOENT") {
      return false;
    }
    throw new FileSystemError(
      `Cannot check destination ${p}: ${errorMessage(error)}`,
      isNodeError(error) ? error.code : undefined
    );
  }
}

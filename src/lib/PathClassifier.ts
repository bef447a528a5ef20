/**
 * Path classifier implementation
 */

import * as path from "path";
import { minimatch, Minimatch } from "minimatch";
import {
  IPathClassifier,
  NO_EXTENSION_BUCKET,
} from "../interfaces/IPathClassifier";

const MATCH_OPTIONS = {
  dot: true,
  matchBase: true,
  nocomment: true,
} as const;

export class PathClassifier implements IPathClassifier {
  private matchers: Minimatch[];
  private excludeGlobs: readonly string[];

  constructor(excludeGlobs: readonly string[] = []) {
    this.excludeGlobs = excludeGlobs;
    this.matchers = excludeGlobs.map(
      (pattern) => new Minimatch(normalizeSeparators(pattern), MATCH_OPTIONS)
    );
  }

  classifyBucket(filePath: string): string {
    return bucketFor(filePath);
  }

  isExcluded(
    relativePath: string,
    excludeGlobs?: readonly string[]
  ): boolean {
    const normalized = normalizeSeparators(relativePath).replace(/^\.\//, "");
    const segments = normalized.split("/").filter((s) => s.length > 0);
    if (segments.length === 0) {
      return false;
    }

    const test =
      excludeGlobs === undefined || excludeGlobs === this.excludeGlobs
        ? (candidate: string) => this.matchers.some((m) => m.match(candidate))
        : (candidate: string) =>
            excludeGlobs.some((pattern) =>
              minimatch(candidate, normalizeSeparators(pattern), MATCH_OPTIONS)
            );

    // Ancestors first: "a", "a/b", ..., then the path itself
    for (let depth = 1; depth <= segments.length; depth++) {
      if (test(segments.slice(0, depth).join("/"))) {
        return true;
      }
    }
    return false;
  }
}

/**
 * Lower-cased extension of a file name, or `no_extension`
 */
export function bucketFor(filePath: string): string {
  const name = path.basename(normalizeSeparators(filePath));
  const lastDot = name.lastIndexOf(".");
  // A leading dot belongs to the name (.bashrc), a trailing one has no extension
  if (lastDot <= 0 || lastDot === name.length - 1) {
    return NO_EXTENSION_BUCKET;
  }
  return name.slice(lastDot + 1).toLowerCase();
}

function normalizeSeparators(p: string): string {
  return p.replace(/\\/g, "/");
}

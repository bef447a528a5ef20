/**
 * Tree walker implementation
 * Lazy depth-first traversal with glob pruning and symlink cycle detection
 */

import * as fs from "fs";
import * as path from "path";
import { ILogger } from "../interfaces/ILogger";
import { IPathClassifier } from "../interfaces/IPathClassifier";
import { ITreeWalker, WalkEvent } from "../interfaces/ITreeWalker";
import { FileSystemError, errorMessage, isNodeError } from "../types";

export interface TreeWalkerOptions {
  classifier: IPathClassifier;
  /** Directories never descended into, e.g. a destination inside the source */
  skipDirectories?: readonly string[];
  logger?: ILogger;
}

interface PendingDirectory {
  absolutePath: string;
  relativePath: string;
}

export class TreeWalker implements ITreeWalker {
  private classifier: IPathClassifier;
  private skipDirectories: readonly string[];
  private logger?: ILogger;

  constructor(options: TreeWalkerOptions) {
    this.classifier = options.classifier;
    this.skipDirectories = options.skipDirectories ?? [];
    this.logger = options.logger;
  }

  async *walk(root: string, signal?: AbortSignal): AsyncGenerator<WalkEvent> {
    const visited = new Set<string>();
    const skipped = await this.identitiesOf(this.skipDirectories);
    const stack: PendingDirectory[] = [{ absolutePath: root, relativePath: "" }];

    while (stack.length > 0) {
      if (signal?.aborted) {
        return;
      }
      const directory = stack.pop();
      if (!directory) {
        break;
      }

      let identity: string;
      let entries: fs.Dirent[];
      try {
        identity = identityOf(await fs.promises.stat(directory.absolutePath));
        entries = await fs.promises.readdir(directory.absolutePath, {
          withFileTypes: true,
        });
      } catch (error) {
        yield { type: "error", path: directory.absolutePath, error };
        continue;
      }

      if (skipped.has(identity)) {
        this.logger?.debug(`Not descending into ${directory.absolutePath}`);
        continue;
      }
      if (visited.has(identity)) {
        this.logger?.debug(
          `Directory already visited, not following: ${directory.absolutePath}`
        );
        continue;
      }
      visited.add(identity);

      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      const subdirectories: PendingDirectory[] = [];

      for (const dirent of entries) {
        if (signal?.aborted) {
          return;
        }

        const absolutePath = path.join(directory.absolutePath, dirent.name);
        const relativePath = directory.relativePath
          ? `${directory.relativePath}/${dirent.name}`
          : dirent.name;

        let stats: fs.Stats | undefined;
        let isDirectory = dirent.isDirectory();
        let isFile = dirent.isFile();

        if (dirent.isSymbolicLink()) {
          try {
            stats = await fs.promises.stat(absolutePath);
          } catch (error) {
            yield {
              type: "error",
              path: absolutePath,
              error: new FileSystemError(
                `Broken symbolic link ${absolutePath}: ${errorMessage(error)}`,
                isNodeError(error) ? error.code : undefined
              ),
            };
            continue;
          }
          isDirectory = stats.isDirectory();
          isFile = stats.isFile();
        }

        if (!isDirectory && !isFile) {
          this.logger?.debug(`Not a regular file, ignoring: ${absolutePath}`);
          continue;
        }

        if (this.classifier.isExcluded(relativePath)) {
          this.logger?.debug(`Excluded by glob: ${relativePath}`);
          yield {
            type: "excluded",
            path: absolutePath,
            relativePath,
            isDirectory,
          };
          continue;
        }

        if (isDirectory) {
          subdirectories.push({ absolutePath, relativePath });
          continue;
        }

        if (!stats) {
          try {
            stats = await fs.promises.stat(absolutePath);
          } catch (error) {
            yield { type: "error", path: absolutePath, error };
            continue;
          }
        }

        yield {
          type: "file",
          entry: {
            sourcePath: absolutePath,
            relativePath,
            size: stats.size,
          },
        };
      }

      // Reversed so subdirectories are popped in name order
      for (let i = subdirectories.length - 1; i >= 0; i--) {
        stack.push(subdirectories[i]);
      }
    }
  }

  private async identitiesOf(directories: readonly string[]): Promise<Set<string>> {
    const identities = new Set<string>();
    for (const directory of directories) {
      try {
        identities.add(identityOf(await fs.promises.stat(directory)));
      } catch (error) {
        this.logger?.debug(
          `Cannot stat ${directory}, not skipping it: ${errorMessage(error)}`
        );
      }
    }
    return identities;
  }
}

function identityOf(stats: fs.Stats): string {
  return `${stats.dev}:${stats.ino}`;
}

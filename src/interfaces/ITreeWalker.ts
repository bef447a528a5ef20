/**
 * Tree walker interface
 */

import { FileEntry } from "./ICopyOutcome";

/**
 * Something the walker found on its way through the source tree
 */
export type WalkEvent =
  | { type: "file"; entry: FileEntry }
  | { type: "excluded"; path: string; relativePath: string; isDirectory: boolean }
  | { type: "error"; path: string; error: unknown };

export interface ITreeWalker {
  /**
   * Lazily walk a tree, depth-first, entries of each directory in name order
   *
   * Excluded directories are reported once and never descended into.
   * Symbolic links are followed unless they lead back into a directory
   * that has already been visited.
   *
   * @param root - Absolute path of the tree root
   * @param signal - Stops the walk at the next entry once aborted
   */
  walk(root: string, signal?: AbortSignal): AsyncGenerator<WalkEvent>;
}

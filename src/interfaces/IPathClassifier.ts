/**
 * Path classifier interface
 */

/**
 * Bucket used for files whose name carries no extension
 */
export const NO_EXTENSION_BUCKET = "no_extension";

export interface IPathClassifier {
  /**
   * Destination bucket of a file
   *
   * The bucket is the text after the last `.` of the file name, lower-cased.
   * The leading dot of a dotfile does not start an extension.
   *
   * @param filePath - Absolute or relative path; only the base name is used
   * @returns The bucket name, or `no_extension`
   *
   * @example
   * ```typescript
   * classifier.classifyBucket("photos/IMG_0001.JPG"); // "jpg"
   * classifier.classifyBucket(".bashrc");             // "no_extension"
   * ```
   */
  classifyBucket(filePath: string): string;

  /**
   * Check a source-relative path against the exclusion globs
   *
   * @param relativePath - Path relative to the source root
   * @param excludeGlobs - Patterns to test; defaults to the configured ones
   * @returns true if the path or any of its ancestor directories matches
   */
  isExcluded(relativePath: string, excludeGlobs?: readonly string[]): boolean;
}

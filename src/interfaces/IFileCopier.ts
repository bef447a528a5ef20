/**
 * Byte-copy primitive
 */

export interface IFileCopier {
  /**
   * Copy one file, keeping its timestamps and mode where the platform allows
   *
   * On failure no partial destination file is left behind.
   *
   * @throws the underlying Node.js error, unchanged, so it can be classified
   */
  copy(source: string, destination: string): Promise<void>;
}

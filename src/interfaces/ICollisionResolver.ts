/**
 * Collision resolver interface
 *
 * Hands out destination names that are unique both on disk and among the
 * copies still in flight, so concurrent copies into one bucket never write
 * the same file.
 */

/**
 * A held claim on a destination name
 */
export interface ReservedPath {
  /** Bucket the name was reserved in */
  bucket: string;
  /** Final file name, possibly suffixed (`photo (2).jpg`) */
  fileName: string;
  /** Absolute destination path */
  path: string;
  /**
   * Mark the reservation as written; release() becomes a no-op. Call only
   * once the file exists, since the file then holds the name.
   */
  commit(): void;
  /** Give the name back so later reservations may use it */
  release(): void;
}

/**
 * One probe of the resolution loop
 */
export interface DestinationCandidate {
  bucket: string;
  baseName: string;
  /** 0 means the unsuffixed name */
  suffixIndex: number;
}

export interface ICollisionResolver {
  /**
   * Reserve a free destination name in a bucket
   *
   * Reservations within one bucket are serialised by that bucket's lock.
   * The desired name is returned unchanged when free; otherwise
   * `name (1).ext`, `name (2).ext`, ... are probed in order.
   *
   * @param bucket - Bucket folder under the destination root
   * @param desiredName - Original file name
   * @throws FileSystemError if the bucket directory cannot be created
   *
   * @example
   * ```typescript
   * const reserved = await resolver.reserve("jpg", "a.jpg");
   * try {
   *   await copier.copy(source, reserved.path);
   *   reserved.commit();
   * } finally {
   *   reserved.release();
   * }
   * ```
   */
  reserve(bucket: string, desiredName: string): Promise<ReservedPath>;

  /**
   * Number of names currently held in memory: reserved, not yet committed
   * or released
   */
  pendingCount(bucket?: string): number;
}

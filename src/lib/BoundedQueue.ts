/**
 * Bounded async queue between the tree walker and the copy workers
 *
 * put() waits while the queue is full, take() waits while it is empty.
 * After close(), take() drains what is left and then resolves undefined.
 */

export class BoundedQueue<T> {
  private items: T[] = [];
  private takers: Array<(item: T | undefined) => void> = [];
  private putters: Array<() => void> = [];
  private closed = false;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Queue capacity must be a positive integer, got ${capacity}`
      );
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async put(item: T): Promise<void> {
    while (this.items.length >= this.capacity && !this.closed) {
      await new Promise<void>((resolve) => this.putters.push(resolve));
    }
    if (this.closed) {
      throw new Error("Cannot put into a closed queue");
    }

    const taker = this.takers.shift();
    if (taker) {
      taker(item);
    } else {
      this.items.push(item);
    }
  }

  async take(): Promise<T | undefined> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.putters.shift()?.();
      return item;
    }
    if (this.closed) {
      return undefined;
    }
    return new Promise<T | undefined>((resolve) => this.takers.push(resolve));
  }

  /**
   * Stop accepting items; waiting takers get undefined once drained
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const taker of this.takers.splice(0)) {
      taker(undefined);
    }
    for (const putter of this.putters.splice(0)) {
      putter();
    }
  }
}

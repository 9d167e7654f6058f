/**
 * Single-producer / single-consumer FIFO queue.
 *
 * Unbounded: `push` never blocks and never drops. `highWaterMark` only
 * drives `whenBelowHighWaterMark`, which a cooperative producer awaits.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private head = 0;
  private closed = false;
  private pendingTake: ((item: T | undefined) => void) | undefined;
  private writableWaiters: Array<() => void> = [];

  constructor(public readonly highWaterMark: number = 1024) {
    if (!Number.isInteger(highWaterMark) || highWaterMark < 1) {
      throw new RangeError(`highWaterMark must be a positive integer, got ${highWaterMark}`);
    }
  }

  get size(): number {
    return this.items.length - this.head;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * @throws Error once the queue is closed
   */
  push(item: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed queue');
    }
    if (this.pendingTake) {
      const resolve = this.pendingTake;
      this.pendingTake = undefined;
      resolve(item);
      return;
    }
    this.items.push(item);
  }

  /**
   * Next item in FIFO order, or undefined once the queue is closed and empty.
   * Only one take may be pending at a time.
   */
  take(): Promise<T | undefined> {
    if (this.pendingTake) {
      return Promise.reject(new Error('AsyncQueue supports a single consumer'));
    }
    if (this.size > 0) {
      return Promise.resolve(this.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise(resolve => {
      this.pendingTake = resolve;
    });
  }

  /**
   * Next item if one is queued right now, without waiting.
   */
  poll(): T | undefined {
    return this.size > 0 ? this.shift() : undefined;
  }

  /**
   * Marks end-of-stream. Items already queued are still delivered.
   */
  close(): void {
    this.closed = true;
    if (this.pendingTake) {
      const resolve = this.pendingTake;
      this.pendingTake = undefined;
      resolve(undefined);
    }
    this.releaseWriters();
  }

  /**
   * Removes and returns everything still queued.
   */
  drain(): T[] {
    const remaining = this.items.slice(this.head);
    this.items = [];
    this.head = 0;
    this.releaseWriters();
    return remaining;
  }

  whenBelowHighWaterMark(): Promise<void> {
    if (this.size < this.highWaterMark || this.closed) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.writableWaiters.push(resolve);
    });
  }

  private shift(): T {
    const item = this.items[this.head];
    this.head += 1;
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    if (this.size < this.highWaterMark) {
      this.releaseWriters();
    }
    return item;
  }

  private releaseWriters(): void {
    const waiters = this.writableWaiters;
    this.writableWaiters = [];
    waiters.forEach(resolve => resolve());
  }
}

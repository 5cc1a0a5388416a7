/**
 * Unbounded FIFO with an awaitable receive.
 * `next()` suspends until an item is pushed or the queue is closed (resolves undefined).
 */

export class AsyncQueue<T> {
  private items: T[] = [];
  private waiters: Array<(value: T | undefined) => void> = [];
  private closed = false;

  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }
    this.items.push(item);
    return true;
  }

  next(): Promise<T | undefined> {
    if (this.items.length > 0) return Promise.resolve(this.items.shift());
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Drop queued items; returns how many were discarded. */
  clear(): number {
    const n = this.items.length;
    this.items = [];
    return n;
  }

  /** Refuse further pushes and wake every pending receiver with undefined. */
  close(): void {
    this.closed = true;
    while (this.waiters.length > 0) {
      this.waiters.shift()?.(undefined);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

/**
 * Mailbox: unbounded FIFO with a single async consumer.
 *
 * Producers call `push()` from anywhere; the consumer awaits `next()`,
 * which resolves with `undefined` once the mailbox is closed and drained.
 */
export class Mailbox<T> {
  private items: T[] = [];
  private waiter: ((item: T | undefined) => void) | null = null;
  private closed: boolean = false;

  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  next(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    if (this.waiter) {
      return Promise.reject(new Error("Mailbox: only one consumer may wait at a time"));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Stop accepting items. Items already queued are still handed out. */
  close(): void {
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(undefined);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

// src/queue.ts

/**
 * FIFO channel between producers (button callbacks, mpv notifications) and
 * the single consumer (the controller's drain loop).
 *
 * `push` never blocks. `take` waits at most `timeoutMs` and resolves `null`
 * on timeout or once the queue is closed. Only one `take` may be pending.
 */
export class EventQueue<T> {
  private items: T[] = [];
  private waiter: ((v: T | null) => void) | null = null;
  private closed = false;

  push(item: T): void {
    if (this.closed) return;
    const w = this.waiter;
    if (w) {
      this.waiter = null;
      w(item);
      return;
    }
    this.items.push(item);
  }

  take(timeoutMs: number): Promise<T | null> {
    if (this.items.length > 0) return Promise.resolve(this.items.shift() ?? null);
    if (this.closed) return Promise.resolve(null);
    if (this.waiter) return Promise.reject(new Error("EventQueue supports a single consumer"));

    return new Promise<T | null>((resolve) => {
      const to = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);

      this.waiter = (v) => {
        clearTimeout(to);
        resolve(v);
      };
    });
  }

  /** Drops pending items and wakes the consumer with `null`. */
  close(): void {
    this.closed = true;
    this.items = [];
    const w = this.waiter;
    this.waiter = null;
    w?.(null);
  }

  get length(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

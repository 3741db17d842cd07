/**
 * Single-consumer async queue backing one pending exchange.
 *
 * The router pushes response frames; the session awaits them with
 * `take()`. A failure injected with `fail()` is raised only after every
 * item queued before it has been taken.
 *
 * @module device-api/async-queue
 */

interface Waiter<T> {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private waiter: Waiter<T> | null = null;
  private failure: Error | null = null;

  /** Number of items waiting to be taken. */
  get size(): number {
    return this.items.length;
  }

  /** True once `fail()` has been called. */
  get failed(): boolean {
    return this.failure !== null;
  }

  /**
   * Enqueue an item, handing it straight to a waiting consumer if there is one.
   *
   * @returns false when the queue has already failed and the item was dropped
   */
  push(item: T): boolean {
    if (this.failure) return false;
    const waiter = this.waiter;
    if (waiter) {
      this.settle(waiter);
      waiter.resolve(item);
      return true;
    }
    this.items.push(item);
    return true;
  }

  /**
   * Fail the queue. A waiting consumer is rejected immediately when nothing
   * is queued; later `take()` calls reject once the queue drains.
   * Only the first failure is kept.
   */
  fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    const waiter = this.waiter;
    if (waiter) {
      this.settle(waiter);
      waiter.reject(error);
    }
  }

  /**
   * Take the next item, waiting for one if the queue is empty.
   *
   * @param timeoutMs - Bounded wait; omit to wait indefinitely
   * @param onTimeout - Builds the rejection raised when the wait expires
   */
  take(timeoutMs?: number, onTimeout?: () => Error): Promise<T> {
    const next = this.items.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.failure) return Promise.reject(this.failure);
    if (this.waiter) {
      return Promise.reject(new Error('AsyncQueue supports a single consumer'));
    }

    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = { resolve, reject, timer: null };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          this.settle(waiter);
          reject(onTimeout?.() ?? new Error(`Timed out after ${timeoutMs}ms`));
        }, timeoutMs);
      }
      this.waiter = waiter;
    });
  }

  private settle(waiter: Waiter<T>): void {
    if (waiter.timer) clearTimeout(waiter.timer);
    if (this.waiter === waiter) this.waiter = null;
  }
}

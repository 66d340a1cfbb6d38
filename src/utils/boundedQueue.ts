import { runtimeClearTimeout, runtimeSetTimeout, type TimeoutHandle } from "../runtime/timers.js";

/** Outcome of {@link BoundedQueue.take}. */
export type QueueTake<T> = { type: "item"; value: T } | { type: "timeout" } | { type: "closed" };

interface PendingTaker<T> {
  resolve: (outcome: QueueTake<T>) => void;
  timer: TimeoutHandle | null;
}

/**
 * FIFO with a hard capacity and awaitable consumers. Pushing onto a full queue
 * fails instead of blocking so producers never stall on slow consumers.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: PendingTaker<T>[] = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`queue capacity must be a positive integer (received ${capacity})`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Enqueues {@link value}, handing it straight to a waiting consumer when one
   * exists. Returns `false` when the queue is full or closed.
   */
  push(value: T): boolean {
    if (this.isClosed) {
      return false;
    }
    const taker = this.takers.shift();
    if (taker) {
      this.settle(taker, { type: "item", value });
      return true;
    }
    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(value);
    return true;
  }

  /**
   * Resolves with the head item, waiting up to {@link timeoutMs} for one to
   * arrive. A closed queue resolves with `closed` immediately.
   */
  take(timeoutMs: number): Promise<QueueTake<T>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return Promise.resolve({ type: "item", value });
    }
    if (this.isClosed) {
      return Promise.resolve({ type: "closed" });
    }
    return new Promise((resolve) => {
      const taker: PendingTaker<T> = { resolve, timer: null };
      taker.timer = runtimeSetTimeout(() => {
        const index = this.takers.indexOf(taker);
        if (index >= 0) {
          this.takers.splice(index, 1);
        }
        taker.timer = null;
        resolve({ type: "timeout" });
      }, Math.max(0, timeoutMs));
      this.takers.push(taker);
    });
  }

  /** Drops buffered items and wakes every pending consumer with `closed`. */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.items.length = 0;
    for (const taker of this.takers.splice(0)) {
      this.settle(taker, { type: "closed" });
    }
  }

  private settle(taker: PendingTaker<T>, outcome: QueueTake<T>): void {
    if (taker.timer) {
      runtimeClearTimeout(taker.timer);
      taker.timer = null;
    }
    taker.resolve(outcome);
  }
}

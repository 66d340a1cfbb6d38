import { sleep as defaultSleep } from "../runtime/timers.js";

const DEFAULT_PERMITS = 128;
const DEFAULT_POLL_MS = 2;

/** Handle returned by {@link InFlightGate.acquire}; releasing twice is a no-op. */
export interface InFlightPermit {
  release(): void;
}

export interface InFlightGateOptions {
  permits?: number;
  /** Back-off between two attempts while every permit is taken. */
  pollMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Counting gate bounding the writes travelling to the bridged process. Waiters
 * poll instead of queueing, so admission order is not guaranteed.
 */
export class InFlightGate {
  readonly capacity: number;
  private readonly pollMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private inUse = 0;

  constructor(options: InFlightGateOptions = {}) {
    const permits = options.permits ?? DEFAULT_PERMITS;
    if (!Number.isFinite(permits) || permits < 1) {
      throw new Error("permits must be a finite number >= 1");
    }
    this.capacity = Math.trunc(permits);
    this.pollMs = Math.max(0, options.pollMs ?? DEFAULT_POLL_MS);
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Permits currently held. */
  get inFlight(): number {
    return this.inUse;
  }

  tryAcquire(): InFlightPermit | null {
    if (this.inUse >= this.capacity) {
      return null;
    }
    this.inUse += 1;
    let released = false;
    return {
      release: () => {
        if (released) {
          return;
        }
        released = true;
        this.inUse -= 1;
      },
    };
  }

  async acquire(): Promise<InFlightPermit> {
    for (;;) {
      const permit = this.tryAcquire();
      if (permit) {
        return permit;
      }
      await this.sleep(this.pollMs);
    }
  }

  /** Runs {@link task} while holding a permit. */
  async run<T>(task: () => Promise<T>): Promise<T> {
    const permit = await this.acquire();
    try {
      return await task();
    } finally {
      permit.release();
    }
  }
}

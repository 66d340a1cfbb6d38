/**
 * Timer helpers resolving `setTimeout`/`setInterval` from {@link globalThis} at
 * call time rather than capturing them on import. Sinon fake timers install
 * their overrides on the global object, so going through these helpers keeps
 * the registry sweeper, heartbeats and correlation expiry under the control of
 * the deterministic clock used by the tests.
 */

/** Handle returned by {@link runtimeSetTimeout}. */
export type TimeoutHandle = ReturnType<typeof globalThis.setTimeout>;

/** Handle returned by {@link runtimeSetInterval}. */
export type IntervalHandle = ReturnType<typeof globalThis.setInterval>;

export interface TimerOptions {
  /** When true the timer does not keep the event loop alive. */
  readonly unref?: boolean;
}

/** Schedule a timeout using the currently active timer implementation. */
export function runtimeSetTimeout(callback: () => void, delayMs: number, options: TimerOptions = {}): TimeoutHandle {
  const handle = globalThis.setTimeout(callback, delayMs);
  if (options.unref && typeof handle.unref === "function") {
    handle.unref();
  }
  return handle;
}

/** Cancel a timeout using the runtime-aware implementation. */
export function runtimeClearTimeout(handle: TimeoutHandle): void {
  globalThis.clearTimeout(handle);
}

/** Register a periodic interval using the runtime-aware implementation. */
export function runtimeSetInterval(callback: () => void, periodMs: number, options: TimerOptions = {}): IntervalHandle {
  const handle = globalThis.setInterval(callback, periodMs);
  if (options.unref && typeof handle.unref === "function") {
    handle.unref();
  }
  return handle;
}

/** Clear an interval using the runtime-aware implementation. */
export function runtimeClearInterval(handle: IntervalHandle): void {
  globalThis.clearInterval(handle);
}

/** Resolves after {@link delayMs} milliseconds. */
export function sleep(delayMs: number): Promise<void> {
  return new Promise((resolve) => {
    runtimeSetTimeout(resolve, Math.max(0, delayMs));
  });
}

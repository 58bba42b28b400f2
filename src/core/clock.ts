import { setTimeout as sleepTimer } from "node:timers/promises";

/**
 * Time source and blocking wait used by every poll loop.
 * Swap in `ManualClock` to run timing logic without real sleeps.
 */
export interface Clock {
  /** Milliseconds on a monotonic scale; only differences are meaningful. */
  now(): number;
  /** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("aborted");
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: async (ms, signal) => {
    try {
      await sleepTimer(ms, undefined, { signal });
    } catch (e) {
      // timers/promises rejects with a generic AbortError; surface the caller's reason instead.
      if (signal?.aborted) throw abortReason(signal);
      throw e;
    }
  },
};

/**
 * Simulated clock: `sleep` advances time instantly.
 * Tests can also move time forward from inside a fake remote call with `advance`.
 */
export class ManualClock implements Clock {
  private current: number;
  readonly sleeps: number[] = [];

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw abortReason(signal);
    this.sleeps.push(ms);
    this.current += ms;
  }
}

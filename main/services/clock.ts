import { setTimeout as delay } from "node:timers/promises";

/**
 * Time source for every component that waits or timestamps.
 * Tests swap in a fake so intervals and backoff run instantly.
 */
export interface Clock {
  now(): number;
  /** Resolves after `ms`, or early (without throwing) when the signal aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return;
    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) return;
      throw error;
    }
  },
};

import type { Clock } from "../clock";

/**
 * Deterministic clock: sleep advances virtual time immediately.
 * `onSleep` runs after each advance, so tests can abort a loop after N ticks.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  onSleep: ((now: number) => void) | null = null;

  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    this.sleeps.push(ms);
    if (ms > 0) this.current += ms;
    this.onSleep?.(this.current);
  }
}

/**
 * CaptureScheduler - activity-aware capture loop
 *
 * One tick per interval: sample the session, capture only while active,
 * persist one pending record per successful capture. The loop has a single
 * suspension point (the interval sleep) and ends when the signal aborts.
 */

import { ErrorCode, toErrorMessage } from "@shared/errors";
import type { CaptureRepository } from "../../database/capture-repository";
import type { Clock } from "../clock";
import { getLogger } from "../logger";
import type { CaptureStorage } from "./capture-storage";
import {
  CaptureError,
  type ScreenGrabber,
  type SessionState,
  type SkipReason,
  type TickOutcome,
} from "./types";

export const SKIP_LOG_THROTTLE_MS = 60_000;
const MIN_DELAY_MS = 100;

/** Calculate next delay with compensation for execution time */
export function calculateNextDelay(
  executionTime: number,
  interval: number,
  minDelay: number
): number {
  const compensatedDelay = interval - executionTime;
  return Math.max(compensatedDelay, minDelay);
}

export interface SessionStateSource {
  current(): Promise<SessionState>;
}

export interface CaptureSchedulerDeps {
  session: SessionStateSource;
  grabber: ScreenGrabber;
  storage: Pick<CaptureStorage, "save" | "discard">;
  repository: Pick<CaptureRepository, "insertPending">;
  clock: Clock;
}

export interface CaptureSchedulerOptions {
  host: string;
  intervalMs: number;
}

export interface CaptureSchedulerStats {
  ticks: number;
  captures: number;
  skipped: number;
  failures: number;
}

export class CaptureScheduler {
  private readonly logger = getLogger("capture-scheduler");
  private lastSkipReason: SkipReason | null = null;
  private lastSkipLogAt = Number.NEGATIVE_INFINITY;
  private readonly stats: CaptureSchedulerStats = { ticks: 0, captures: 0, skipped: 0, failures: 0 };

  constructor(
    private readonly deps: CaptureSchedulerDeps,
    private readonly options: CaptureSchedulerOptions
  ) {}

  getStats(): CaptureSchedulerStats {
    return { ...this.stats };
  }

  /**
   * Run until `signal` aborts. Persistence errors propagate and end the loop.
   */
  async run(signal: AbortSignal): Promise<void> {
    const { clock } = this.deps;
    this.logger.info(
      { intervalMs: this.options.intervalMs, host: this.options.host },
      "Capture loop started"
    );

    while (!signal.aborted) {
      const startedAt = clock.now();
      await this.tick();
      const delay = calculateNextDelay(clock.now() - startedAt, this.options.intervalMs, MIN_DELAY_MS);
      await clock.sleep(delay, signal);
    }

    this.logger.info({ ...this.stats }, "Capture loop stopped");
  }

  async tick(): Promise<TickOutcome> {
    this.stats.ticks++;
    const state = await this.deps.session.current();

    if (state !== "active") {
      this.stats.skipped++;
      this.logSkip(state);
      return { state, captureId: null };
    }

    this.lastSkipReason = null;
    return { state, captureId: await this.captureOnce() };
  }

  private async captureOnce(): Promise<number | null> {
    const { grabber, storage, repository, clock } = this.deps;
    const capturedAt = clock.now();

    const captured = await Promise.all([grabber.grab(), grabber.foregroundWindow()])
      .then(async ([image, window]) => ({
        image,
        window,
        stored: await storage.save(image.buffer, capturedAt, image.format),
      }))
      .catch((error: unknown) => {
        this.stats.failures++;
        const code = error instanceof CaptureError ? error.code : ErrorCode.CAPTURE_FAILED;
        this.logger.warn({ code, error: toErrorMessage(error) }, "Capture failed; no record written");
        return null;
      });

    if (!captured) return null;
    const { image, window, stored } = captured;

    let id: number;
    try {
      id = repository.insertPending({
        capturedAt,
        host: this.options.host,
        windowTitle: window.title,
        processName: window.processName,
        contentHash: stored.contentHash,
        filePath: stored.filePath,
        width: image.width,
        height: image.height,
        bytes: stored.bytes,
        mime: image.mime,
      });
    } catch (error) {
      await storage.discard(stored.filePath);
      throw error;
    }

    this.stats.captures++;
    this.logger.info(
      { captureId: id, filePath: stored.filePath, processName: window.processName },
      "Capture recorded"
    );
    return id;
  }

  private logSkip(reason: SkipReason): void {
    const now = this.deps.clock.now();
    const changed = reason !== this.lastSkipReason;
    if (!changed && now - this.lastSkipLogAt < SKIP_LOG_THROTTLE_MS) {
      return;
    }
    this.lastSkipReason = reason;
    this.lastSkipLogAt = now;
    this.logger.info({ reason }, "Capture skipped");
  }
}

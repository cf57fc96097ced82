import { getLogger } from "../logger";
import { toErrorMessage } from "@shared/errors";
import type { SessionProbe, SessionState } from "./types";

export interface SessionSample {
  /** `true`/`false`, or "error" when the lock probe failed */
  locked: boolean | "error";
  /** Milliseconds since last input, or null when the idle probe failed */
  idleMs: number | null;
}

/**
 * Map one probe sample to a session state.
 * A failed lock probe counts as locked; a failed idle probe counts as active.
 */
export function resolveSessionState(sample: SessionSample, idleThresholdMs: number): SessionState {
  if (sample.locked !== false) return "locked";
  if (sample.idleMs === null) return "active";
  return sample.idleMs < idleThresholdMs ? "active" : "idle";
}

export interface SessionMonitorOptions {
  idleThresholdMs: number;
  lockCheckEnabled: boolean;
}

export class SessionMonitor {
  private readonly logger = getLogger("session-monitor");

  constructor(
    private readonly probe: SessionProbe,
    private readonly options: SessionMonitorOptions
  ) {}

  async sample(): Promise<SessionSample> {
    let locked: SessionSample["locked"] = false;
    if (this.options.lockCheckEnabled) {
      try {
        locked = await this.probe.isLocked();
      } catch (error) {
        this.logger.warn({ error: toErrorMessage(error) }, "Lock probe failed; treating as locked");
        locked = "error";
      }
    }

    // No need to ask for idle time while locked
    if (locked !== false) {
      return { locked, idleMs: null };
    }

    let idleMs: number | null = null;
    try {
      idleMs = await this.probe.idleMs();
    } catch (error) {
      this.logger.warn({ error: toErrorMessage(error) }, "Idle probe failed; treating as active");
    }
    return { locked, idleMs };
  }

  async current(): Promise<SessionState> {
    return resolveSessionState(await this.sample(), this.options.idleThresholdMs);
  }
}

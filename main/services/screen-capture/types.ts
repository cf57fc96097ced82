import { ErrorCode, ServiceError } from "@shared/errors";
import type { ImageFormat } from "@shared/capture-types";

export type SessionState = "idle" | "active" | "locked";

/** Why a tick did not capture */
export type SkipReason = "idle" | "locked";

/**
 * OS-level session signals. Both probes may throw; the scheduler decides how
 * a failure maps to a state.
 */
export interface SessionProbe {
  isLocked(): Promise<boolean>;
  /** Milliseconds since the last keyboard or mouse input */
  idleMs(): Promise<number>;
}

export interface WindowContext {
  title: string | null;
  processName: string | null;
}

export interface CapturedImage {
  buffer: Buffer;
  format: ImageFormat;
  mime: string;
  width: number | null;
  height: number | null;
}

export interface ScreenGrabber {
  grab(): Promise<CapturedImage>;
  foregroundWindow(): Promise<WindowContext>;
}

export interface StoredCapture {
  filePath: string;
  contentHash: string;
  bytes: number;
}

export type CaptureErrorCode =
  | ErrorCode.CAPTURE_PERMISSION
  | ErrorCode.CAPTURE_ENCODING
  | ErrorCode.CAPTURE_FAILED;

export class CaptureError extends ServiceError {
  constructor(code: CaptureErrorCode, message: string, details?: unknown) {
    super(code, message, details);
    this.name = "CaptureError";
  }
}

export interface TickOutcome {
  state: SessionState;
  captureId: number | null;
}

export const MIME_BY_FORMAT: Record<ImageFormat, string> = {
  png: "image/png",
  jpeg: "image/jpeg",
  webp: "image/webp",
};

/**
 * Capture and analysis record shapes shared by the pipeline and by the
 * downstream reporting collaborators that read the merged timeline.
 */

export const CAPTURE_STATUS_VALUES = ["pending", "analyzing", "analyzed", "failed"] as const;
export type CaptureStatus = (typeof CAPTURE_STATUS_VALUES)[number];

export const STORAGE_STATE_VALUES = ["ephemeral", "archived", "deleted"] as const;
export type StorageState = (typeof STORAGE_STATE_VALUES)[number];

export const BACKEND_IDS = ["gemini", "local"] as const;
export type BackendId = (typeof BACKEND_IDS)[number];

export type ImageFormat = "png" | "jpeg" | "webp";

/**
 * Allowed status transitions. `failed -> pending` is only taken by the explicit
 * requeue action, never by the batch engine itself.
 */
export const CAPTURE_STATUS_TRANSITIONS: Record<CaptureStatus, readonly CaptureStatus[]> = {
  pending: ["analyzing"],
  analyzing: ["analyzed", "failed", "pending"],
  analyzed: [],
  failed: ["pending"],
};

export function canTransition(from: CaptureStatus, to: CaptureStatus): boolean {
  return CAPTURE_STATUS_TRANSITIONS[from].includes(to);
}

export interface ObservedEntities {
  files: string[];
  repositories: string[];
  urls: string[];
}

export const EMPTY_ENTITIES: ObservedEntities = { files: [], repositories: [], urls: [] };

export interface CaptureRecord {
  id: number;
  capturedAt: number;
  host: string;
  windowTitle: string | null;
  processName: string | null;
  contentHash: string;
  filePath: string;
  status: CaptureStatus;
  storageState: StorageState;
  archivedPath: string | null;
  width: number | null;
  height: number | null;
  bytes: number | null;
  mime: string | null;
}

export interface AnalysisRecord {
  captureId: number;
  backend: string;
  model: string | null;
  rawResponse: string | null;
  summary: string | null;
  primaryTask: string | null;
  tags: string[];
  confidence: number | null;
  entities: ObservedEntities;
  errorCode: string | null;
  errorMessage: string | null;
  retryCount: number;
  lastAttemptAt: number;
}

/** One row of the merged, time-ordered multi-shard view */
export interface TimelineEntry {
  shard: string;
  capture: CaptureRecord;
  analysis: AnalysisRecord | null;
}

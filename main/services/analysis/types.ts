import { ErrorCode, ServiceError } from "@shared/errors";
import type { BackendId } from "@shared/capture-types";

export interface AnalysisRequest {
  captureId: number;
  image: Buffer;
  mime: string;
  windowTitle: string | null;
  processName: string | null;
  capturedAt: number;
  /** Optional free-text context appended to the prompt */
  context?: string;
}

export interface BackendResponse {
  text: string;
  model: string;
}

/**
 * A vision-capable model endpoint. `analyze` rejects with a BackendError
 * and never retries on its own.
 */
export interface AnalysisBackend {
  readonly id: BackendId;
  /** Batch size used when neither configuration nor the command line sets one */
  readonly defaultBatchLimit: number | null;
  /** Model id that will be used; may query the server once */
  resolveModel(): Promise<string>;
  analyze(request: AnalysisRequest): Promise<BackendResponse>;
}

export type BackendErrorCode =
  | ErrorCode.API_KEY_MISSING
  | ErrorCode.BACKEND_AUTH
  | ErrorCode.BACKEND_QUOTA
  | ErrorCode.BACKEND_NETWORK
  | ErrorCode.BACKEND_CONNECTION_REFUSED
  | ErrorCode.BACKEND_UNSUPPORTED_INPUT
  | ErrorCode.BACKEND_REJECTED
  | ErrorCode.IMAGE_MISSING
  | ErrorCode.IMAGE_UNREADABLE;

export interface BackendErrorOptions {
  backend: BackendId;
  retryable: boolean;
  retryAfterMs?: number;
  statusCode?: number;
  cause?: unknown;
}

export class BackendError extends ServiceError {
  readonly backend: BackendId;
  readonly retryable: boolean;
  readonly retryAfterMs: number | null;
  readonly statusCode: number | null;

  constructor(code: BackendErrorCode, message: string, options: BackendErrorOptions) {
    super(code, message, options.cause);
    this.name = "BackendError";
    this.backend = options.backend;
    this.retryable = options.retryable;
    this.retryAfterMs = options.retryAfterMs ?? null;
    this.statusCode = options.statusCode ?? null;
  }
}

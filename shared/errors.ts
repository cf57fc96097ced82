export enum ErrorCode {
  // Configuration
  CONFIG_INVALID = "CONFIG_INVALID",
  API_KEY_MISSING = "API_KEY_MISSING",

  // Capture
  CAPTURE_PERMISSION = "CAPTURE_PERMISSION",
  CAPTURE_ENCODING = "CAPTURE_ENCODING",
  CAPTURE_FAILED = "CAPTURE_FAILED",

  // Backend (vision model) calls
  BACKEND_AUTH = "BACKEND_AUTH",
  BACKEND_QUOTA = "BACKEND_QUOTA",
  BACKEND_NETWORK = "BACKEND_NETWORK",
  BACKEND_CONNECTION_REFUSED = "BACKEND_CONNECTION_REFUSED",
  BACKEND_UNSUPPORTED_INPUT = "BACKEND_UNSUPPORTED_INPUT",
  BACKEND_REJECTED = "BACKEND_REJECTED",
  IMAGE_MISSING = "IMAGE_MISSING",
  IMAGE_UNREADABLE = "IMAGE_UNREADABLE",

  // Persistence
  STORE_UNAVAILABLE = "STORE_UNAVAILABLE",
  INVALID_TRANSITION = "INVALID_TRANSITION",
  ARCHIVE_COLLISION = "ARCHIVE_COLLISION",

  // General
  UNKNOWN = "UNKNOWN",
}

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.CONFIG_INVALID]: "Configuration is invalid, check the environment",
  [ErrorCode.API_KEY_MISSING]: "Please configure API Key",
  [ErrorCode.CAPTURE_PERMISSION]: "Screen capture permission denied",
  [ErrorCode.CAPTURE_ENCODING]: "Captured image could not be encoded",
  [ErrorCode.CAPTURE_FAILED]: "Screen capture failed",
  [ErrorCode.BACKEND_AUTH]: "Analysis backend rejected the credentials",
  [ErrorCode.BACKEND_QUOTA]: "Analysis backend quota exceeded, retry later",
  [ErrorCode.BACKEND_NETWORK]: "Analysis backend unreachable or failing",
  [ErrorCode.BACKEND_CONNECTION_REFUSED]: "Local analysis server refused the connection",
  [ErrorCode.BACKEND_UNSUPPORTED_INPUT]: "Model does not accept image input",
  [ErrorCode.BACKEND_REJECTED]: "Analysis backend rejected the request",
  [ErrorCode.IMAGE_MISSING]: "Capture image file is missing",
  [ErrorCode.IMAGE_UNREADABLE]: "Capture image file could not be read",
  [ErrorCode.STORE_UNAVAILABLE]: "Metadata store unavailable",
  [ErrorCode.INVALID_TRANSITION]: "Capture status transition not allowed",
  [ErrorCode.ARCHIVE_COLLISION]: "No free file name left in the archive directory",
  [ErrorCode.UNKNOWN]: "An unknown error occurred, please try again",
};

const ERROR_CODE_VALUES: ReadonlySet<string> = new Set(Object.values<string>(ErrorCode));

export function isErrorCode(code: string): code is ErrorCode {
  return ERROR_CODE_VALUES.has(code);
}

export function getErrorMessage(code: ErrorCode | string): string {
  return isErrorCode(code) ? ERROR_MESSAGES[code] : ERROR_MESSAGES[ErrorCode.UNKNOWN];
}

export class ServiceError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "ServiceError";
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

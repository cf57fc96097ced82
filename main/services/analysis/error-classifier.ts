/**
 * Maps transport and SDK failures to BackendError codes.
 *
 * 401/403            -> BACKEND_AUTH (fatal)
 * 429 / quota text   -> BACKEND_QUOTA (retryable, server wait hint when given)
 * 400/422 + image    -> BACKEND_UNSUPPORTED_INPUT (fatal)
 * other 4xx          -> BACKEND_REJECTED (fatal)
 * ECONNREFUSED       -> BACKEND_CONNECTION_REFUSED (retryable, smaller bound)
 * 5xx, timeout, rest -> BACKEND_NETWORK (retryable)
 */

import { APICallError, RetryError } from "ai";
import { ErrorCode, toErrorMessage } from "@shared/errors";
import type { BackendId } from "@shared/capture-types";
import { BackendError } from "./types";

/** Gemini answers a bad key with 400 INVALID_ARGUMENT and this reason */
const INVALID_API_KEY_PATTERN = /API_KEY_INVALID|api key not valid/i;
const QUOTA_PATTERN = /quota|rate[ _-]?limit|resource_exhausted|too many requests/i;
const UNSUPPORTED_INPUT_PATTERN =
  /image|vision|does not support|doesn't support|unsupported|multimodal|multi-modal/i;
const MAX_CAUSE_DEPTH = 8;

function headerValue(
  headers: Record<string, string> | undefined,
  name: string
): string | undefined {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

/**
 * Server wait hint in milliseconds, from `retry-after-ms`, `retry-after`
 * (seconds or HTTP date) or a Google `"retryDelay": "12s"` body field.
 */
export function parseRetryAfterMs(
  headers: Record<string, string> | undefined,
  body: string | undefined,
  now: number = Date.now()
): number | undefined {
  const retryAfterMs = headerValue(headers, "retry-after-ms");
  if (retryAfterMs !== undefined) {
    const value = Number(retryAfterMs);
    if (Number.isFinite(value) && value >= 0) return value;
  }

  const retryAfter = headerValue(headers, "retry-after");
  if (retryAfter !== undefined) {
    const seconds = Number(retryAfter);
    if (retryAfter.trim() !== "" && Number.isFinite(seconds) && seconds >= 0) {
      return seconds * 1000;
    }
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) {
      return Math.max(0, date - now);
    }
  }

  if (body) {
    const match = /"retryDelay"\s*:\s*"(\d+(?:\.\d+)?)s"/.exec(body);
    if (match) return Number(match[1]) * 1000;
  }

  return undefined;
}

function errorCodeOf(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "code" in value) {
    return typeof value.code === "string" ? value.code : undefined;
  }
  return undefined;
}

function causeOf(value: unknown): unknown {
  if (typeof value === "object" && value !== null && "cause" in value) {
    return value.cause;
  }
  return undefined;
}

function nestedErrorsOf(value: unknown): unknown[] {
  if (typeof value === "object" && value !== null && "errors" in value) {
    return Array.isArray(value.errors) ? value.errors : [];
  }
  return [];
}

/** True when any error in the cause chain is a refused TCP connection */
export function isConnectionRefused(error: unknown): boolean {
  const queue: unknown[] = [error];
  for (let depth = 0; queue.length > 0 && depth < MAX_CAUSE_DEPTH * 4; depth++) {
    const current = queue.shift();
    if (current === undefined || current === null) continue;
    if (errorCodeOf(current) === "ECONNREFUSED") return true;
    if (current instanceof Error && current.message.includes("ECONNREFUSED")) return true;
    queue.push(causeOf(current), ...nestedErrorsOf(current));
  }
  return false;
}

function isTimeout(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return (
    error.name === "TimeoutError" ||
    error.name === "AbortError" ||
    /timed? ?out/i.test(error.message)
  );
}

export function classifyBackendError(
  error: unknown,
  backend: BackendId,
  now: number = Date.now()
): BackendError {
  if (error instanceof BackendError) return error;

  // Unwrap the SDK's retry wrapper; SDK retries are off but be tolerant
  if (RetryError.isInstance(error)) {
    return classifyBackendError(error.lastError, backend, now);
  }

  const message = toErrorMessage(error);

  if (APICallError.isInstance(error) && error.statusCode !== undefined) {
    const status = error.statusCode;
    const body = error.responseBody ?? "";

    const invalidKey =
      status === 400 && (INVALID_API_KEY_PATTERN.test(message) || INVALID_API_KEY_PATTERN.test(body));
    if (status === 401 || status === 403 || invalidKey) {
      return new BackendError(ErrorCode.BACKEND_AUTH, `Authentication failed (${status}): ${message}`, {
        backend,
        retryable: false,
        statusCode: status,
        cause: error,
      });
    }

    if (status === 429 || QUOTA_PATTERN.test(message) || QUOTA_PATTERN.test(body)) {
      return new BackendError(ErrorCode.BACKEND_QUOTA, `Quota or rate limit (${status}): ${message}`, {
        backend,
        retryable: true,
        retryAfterMs: parseRetryAfterMs(error.responseHeaders, error.responseBody, now),
        statusCode: status,
        cause: error,
      });
    }

    if (status >= 500) {
      return new BackendError(ErrorCode.BACKEND_NETWORK, `Server error (${status}): ${message}`, {
        backend,
        retryable: true,
        retryAfterMs: parseRetryAfterMs(error.responseHeaders, error.responseBody, now),
        statusCode: status,
        cause: error,
      });
    }

    if (
      (status === 400 || status === 422) &&
      (UNSUPPORTED_INPUT_PATTERN.test(message) || UNSUPPORTED_INPUT_PATTERN.test(body))
    ) {
      return new BackendError(
        ErrorCode.BACKEND_UNSUPPORTED_INPUT,
        `Model rejected image input (${status}): ${message}`,
        { backend, retryable: false, statusCode: status, cause: error }
      );
    }

    return new BackendError(ErrorCode.BACKEND_REJECTED, `Request rejected (${status}): ${message}`, {
      backend,
      retryable: false,
      statusCode: status,
      cause: error,
    });
  }

  if (isConnectionRefused(error)) {
    return new BackendError(ErrorCode.BACKEND_CONNECTION_REFUSED, `Connection refused: ${message}`, {
      backend,
      retryable: true,
      cause: error,
    });
  }

  if (QUOTA_PATTERN.test(message)) {
    return new BackendError(ErrorCode.BACKEND_QUOTA, `Quota or rate limit: ${message}`, {
      backend,
      retryable: true,
      cause: error,
    });
  }

  const prefix = isTimeout(error) ? "Request timed out" : "Backend call failed";
  return new BackendError(ErrorCode.BACKEND_NETWORK, `${prefix}: ${message}`, {
    backend,
    retryable: true,
    cause: error,
  });
}

import { describe, it, expect } from "vitest";
import { APICallError, RetryError } from "ai";
import { ErrorCode } from "@shared/errors";
import { classifyBackendError, isConnectionRefused, parseRetryAfterMs } from "./error-classifier";
import { BackendError } from "./types";

const NOW = Date.UTC(2025, 2, 14, 12, 0, 0);

function apiError(
  statusCode: number,
  message: string,
  extra: { responseHeaders?: Record<string, string>; responseBody?: string } = {}
): APICallError {
  return new APICallError({
    message,
    url: "http://localhost:1234/v1/chat/completions",
    requestBodyValues: {},
    statusCode,
    ...extra,
  });
}

describe("parseRetryAfterMs", () => {
  it("prefers retry-after-ms", () => {
    expect(parseRetryAfterMs({ "retry-after-ms": "1500", "retry-after": "9" }, undefined, NOW)).toBe(
      1500
    );
  });

  it("reads retry-after seconds case-insensitively", () => {
    expect(parseRetryAfterMs({ "Retry-After": "10" }, undefined, NOW)).toBe(10_000);
  });

  it("reads retry-after as an HTTP date", () => {
    const at = new Date(NOW + 30_000).toUTCString();
    expect(parseRetryAfterMs({ "retry-after": at }, undefined, NOW)).toBe(30_000);
  });

  it("falls back to the retryDelay body field", () => {
    const body = '{"error":{"details":[{"@type":"RetryInfo","retryDelay": "7s"}]}}';
    expect(parseRetryAfterMs({}, body, NOW)).toBe(7000);
  });

  it("returns undefined without a hint", () => {
    expect(parseRetryAfterMs(undefined, "{}", NOW)).toBeUndefined();
  });
});

describe("classifyBackendError", () => {
  it("treats 401 and 403 as fatal auth errors", () => {
    for (const status of [401, 403]) {
      const result = classifyBackendError(apiError(status, "API key not valid"), "gemini", NOW);
      expect(result.code).toBe(ErrorCode.BACKEND_AUTH);
      expect(result.retryable).toBe(false);
      expect(result.statusCode).toBe(status);
    }
  });

  it("treats a 400 carrying API_KEY_INVALID as a fatal auth error", () => {
    const body =
      '{"error":{"code":400,"message":"API key not valid. Please pass a valid API key.","status":"INVALID_ARGUMENT","details":[{"reason":"API_KEY_INVALID"}]}}';
    const result = classifyBackendError(apiError(400, "Bad Request", { responseBody: body }), "gemini", NOW);

    expect(result.code).toBe(ErrorCode.BACKEND_AUTH);
    expect(result.retryable).toBe(false);
    expect(result.statusCode).toBe(400);
  });

  it("treats 429 as retryable quota with the server hint", () => {
    const result = classifyBackendError(
      apiError(429, "Resource has been exhausted", { responseHeaders: { "retry-after": "10" } }),
      "gemini",
      NOW
    );

    expect(result.code).toBe(ErrorCode.BACKEND_QUOTA);
    expect(result.retryable).toBe(true);
    expect(result.retryAfterMs).toBe(10_000);
  });

  it("recognises quota text on a non-429 status", () => {
    const result = classifyBackendError(
      apiError(400, "RESOURCE_EXHAUSTED: quota exceeded for this model"),
      "gemini",
      NOW
    );
    expect(result.code).toBe(ErrorCode.BACKEND_QUOTA);
  });

  it("maps image rejections to a fatal unsupported-input error", () => {
    const result = classifyBackendError(
      apiError(400, "Bad Request", { responseBody: '{"error":"Model does not support images"}' }),
      "local",
      NOW
    );

    expect(result.code).toBe(ErrorCode.BACKEND_UNSUPPORTED_INPUT);
    expect(result.retryable).toBe(false);
    expect(result.backend).toBe("local");
  });

  it("maps other 4xx to a fatal rejection", () => {
    const result = classifyBackendError(apiError(404, "model not found"), "local", NOW);
    expect(result.code).toBe(ErrorCode.BACKEND_REJECTED);
    expect(result.retryable).toBe(false);
  });

  it("maps 5xx to a retryable network error", () => {
    const result = classifyBackendError(apiError(503, "Service Unavailable"), "gemini", NOW);
    expect(result.code).toBe(ErrorCode.BACKEND_NETWORK);
    expect(result.retryable).toBe(true);
  });

  it("finds ECONNREFUSED deep in the cause chain", () => {
    const socketError = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:1234"), {
      code: "ECONNREFUSED",
    });
    const fetchError = new TypeError("fetch failed", { cause: new AggregateError([socketError]) });

    expect(isConnectionRefused(fetchError)).toBe(true);
    const result = classifyBackendError(fetchError, "local", NOW);
    expect(result.code).toBe(ErrorCode.BACKEND_CONNECTION_REFUSED);
    expect(result.retryable).toBe(true);
  });

  it("treats timeouts as retryable network errors", () => {
    const timeout = Object.assign(new Error("The operation was aborted due to timeout"), {
      name: "TimeoutError",
    });
    const result = classifyBackendError(timeout, "gemini", NOW);

    expect(result.code).toBe(ErrorCode.BACKEND_NETWORK);
    expect(result.message).toBe("Request timed out: The operation was aborted due to timeout");
  });

  it("unwraps the SDK retry wrapper", () => {
    const wrapped = new RetryError({
      message: "Failed after 1 attempts",
      reason: "errorNotRetryable",
      errors: [apiError(401, "denied")],
    });
    expect(classifyBackendError(wrapped, "gemini", NOW).code).toBe(ErrorCode.BACKEND_AUTH);
  });

  it("passes BackendErrors through unchanged", () => {
    const original = new BackendError(ErrorCode.IMAGE_MISSING, "gone", {
      backend: "gemini",
      retryable: false,
    });
    expect(classifyBackendError(original, "gemini", NOW)).toBe(original);
  });
});

import { describe, it, expect, vi, beforeEach } from "vitest";
import { APICallError } from "ai";
import { ErrorCode, ServiceError } from "@shared/errors";
import { GeminiBackend } from "./remote-backend";
import { LocalLLMBackend } from "./local-backend";
import { BackendError, type AnalysisRequest } from "./types";
import type { GenerationSettings } from "./vision-backend";

const mockGenerateText = vi.hoisted(() => vi.fn());

vi.mock("ai", async (importOriginal) => {
  const actual = await importOriginal<typeof import("ai")>();
  return { ...actual, generateText: mockGenerateText };
});

vi.mock("../logger", () => ({
  getLogger: vi.fn(() => ({ info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn() })),
}));

const SETTINGS: GenerationSettings = {
  maxTokens: 512,
  temperature: 0.2,
  timeoutMs: 30_000,
  language: "English",
};

const REQUEST: AnalysisRequest = {
  captureId: 7,
  image: Buffer.from("fake-png"),
  mime: "image/png",
  windowTitle: "Issue tracker",
  processName: "firefox",
  capturedAt: Date.UTC(2025, 2, 14, 12, 0, 0),
};

function modelList(ids: string[]): Response {
  return new Response(JSON.stringify({ object: "list", data: ids.map((id) => ({ id })) }), {
    status: 200,
    headers: { "content-type": "application/json" },
  });
}

describe("GeminiBackend", () => {
  beforeEach(() => {
    mockGenerateText.mockReset();
  });

  it("requires an API key at construction", () => {
    let caught: unknown;
    try {
      new GeminiBackend({ apiKey: null, model: "gemini-2.0-flash" }, SETTINGS);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ServiceError);
    expect(caught instanceof ServiceError ? caught.code : null).toBe(ErrorCode.API_KEY_MISSING);
  });

  it("sends the screenshot with SDK retries disabled", async () => {
    mockGenerateText.mockResolvedValue({ text: '{"description":"Triaging issues"}' });
    const backend = new GeminiBackend({ apiKey: "test-secret", model: "gemini-2.0-flash" }, SETTINGS);

    const response = await backend.analyze(REQUEST);

    expect(response).toEqual({ text: '{"description":"Triaging issues"}', model: "gemini-2.0-flash" });
    expect(backend.defaultBatchLimit).toBe(20);
    const call = mockGenerateText.mock.calls[0][0];
    expect(call.maxRetries).toBe(0);
    expect(call.maxOutputTokens).toBe(512);
    expect(call.temperature).toBe(0.2);
    expect(call.system).toContain("All values must be written in English.");
    expect(call.messages[0].content[1]).toEqual({
      type: "image",
      image: REQUEST.image,
      mediaType: "image/png",
    });
  });

  it("classifies a 429 into a retryable quota error", async () => {
    mockGenerateText.mockRejectedValue(
      new APICallError({
        message: "Resource has been exhausted",
        url: "https://generativelanguage.googleapis.com",
        requestBodyValues: {},
        statusCode: 429,
        responseHeaders: { "retry-after": "10" },
      })
    );
    const backend = new GeminiBackend({ apiKey: "test-secret", model: "gemini-2.0-flash" }, SETTINGS);

    const error = await backend.analyze(REQUEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendError);
    if (error instanceof BackendError) {
      expect(error.code).toBe(ErrorCode.BACKEND_QUOTA);
      expect(error.retryAfterMs).toBe(10_000);
      expect(error.backend).toBe("gemini");
    }
  });
});

describe("LocalLLMBackend", () => {
  beforeEach(() => {
    mockGenerateText.mockReset();
    mockGenerateText.mockResolvedValue({ text: "{}" });
  });

  it("resolves the auto model once from the server's model list", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => modelList(["qwen2-vl-7b", "llava"]));
    const backend = new LocalLLMBackend(
      { baseURL: "http://localhost:1234/v1", apiKey: null, model: "auto" },
      SETTINGS,
      fetchFn
    );

    const first = await backend.analyze(REQUEST);
    const second = await backend.analyze(REQUEST);

    expect(first.model).toBe("qwen2-vl-7b");
    expect(second.model).toBe("qwen2-vl-7b");
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toBe("http://localhost:1234/v1/models");
    expect(backend.defaultBatchLimit).toBeNull();
  });

  it("uses an explicit model without asking the server", async () => {
    const fetchFn = vi.fn<typeof fetch>();
    const backend = new LocalLLMBackend(
      { baseURL: "http://localhost:1234/v1", apiKey: null, model: "llava-1.6" },
      SETTINGS,
      fetchFn
    );

    await expect(backend.resolveModel()).resolves.toBe("llava-1.6");
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("reports a refused connection during model resolution", async () => {
    const refused = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:1234"), {
      code: "ECONNREFUSED",
    });
    const fetchFn = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed", { cause: refused });
    });
    const backend = new LocalLLMBackend(
      { baseURL: "http://localhost:1234/v1", apiKey: null, model: "auto" },
      SETTINGS,
      fetchFn
    );

    const error = await backend.analyze(REQUEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendError);
    if (error instanceof BackendError) {
      expect(error.code).toBe(ErrorCode.BACKEND_CONNECTION_REFUSED);
      expect(error.retryable).toBe(true);
    }
    expect(mockGenerateText).not.toHaveBeenCalled();
  });

  it("fails fatally when the server has no model loaded", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () => modelList([]));
    const backend = new LocalLLMBackend(
      { baseURL: "http://localhost:1234/v1", apiKey: null, model: "auto" },
      SETTINGS,
      fetchFn
    );

    await expect(backend.resolveModel()).rejects.toMatchObject({
      code: ErrorCode.BACKEND_REJECTED,
      retryable: false,
    });
  });

  it("treats a text-only model's image rejection as unsupported input", async () => {
    mockGenerateText.mockRejectedValue(
      new APICallError({
        message: "Bad Request",
        url: "http://localhost:1234/v1/chat/completions",
        requestBodyValues: {},
        statusCode: 400,
        responseBody: '{"error":"Model does not support images. Please use a model that does."}',
      })
    );
    const backend = new LocalLLMBackend(
      { baseURL: "http://localhost:1234/v1", apiKey: null, model: "text-only-7b" },
      SETTINGS,
      vi.fn<typeof fetch>()
    );

    await expect(backend.analyze(REQUEST)).rejects.toMatchObject({
      code: ErrorCode.BACKEND_UNSUPPORTED_INPUT,
      retryable: false,
    });
  });
});

import { describe, it, expect, vi, afterEach } from "vitest";
import { ErrorCode, ServiceError } from "@shared/errors";

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
  debug: vi.fn(),
}));

vi.mock("../services/logger", () => ({
  getLogger: vi.fn(() => mockLogger),
  initializeLogger: vi.fn(() => mockLogger),
}));

import { dayRange, parsePositiveInt, runCli } from "./startup";

describe("parsePositiveInt", () => {
  it("passes through an absent flag", () => {
    expect(parsePositiveInt(undefined, "--limit")).toBeUndefined();
  });

  it("parses positive integers", () => {
    expect(parsePositiveInt("25", "--limit")).toBe(25);
  });

  it.each(["0", "-3", "2.5", "ten"])("rejects %s", (raw) => {
    expect(() => parsePositiveInt(raw, "--limit")).toThrow(ServiceError);
  });
});

describe("dayRange", () => {
  it("covers one local day for an explicit date", () => {
    expect(dayRange("2025-03-14")).toEqual({
      from: Date.UTC(2025, 2, 14),
      to: Date.UTC(2025, 2, 15),
    });
  });

  it("defaults to the day containing now", () => {
    expect(dayRange(undefined, new Date(Date.UTC(2025, 2, 14, 18, 30)))).toEqual({
      from: Date.UTC(2025, 2, 14),
      to: Date.UTC(2025, 2, 15),
    });
  });

  it("rejects malformed dates", () => {
    expect(() => dayRange("14/03/2025")).toThrow(ServiceError);
  });
});

describe("runCli", () => {
  afterEach(() => {
    process.exitCode = undefined;
    vi.clearAllMocks();
  });

  it("leaves the exit code alone on success", async () => {
    await runCli("test", async () => {});

    expect(process.exitCode).toBeUndefined();
    expect(mockLogger.fatal).not.toHaveBeenCalled();
  });

  it("logs the error code and exits non-zero on failure", async () => {
    await runCli("test", async () => {
      throw new ServiceError(ErrorCode.STORE_UNAVAILABLE, "cannot open store");
    });

    expect(process.exitCode).toBe(1);
    expect(mockLogger.fatal).toHaveBeenCalledWith(
      {
        code: ErrorCode.STORE_UNAVAILABLE,
        hint: "Metadata store unavailable",
        error: "cannot open store",
      },
      "Command failed"
    );
  });
});

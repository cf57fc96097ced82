import { describe, it, expect } from "vitest";
import { loadConfig, resolveRootTemplate } from "./index";
import { ErrorCode, ServiceError } from "@shared/errors";

const CWD = "/srv/mirulog";

describe("loadConfig", () => {
  it("applies defaults and substitutes the host into root templates", () => {
    const config = loadConfig(
      {
        MIRULOG_HOST: "desk-01",
        CAPTURE_ROOT: "captures/{host}",
        ARCHIVE_ROOT: "shards/{host}",
      },
      {},
      CWD
    );

    expect(config.host).toBe("desk-01");
    expect(config.capture.captureRoot).toBe("/srv/mirulog/captures/desk-01");
    expect(config.storage.archiveRoot).toBe("/srv/mirulog/shards/desk-01");
    expect(config.storage.storePath).toBe("/srv/mirulog/shards/desk-01/mirulog.db");
    expect(config.storage.aggregateRoot).toBe("/srv/mirulog/shards");
    expect(config.capture.intervalMs).toBe(60_000);
    expect(config.capture.idleThresholdMs).toBe(300_000);
    expect(config.capture.lockCheckEnabled).toBe(true);
    expect(config.analyzer.backend).toBe("gemini");
    expect(config.analyzer.gemini.apiKey).toBeNull();
    expect(config.analyzer.local.baseURL).toBe("http://localhost:1234/v1");
    expect(config.analyzer.retry).toEqual({
      maxRetries: 5,
      connectionRefusedMaxRetries: 2,
      bufferMs: 500,
      requestSpacingMs: 0,
      backoffBaseMs: 2000,
      backoffMaxMs: 60_000,
    });
    expect(config.analyzer.batchLimit).toBeNull();
    expect(config.analyzer.staleAnalyzingMs).toBe(1_800_000);
    expect(config.logging).toEqual({ directory: "/srv/mirulog/logs", level: "info" });
  });

  it("coerces numeric and boolean variables", () => {
    const config = loadConfig(
      {
        MIRULOG_HOST: "desk-01",
        CAPTURE_INTERVAL_SECONDS: "15",
        LOCK_CHECK_ENABLED: "no",
        DELETE_CAPTURE_AFTER_ANALYSIS: "false",
        ARCHIVE_PARTITION_BY_HOST: "1",
        ANALYZER_BATCH_LIMIT: "7",
        LOCAL_LLM_BASE_URL: "http://127.0.0.1:8080/v1/",
        LOG_LEVEL: "DEBUG",
      },
      {},
      CWD
    );

    expect(config.capture.intervalMs).toBe(15_000);
    expect(config.capture.lockCheckEnabled).toBe(false);
    expect(config.storage.deleteAfterAnalysis).toBe(false);
    expect(config.storage.partitionArchiveByHost).toBe(true);
    expect(config.analyzer.batchLimit).toBe(7);
    expect(config.analyzer.local.baseURL).toBe("http://127.0.0.1:8080/v1");
    expect(config.logging.level).toBe("debug");
  });

  it("lets command-line overrides win over the environment", () => {
    const config = loadConfig(
      { MIRULOG_HOST: "desk-01", CAPTURE_ROOT: "a", ANALYZER_BACKEND: "gemini" },
      { captureRoot: "/tmp/{host}/in", archiveRoot: "/tmp/out", backend: "local" },
      CWD
    );

    expect(config.capture.captureRoot).toBe("/tmp/desk-01/in");
    expect(config.storage.archiveRoot).toBe("/tmp/out");
    expect(config.analyzer.backend).toBe("local");
  });

  it("treats a blank API key as absent", () => {
    const config = loadConfig({ GEMINI_API_KEY: "   " }, {}, CWD);
    expect(config.analyzer.gemini.apiKey).toBeNull();
  });

  it("returns a frozen value", () => {
    const config = loadConfig({ MIRULOG_HOST: "desk-01" }, {}, CWD);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.analyzer.retry)).toBe(true);
  });

  it("rejects invalid values with CONFIG_INVALID", () => {
    let caught: unknown;
    try {
      loadConfig({ ANALYZER_BACKEND: "openai", LOCK_CHECK_ENABLED: "maybe" }, {}, CWD);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ServiceError);
    if (caught instanceof ServiceError) {
      expect(caught.code).toBe(ErrorCode.CONFIG_INVALID);
      expect(caught.message).toContain("ANALYZER_BACKEND");
      expect(caught.message).toContain("LOCK_CHECK_ENABLED");
    }
  });
});

describe("resolveRootTemplate", () => {
  it("replaces every host placeholder", () => {
    expect(resolveRootTemplate("{host}/x/{host}", "h", "/base")).toBe("/base/h/x/h");
  });
});

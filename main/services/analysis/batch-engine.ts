/**
 * AnalysisBatchEngine - analyze pending captures one at a time
 *
 * Bounded mode runs one pass over up to `limit` pending records. Drain mode
 * repeats passes until a pass finds nothing pending at its start.
 */

import fs from "node:fs/promises";
import { ErrorCode, toErrorMessage } from "@shared/errors";
import type { CaptureRecord } from "@shared/capture-types";
import type { CaptureRepository } from "../../database/capture-repository";
import type { Clock } from "../clock";
import { getLogger } from "../logger";
import type { ImageLifecycleManager } from "./image-lifecycle";
import type { RateRetryController } from "./rate-retry-controller";
import { parseAnalysisResponse } from "./response-parser";
import { BackendError, type AnalysisBackend, type BackendResponse } from "./types";

export type EngineRepository = Pick<
  CaptureRepository,
  | "listPending"
  | "countPending"
  | "claim"
  | "completeAnalysis"
  | "failAnalysis"
  | "releaseClaim"
  | "listUnsettledAnalyzed"
  | "recoverStaleAnalyzing"
>;

export interface AnalysisBatchEngineDeps {
  repository: EngineRepository;
  backend: AnalysisBackend;
  controller: Pick<RateRetryController, "execute">;
  lifecycle: Pick<ImageLifecycleManager, "apply">;
  clock: Clock;
}

export interface AnalysisBatchEngineOptions {
  /** Configured batch size; null falls back to the backend default */
  batchLimit: number | null;
  staleAnalyzingMs: number;
}

export interface RunOptions {
  /** Command-line limit, takes precedence over configuration */
  limit?: number | null;
  untilEmpty?: boolean;
  signal?: AbortSignal;
}

/** "aborted": the signal fired before an outcome; the claim was released */
export type RecordOutcome = "analyzed" | "failed" | "skipped" | "aborted";

export interface BatchSummary {
  passes: number;
  processed: number;
  analyzed: number;
  failed: number;
  recovered: number;
  settled: number;
  lifecycleErrors: number;
}

function errnoCode(error: unknown): unknown {
  return error instanceof Error && "code" in error ? error.code : undefined;
}

export class AnalysisBatchEngine {
  private readonly logger = getLogger("analysis-batch-engine");

  constructor(
    private readonly deps: AnalysisBatchEngineDeps,
    private readonly options: AnalysisBatchEngineOptions
  ) {}

  /** `--limit`, then configuration, then the backend default (null = unbounded) */
  resolveLimit(cliLimit?: number | null): number | null {
    return cliLimit ?? this.options.batchLimit ?? this.deps.backend.defaultBatchLimit;
  }

  async run(options: RunOptions = {}): Promise<BatchSummary> {
    const { repository, backend } = this.deps;
    const limit = this.resolveLimit(options.limit);
    const summary: BatchSummary = {
      passes: 0,
      processed: 0,
      analyzed: 0,
      failed: 0,
      recovered: repository.recoverStaleAnalyzing(this.options.staleAnalyzingMs),
      settled: 0,
      lifecycleErrors: 0,
    };

    for (const record of repository.listUnsettledAnalyzed()) {
      if (await this.settle(record)) summary.settled++;
      else summary.lifecycleErrors++;
    }

    this.logger.info(
      { backend: backend.id, limit, untilEmpty: options.untilEmpty ?? false },
      "Analysis run started"
    );

    while (!options.signal?.aborted) {
      const pendingAtStart = repository.countPending();
      if (pendingAtStart === 0) break;

      summary.passes++;
      const pass = await this.runPass(limit, summary, options.signal);

      if (!options.untilEmpty || options.signal?.aborted) break;
      if (pass === 0) {
        this.logger.warn(
          { pending: pendingAtStart },
          "Drain pass processed nothing while records are pending; stopping"
        );
        break;
      }
    }

    this.logger.info({ ...summary, backend: backend.id }, "Analysis run finished");
    return summary;
  }

  /**
   * Process one record end to end. Returns "skipped" when another engine
   * claimed it first.
   */
  async processRecord(record: CaptureRecord, signal?: AbortSignal): Promise<RecordOutcome> {
    const { repository, backend, controller, clock } = this.deps;

    if (!repository.claim(record.id)) {
      this.logger.debug({ captureId: record.id }, "Capture already claimed, skipping");
      return "skipped";
    }

    const context = { captureId: record.id, backend: backend.id };
    const image = await this.readImage(record);
    const result =
      image instanceof BackendError
        ? { ok: false as const, aborted: false as const, error: image, attempts: 1, retries: 0 }
        : await controller.execute<BackendResponse>(
            () =>
              backend.analyze({
                captureId: record.id,
                image,
                mime: record.mime ?? "image/png",
                windowTitle: record.windowTitle,
                processName: record.processName,
                capturedAt: record.capturedAt,
              }),
            context,
            signal
          );

    if (!result.ok) {
      if (result.aborted) {
        repository.releaseClaim(record.id);
        this.logger.info(
          { ...context, attempts: result.attempts, code: result.error?.code ?? null },
          "Capture analysis interrupted; returned to pending"
        );
        return "aborted";
      }

      repository.failAnalysis(record.id, {
        backend: backend.id,
        model: null,
        errorCode: result.error.code,
        errorMessage: result.error.message,
        retryCount: result.retries,
        lastAttemptAt: clock.now(),
      });
      this.logger.warn(
        { ...context, attempts: result.attempts, code: result.error.code },
        "Capture analysis failed"
      );
      return "failed";
    }

    const parsed = parseAnalysisResponse(result.value.text);
    if (!parsed.structured) {
      this.logger.warn({ ...context }, "Model output was not JSON; storing raw text as summary");
    }

    repository.completeAnalysis(record.id, {
      backend: backend.id,
      model: result.value.model,
      rawResponse: result.value.text,
      summary: parsed.summary,
      primaryTask: parsed.primaryTask,
      tags: parsed.tags,
      confidence: parsed.confidence,
      entities: parsed.entities,
      retryCount: result.retries,
      lastAttemptAt: clock.now(),
    });
    this.logger.info(
      { ...context, model: result.value.model, retries: result.retries },
      "Capture analyzed"
    );

    await this.settle({ ...record, status: "analyzed" });
    return "analyzed";
  }

  private async runPass(
    limit: number | null,
    summary: BatchSummary,
    signal?: AbortSignal
  ): Promise<number> {
    const records = this.deps.repository.listPending(limit);
    let processed = 0;

    for (const record of records) {
      if (signal?.aborted) break;
      const outcome = await this.processRecord(record, signal);
      if (outcome === "aborted") break;
      if (outcome === "skipped") continue;
      processed++;
      if (outcome === "analyzed") summary.analyzed++;
      else summary.failed++;
    }

    summary.processed += processed;
    return processed;
  }

  private async readImage(record: CaptureRecord): Promise<Buffer | BackendError> {
    try {
      return await fs.readFile(record.filePath);
    } catch (error) {
      const options = { backend: this.deps.backend.id, retryable: false, cause: error };
      if (errnoCode(error) === "ENOENT") {
        return new BackendError(ErrorCode.IMAGE_MISSING, `Image not found: ${record.filePath}`, options);
      }
      return new BackendError(
        ErrorCode.IMAGE_UNREADABLE,
        `Image not readable: ${record.filePath}: ${toErrorMessage(error)}`,
        options
      );
    }
  }

  /** Lifecycle failures are logged; the record stays analyzed and is retried next run */
  private async settle(record: CaptureRecord): Promise<boolean> {
    try {
      await this.deps.lifecycle.apply(record);
      return true;
    } catch (error) {
      this.logger.error(
        { captureId: record.id, filePath: record.filePath, error: toErrorMessage(error) },
        "Image lifecycle action failed"
      );
      return false;
    }
  }
}

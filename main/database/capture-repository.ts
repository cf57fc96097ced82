import { and, asc, count, eq, gte, inArray, lt, type SQL } from "drizzle-orm";
import { getLogger } from "../services/logger";
import { ErrorCode, ServiceError } from "@shared/errors";
import {
  canTransition,
  EMPTY_ENTITIES,
  type AnalysisRecord,
  type CaptureRecord,
  type CaptureStatus,
  type ObservedEntities,
  type StorageState,
} from "@shared/capture-types";
import {
  analysisResults,
  captures,
  type AnalysisResultRow,
  type CaptureRow,
  type DrizzleDB,
  type ShardStore,
} from "./index";

export interface NewCapture {
  capturedAt: number;
  host: string;
  windowTitle: string | null;
  processName: string | null;
  contentHash: string;
  filePath: string;
  width?: number | null;
  height?: number | null;
  bytes?: number | null;
  mime?: string | null;
}

export interface AnalysisSuccess {
  backend: string;
  model: string | null;
  rawResponse: string;
  summary: string | null;
  primaryTask: string | null;
  tags: string[];
  confidence: number | null;
  entities: ObservedEntities;
  retryCount: number;
  lastAttemptAt: number;
}

export interface AnalysisFailure {
  backend: string;
  model: string | null;
  errorCode: string;
  errorMessage: string;
  retryCount: number;
  lastAttemptAt: number;
  rawResponse?: string | null;
}

export interface TimeRange {
  /** Inclusive lower bound, epoch ms */
  from?: number;
  /** Exclusive upper bound, epoch ms */
  to?: number;
}

export interface TimelineRow {
  capture: CaptureRecord;
  analysis: AnalysisRecord | null;
}

export type StatusCounts = Record<CaptureStatus, number>;

/**
 * Capture and analysis-result persistence for one shard.
 *
 * Status writes are conditional on the expected current status, so the
 * repository itself enforces the pending -> analyzing -> analyzed|failed order.
 */
export class CaptureRepository {
  private readonly logger = getLogger("capture-repository");
  private readonly db: DrizzleDB;

  constructor(
    store: ShardStore,
    private readonly now: () => number = Date.now
  ) {
    this.db = store.db;
  }

  insertPending(input: NewCapture): number {
    const ts = this.now();
    const result = this.db
      .insert(captures)
      .values({
        capturedAt: input.capturedAt,
        host: input.host,
        windowTitle: input.windowTitle,
        processName: input.processName,
        contentHash: input.contentHash,
        filePath: input.filePath,
        width: input.width ?? null,
        height: input.height ?? null,
        bytes: input.bytes ?? null,
        mime: input.mime ?? null,
        status: "pending",
        storageState: "ephemeral",
        createdAt: ts,
        updatedAt: ts,
      })
      .run();

    return Number(result.lastInsertRowid);
  }

  getById(id: number): CaptureRecord | null {
    const row = this.db.select().from(captures).where(eq(captures.id, id)).get();
    return row ? toCaptureRecord(row) : null;
  }

  getAnalysis(captureId: number): AnalysisRecord | null {
    const row = this.db
      .select()
      .from(analysisResults)
      .where(eq(analysisResults.captureId, captureId))
      .get();
    return row ? toAnalysisRecord(row) : null;
  }

  /**
   * Pending captures, oldest first. `null` means no limit.
   */
  listPending(limit: number | null): CaptureRecord[] {
    const query = this.db
      .select()
      .from(captures)
      .where(eq(captures.status, "pending"))
      .orderBy(asc(captures.capturedAt), asc(captures.id));

    const rows = limit === null ? query.all() : query.limit(limit).all();
    return rows.map(toCaptureRecord);
  }

  countByStatus(): StatusCounts {
    const counts: StatusCounts = { pending: 0, analyzing: 0, analyzed: 0, failed: 0 };
    const rows = this.db
      .select({ status: captures.status, total: count() })
      .from(captures)
      .groupBy(captures.status)
      .all();

    for (const row of rows) {
      counts[row.status] = row.total;
    }
    return counts;
  }

  countPending(): number {
    const row = this.db
      .select({ total: count() })
      .from(captures)
      .where(eq(captures.status, "pending"))
      .get();
    return row?.total ?? 0;
  }

  /**
   * Atomically move a capture from pending to analyzing.
   * Returns false when the row is no longer pending (another engine owns it).
   */
  claim(id: number): boolean {
    const result = this.db
      .update(captures)
      .set({ status: "analyzing", updatedAt: this.now() })
      .where(and(eq(captures.id, id), eq(captures.status, "pending")))
      .run();
    return result.changes === 1;
  }

  /**
   * Give up a claim without recording an outcome: analyzing back to pending.
   */
  releaseClaim(id: number): void {
    this.transition(this.db, id, "analyzing", "pending", this.now());
    this.logger.debug({ captureId: id }, "Released capture claim");
  }

  completeAnalysis(id: number, outcome: AnalysisSuccess): void {
    const ts = this.now();
    this.db.transaction((tx) => {
      this.transition(tx, id, "analyzing", "analyzed", ts);
      this.upsertResult(tx, id, ts, {
        backend: outcome.backend,
        model: outcome.model,
        rawResponse: outcome.rawResponse,
        summary: outcome.summary,
        primaryTask: outcome.primaryTask,
        tags: outcome.tags,
        confidence: outcome.confidence,
        entities: outcome.entities,
        errorCode: null,
        errorMessage: null,
        retryCount: outcome.retryCount,
        lastAttemptAt: outcome.lastAttemptAt,
      });
    });
  }

  failAnalysis(id: number, failure: AnalysisFailure): void {
    const ts = this.now();
    this.db.transaction((tx) => {
      this.transition(tx, id, "analyzing", "failed", ts);
      this.upsertResult(tx, id, ts, {
        backend: failure.backend,
        model: failure.model,
        rawResponse: failure.rawResponse ?? null,
        summary: null,
        primaryTask: null,
        tags: [],
        confidence: null,
        entities: EMPTY_ENTITIES,
        errorCode: failure.errorCode,
        errorMessage: failure.errorMessage,
        retryCount: failure.retryCount,
        lastAttemptAt: failure.lastAttemptAt,
      });
    });
  }

  /**
   * Record where the image ended up after the lifecycle action.
   */
  recordStorage(id: number, state: StorageState, archivedPath: string | null): void {
    const result = this.db
      .update(captures)
      .set({ storageState: state, archivedPath, updatedAt: this.now() })
      .where(and(eq(captures.id, id), eq(captures.status, "analyzed")))
      .run();

    if (result.changes !== 1) {
      throw new ServiceError(
        ErrorCode.INVALID_TRANSITION,
        `Capture ${id} is not analyzed; storage state not recorded`
      );
    }
  }

  /**
   * Analyzed captures whose image was never deleted or archived.
   */
  listUnsettledAnalyzed(): CaptureRecord[] {
    return this.db
      .select()
      .from(captures)
      .where(and(eq(captures.status, "analyzed"), eq(captures.storageState, "ephemeral")))
      .orderBy(asc(captures.capturedAt), asc(captures.id))
      .all()
      .map(toCaptureRecord);
  }

  /**
   * Reset failed captures to pending. Without ids every failed capture is reset.
   */
  requeueFailed(ids?: readonly number[]): number {
    if (ids && ids.length === 0) return 0;

    const conditions: SQL[] = [eq(captures.status, "failed")];
    if (ids) {
      conditions.push(inArray(captures.id, [...ids]));
    }

    const result = this.db
      .update(captures)
      .set({ status: "pending", updatedAt: this.now() })
      .where(and(...conditions))
      .run();

    if (result.changes > 0) {
      this.logger.info({ count: result.changes }, "Requeued failed captures");
    }
    return result.changes;
  }

  /**
   * Return analyzing rows not touched for `olderThanMs` to pending.
   */
  recoverStaleAnalyzing(olderThanMs: number): number {
    const staleThreshold = this.now() - olderThanMs;
    const result = this.db
      .update(captures)
      .set({ status: "pending", updatedAt: this.now() })
      .where(and(eq(captures.status, "analyzing"), lt(captures.updatedAt, staleThreshold)))
      .run();

    if (result.changes > 0) {
      this.logger.info({ count: result.changes }, "Recovered stale analyzing captures");
    }
    return result.changes;
  }

  listTimeline(range: TimeRange = {}): TimelineRow[] {
    const conditions: SQL[] = [];
    if (range.from !== undefined) conditions.push(gte(captures.capturedAt, range.from));
    if (range.to !== undefined) conditions.push(lt(captures.capturedAt, range.to));

    const rows = this.db
      .select({ capture: captures, analysis: analysisResults })
      .from(captures)
      .leftJoin(analysisResults, eq(analysisResults.captureId, captures.id))
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(captures.capturedAt), asc(captures.id))
      .all();

    return rows.map((row) => ({
      capture: toCaptureRecord(row.capture),
      analysis: row.analysis ? toAnalysisRecord(row.analysis) : null,
    }));
  }

  private transition(
    tx: Pick<DrizzleDB, "update">,
    id: number,
    from: CaptureStatus,
    to: CaptureStatus,
    ts: number
  ): void {
    if (!canTransition(from, to)) {
      throw new ServiceError(ErrorCode.INVALID_TRANSITION, `Transition ${from} -> ${to} is not allowed`);
    }
    const result = tx
      .update(captures)
      .set({ status: to, updatedAt: ts })
      .where(and(eq(captures.id, id), eq(captures.status, from)))
      .run();

    if (result.changes !== 1) {
      throw new ServiceError(
        ErrorCode.INVALID_TRANSITION,
        `Capture ${id} cannot move ${from} -> ${to}`
      );
    }
  }

  private upsertResult(
    tx: Pick<DrizzleDB, "insert">,
    captureId: number,
    ts: number,
    values: Omit<AnalysisRecord, "captureId">
  ): void {
    tx.insert(analysisResults)
      .values({ captureId, ...values, createdAt: ts, updatedAt: ts })
      .onConflictDoUpdate({
        target: analysisResults.captureId,
        set: { ...values, updatedAt: ts },
      })
      .run();
  }
}

export function toCaptureRecord(row: CaptureRow): CaptureRecord {
  return {
    id: row.id,
    capturedAt: row.capturedAt,
    host: row.host,
    windowTitle: row.windowTitle,
    processName: row.processName,
    contentHash: row.contentHash,
    filePath: row.filePath,
    status: row.status,
    storageState: row.storageState,
    archivedPath: row.archivedPath,
    width: row.width,
    height: row.height,
    bytes: row.bytes,
    mime: row.mime,
  };
}

export function toAnalysisRecord(row: AnalysisResultRow): AnalysisRecord {
  return {
    captureId: row.captureId,
    backend: row.backend,
    model: row.model,
    rawResponse: row.rawResponse,
    summary: row.summary,
    primaryTask: row.primaryTask,
    tags: row.tags ?? [],
    confidence: row.confidence,
    entities: row.entities ?? { ...EMPTY_ENTITIES },
    errorCode: row.errorCode,
    errorMessage: row.errorMessage,
    retryCount: row.retryCount,
    lastAttemptAt: row.lastAttemptAt,
  };
}

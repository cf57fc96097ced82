import { sqliteTable, text, integer, real, index, uniqueIndex } from "drizzle-orm/sqlite-core";
import {
  CAPTURE_STATUS_VALUES,
  STORAGE_STATE_VALUES,
  type ObservedEntities,
} from "@shared/capture-types";

/**
 * Captures table
 * One row per screen capture taken by the observer
 */
export const captures = sqliteTable(
  "captures",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    capturedAt: integer("captured_at").notNull(), // epoch ms
    host: text("host").notNull(),

    // Foreground window context
    windowTitle: text("window_title"),
    processName: text("process_name"),

    // File storage
    contentHash: text("content_hash").notNull(),
    filePath: text("file_path").notNull(),
    storageState: text("storage_state", { enum: STORAGE_STATE_VALUES })
      .notNull()
      .default("ephemeral"),
    archivedPath: text("archived_path"),

    // Image metadata
    width: integer("width"),
    height: integer("height"),
    bytes: integer("bytes"),
    mime: text("mime"),

    status: text("status", { enum: CAPTURE_STATUS_VALUES }).notNull().default("pending"),

    createdAt: integer("created_at").notNull(),
    updatedAt: integer("updated_at").notNull(),
  },
  (table) => [
    index("idx_captures_captured_at").on(table.capturedAt),
    index("idx_captures_status").on(table.status),
    index("idx_captures_storage_state").on(table.storageState),
  ]
);

/**
 * Analysis results table
 * At most one row per capture; rewritten on every attempt sequence
 */
export const analysisResults = sqliteTable(
  "analysis_results",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    captureId: integer("capture_id")
      .notNull()
      .references(() => captures.id),
    backend: text("backend").notNull(),
    model: text("model"),
    rawResponse: text("raw_response"),

    summary: text("summary"),
    primaryTask: text("primary_task"),
    tags: text("tags", { mode: "json" }).$type<string[]>(),
    confidence: real("confidence"),
    entities: text("entities", { mode: "json" }).$type<ObservedEntities>(),

    errorCode: text("error_code"),
    errorMessage: text("error_message"),
    retryCount: integer("retry_count").notNull().default(0),
    lastAttemptAt: integer("last_attempt_at").notNull(),

    createdAt: integer("created_at").notNull(),
    updatedAt: integer("updated_at").notNull(),
  },
  (table) => [uniqueIndex("idx_analysis_results_capture_id").on(table.captureId)]
);

export type CaptureRow = typeof captures.$inferSelect;
export type NewCaptureRow = typeof captures.$inferInsert;
export type AnalysisResultRow = typeof analysisResults.$inferSelect;
export type NewAnalysisResultRow = typeof analysisResults.$inferInsert;

/**
 * DDL applied at open time. Kept in step with the table definitions above.
 */
export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS captures (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    captured_at INTEGER NOT NULL,
    host TEXT NOT NULL,
    window_title TEXT,
    process_name TEXT,
    content_hash TEXT NOT NULL,
    file_path TEXT NOT NULL,
    storage_state TEXT NOT NULL DEFAULT 'ephemeral',
    archived_path TEXT,
    width INTEGER,
    height INTEGER,
    bytes INTEGER,
    mime TEXT,
    status TEXT NOT NULL DEFAULT 'pending',
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_captures_captured_at ON captures (captured_at)`,
  `CREATE INDEX IF NOT EXISTS idx_captures_status ON captures (status)`,
  `CREATE INDEX IF NOT EXISTS idx_captures_storage_state ON captures (storage_state)`,
  `CREATE TABLE IF NOT EXISTS analysis_results (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    capture_id INTEGER NOT NULL REFERENCES captures(id),
    backend TEXT NOT NULL,
    model TEXT,
    raw_response TEXT,
    summary TEXT,
    primary_task TEXT,
    tags TEXT,
    confidence REAL,
    entities TEXT,
    error_code TEXT,
    error_message TEXT,
    retry_count INTEGER NOT NULL DEFAULT 0,
    last_attempt_at INTEGER NOT NULL,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_analysis_results_capture_id ON analysis_results (capture_id)`,
];

/**
 * Application configuration
 *
 * All tunables are read from the environment once at process start, validated
 * with zod, and frozen into a single AppConfig that is passed to every
 * component. Nothing else in the tree reads process.env.
 */

import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ErrorCode, ServiceError } from "@shared/errors";
import { BACKEND_IDS, type BackendId, type ImageFormat } from "@shared/capture-types";

export const STORE_FILENAME = "mirulog.db";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

const booleanFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined || raw.trim() === "") return defaultValue;
      const normalized = raw.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${raw}"` });
      return z.NEVER;
    });

const optionalText = z
  .string()
  .optional()
  .transform((raw) => (raw && raw.trim() !== "" ? raw.trim() : undefined));

const EnvSchema = z.object({
  MIRULOG_HOST: optionalText,
  ANALYZER_BACKEND: z.enum(BACKEND_IDS).default("gemini"),

  GEMINI_API_KEY: optionalText,
  GEMINI_MODEL: z.string().default("gemini-2.0-flash"),
  GEMINI_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.4),

  LOCAL_LLM_BASE_URL: z.string().url().default("http://localhost:1234/v1"),
  LOCAL_LLM_API_KEY: optionalText,
  LOCAL_LLM_MODEL: z.string().default("auto"),
  LOCAL_LLM_MAX_TOKENS: z.coerce.number().int().positive().default(512),
  LOCAL_LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),

  ANALYZER_TIMEOUT_SECONDS: z.coerce.number().positive().default(60),
  ANALYSIS_LANGUAGE: z.string().default("English"),

  CAPTURE_INTERVAL_SECONDS: z.coerce.number().positive().default(60),
  IDLE_THRESHOLD_MINUTES: z.coerce.number().positive().default(5),
  LOCK_CHECK_ENABLED: booleanFlag(true),
  CAPTURE_FORMAT: z.enum(["png", "jpeg", "webp"]).default("png"),
  CAPTURE_QUALITY: z.coerce.number().int().min(1).max(100).default(80),
  CAPTURE_ROOT: z.string().default("data/captures"),
  ARCHIVE_ROOT: z.string().default("data/archive"),
  AGGREGATE_ROOT: optionalText,
  DELETE_CAPTURE_AFTER_ANALYSIS: booleanFlag(true),
  ARCHIVE_PARTITION_BY_HOST: booleanFlag(false),

  ANALYZER_MAX_RETRIES: z.coerce.number().int().min(0).default(5),
  ANALYZER_CONNECTION_REFUSED_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  ANALYZER_RETRY_BUFFER_SECONDS: z.coerce.number().min(0).default(0.5),
  ANALYZER_REQUEST_SPACING_SECONDS: z.coerce.number().min(0).default(0),
  ANALYZER_BACKOFF_BASE_SECONDS: z.coerce.number().positive().default(2),
  ANALYZER_BACKOFF_MAX_SECONDS: z.coerce.number().positive().default(60),
  ANALYZER_BATCH_LIMIT: z.coerce.number().int().positive().optional(),
  STALE_ANALYZING_MINUTES: z.coerce.number().positive().default(30),

  LOG_DIR: z.string().default("logs"),
  LOG_LEVEL: z
    .string()
    .default("info")
    .transform((level) => level.toLowerCase())
    .pipe(z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])),
});

type Env = z.infer<typeof EnvSchema>;

export interface GeminiConfig {
  apiKey: string | null;
  model: string;
  maxTokens: number;
  temperature: number;
}

export interface LocalLLMConfig {
  baseURL: string;
  apiKey: string | null;
  /** Explicit model id, or "auto" to pick the first model the server lists */
  model: string;
  maxTokens: number;
  temperature: number;
}

export interface RetryConfig {
  maxRetries: number;
  connectionRefusedMaxRetries: number;
  bufferMs: number;
  requestSpacingMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface CaptureConfig {
  intervalMs: number;
  idleThresholdMs: number;
  lockCheckEnabled: boolean;
  format: ImageFormat;
  quality: number;
  captureRoot: string;
}

export interface StorageConfig {
  archiveRoot: string;
  storePath: string;
  aggregateRoot: string;
  deleteAfterAnalysis: boolean;
  partitionArchiveByHost: boolean;
}

export interface AnalyzerConfig {
  backend: BackendId;
  gemini: GeminiConfig;
  local: LocalLLMConfig;
  timeoutMs: number;
  language: string;
  retry: RetryConfig;
  /** Overrides the backend's default batch size when set */
  batchLimit: number | null;
  staleAnalyzingMs: number;
}

export interface LoggingConfig {
  directory: string;
  level: string;
}

export interface AppConfig {
  host: string;
  capture: CaptureConfig;
  storage: StorageConfig;
  analyzer: AnalyzerConfig;
  logging: LoggingConfig;
}

/** Command-line overrides, applied on top of the environment */
export interface ConfigOverrides {
  captureRoot?: string;
  archiveRoot?: string;
  backend?: BackendId;
}

/**
 * Substitute `{host}` in a root path template and resolve it against cwd.
 */
export function resolveRootTemplate(template: string, host: string, cwd: string): string {
  return path.resolve(cwd, template.replaceAll("{host}", host));
}

function sanitizeHost(raw: string): string {
  return raw.replace(/[\\/:*?"<>|\s]+/g, "_");
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd()
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ServiceError(
      ErrorCode.CONFIG_INVALID,
      `Invalid configuration: ${issues.join("; ")}`,
      issues
    );
  }

  return buildConfig(parsed.data, overrides, cwd);
}

function buildConfig(env: Env, overrides: ConfigOverrides, cwd: string): AppConfig {
  const host = sanitizeHost(env.MIRULOG_HOST ?? os.hostname());
  const captureRoot = resolveRootTemplate(overrides.captureRoot ?? env.CAPTURE_ROOT, host, cwd);
  const archiveRoot = resolveRootTemplate(overrides.archiveRoot ?? env.ARCHIVE_ROOT, host, cwd);
  const aggregateRoot = env.AGGREGATE_ROOT
    ? resolveRootTemplate(env.AGGREGATE_ROOT, host, cwd)
    : path.dirname(archiveRoot);

  const config: AppConfig = {
    host,
    capture: {
      intervalMs: Math.round(env.CAPTURE_INTERVAL_SECONDS * 1000),
      idleThresholdMs: Math.round(env.IDLE_THRESHOLD_MINUTES * 60_000),
      lockCheckEnabled: env.LOCK_CHECK_ENABLED,
      format: env.CAPTURE_FORMAT,
      quality: env.CAPTURE_QUALITY,
      captureRoot,
    },
    storage: {
      archiveRoot,
      storePath: path.join(archiveRoot, STORE_FILENAME),
      aggregateRoot,
      deleteAfterAnalysis: env.DELETE_CAPTURE_AFTER_ANALYSIS,
      partitionArchiveByHost: env.ARCHIVE_PARTITION_BY_HOST,
    },
    analyzer: {
      backend: overrides.backend ?? env.ANALYZER_BACKEND,
      gemini: {
        apiKey: env.GEMINI_API_KEY ?? null,
        model: env.GEMINI_MODEL,
        maxTokens: env.GEMINI_MAX_TOKENS,
        temperature: env.GEMINI_TEMPERATURE,
      },
      local: {
        baseURL: env.LOCAL_LLM_BASE_URL.replace(/\/+$/, ""),
        apiKey: env.LOCAL_LLM_API_KEY ?? null,
        model: env.LOCAL_LLM_MODEL.trim(),
        maxTokens: env.LOCAL_LLM_MAX_TOKENS,
        temperature: env.LOCAL_LLM_TEMPERATURE,
      },
      timeoutMs: Math.round(env.ANALYZER_TIMEOUT_SECONDS * 1000),
      language: env.ANALYSIS_LANGUAGE,
      retry: {
        maxRetries: env.ANALYZER_MAX_RETRIES,
        connectionRefusedMaxRetries: env.ANALYZER_CONNECTION_REFUSED_MAX_RETRIES,
        bufferMs: Math.round(env.ANALYZER_RETRY_BUFFER_SECONDS * 1000),
        requestSpacingMs: Math.round(env.ANALYZER_REQUEST_SPACING_SECONDS * 1000),
        backoffBaseMs: Math.round(env.ANALYZER_BACKOFF_BASE_SECONDS * 1000),
        backoffMaxMs: Math.round(env.ANALYZER_BACKOFF_MAX_SECONDS * 1000),
      },
      batchLimit: env.ANALYZER_BATCH_LIMIT ?? null,
      staleAnalyzingMs: Math.round(env.STALE_ANALYZING_MINUTES * 60_000),
    },
    logging: {
      directory: path.resolve(cwd, env.LOG_DIR),
      level: env.LOG_LEVEL,
    },
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child && typeof child === "object") {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

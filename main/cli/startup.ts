/**
 * Startup helpers shared by every command-line entry point
 *
 * - `.env` loading, configuration and logger setup, in that order
 * - global error handlers
 * - argument parsing helpers
 * - a runner that turns fatal errors into a non-zero exit code
 */

import dotenv from "dotenv";
import { addDays, isValid, parse, startOfDay } from "date-fns";
import { ErrorCode, getErrorMessage, ServiceError, toErrorMessage } from "@shared/errors";
import { loadConfig, type AppConfig, type ConfigOverrides } from "../config";
import type { TimeRange } from "../database/capture-repository";
import { getLogger, initializeLogger, type Logger } from "../services/logger";

export interface CliContext {
  config: AppConfig;
  logger: Logger;
}

export function registerGlobalErrorHandlers(): void {
  process.on("uncaughtException", (error) => {
    getLogger("uncaught").error({ error }, "Uncaught exception");
    process.exitCode = 1;
  });

  process.on("unhandledRejection", (reason) => {
    getLogger("uncaught").error({ reason }, "Unhandled promise rejection");
    process.exitCode = 1;
  });
}

/**
 * Load `.env`, build the configuration and initialize the logger for `name`.
 */
export function bootstrap(name: string, overrides: ConfigOverrides = {}): CliContext {
  dotenv.config();
  const config = loadConfig(process.env, overrides);
  const logger = initializeLogger({
    name,
    logsDir: config.logging.directory,
    level: config.logging.level,
  });
  registerGlobalErrorHandlers();
  return { config, logger };
}

/**
 * Run `main`; a rejection is logged and sets exit code 1.
 */
export async function runCli(name: string, main: () => Promise<void>): Promise<void> {
  try {
    await main();
  } catch (error) {
    const code = error instanceof ServiceError ? error.code : ErrorCode.UNKNOWN;
    getLogger(name).fatal(
      { code, hint: getErrorMessage(code), error: toErrorMessage(error) },
      "Command failed"
    );
    process.exitCode = 1;
  }
}

export function parsePositiveInt(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ServiceError(ErrorCode.CONFIG_INVALID, `${flag} expects a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Local-time day range `[00:00, next 00:00)` for a `yyyy-MM-dd` string.
 */
export function dayRange(raw: string | undefined, now: Date = new Date()): Required<TimeRange> {
  const day = raw === undefined ? startOfDay(now) : parse(raw, "yyyy-MM-dd", now);
  if (!isValid(day)) {
    throw new ServiceError(ErrorCode.CONFIG_INVALID, `--date expects yyyy-MM-dd, got "${raw}"`);
  }
  return { from: day.getTime(), to: addDays(day, 1).getTime() };
}

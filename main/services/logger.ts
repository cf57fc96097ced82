import pino from "pino";
import path from "node:path";
import fs from "node:fs";
import pretty from "pino-pretty";

export interface LoggerOptions {
  /** Process name, used as the log file name (e.g. "observer" -> observer.log) */
  name: string;
  /** Directory for log files; when absent only the console stream is used */
  logsDir?: string;
  level?: string;
}

const DEFAULT_OPTIONS: LoggerOptions = { name: "mirulog", level: "info" };

/**
 * Logger Service - Singleton pattern implementation
 * Provides centralized logging with file and console output
 */
class LoggerService {
  private static instance: LoggerService | null = null;
  private logger: pino.Logger;
  private logFile: string | null;

  private constructor(private readonly options: LoggerOptions) {
    this.logFile = options.logsDir ? path.join(options.logsDir, `${options.name}.log`) : null;
    this.logger = this.createLogger();
  }

  /**
   * Get the singleton instance
   */
  static getInstance(): LoggerService {
    if (!LoggerService.instance) {
      LoggerService.instance = new LoggerService(DEFAULT_OPTIONS);
    }
    return LoggerService.instance;
  }

  /**
   * Replace the instance with one built from the given options.
   * Loggers handed out before this call keep writing to the old streams.
   */
  static configure(options: LoggerOptions): LoggerService {
    LoggerService.instance = new LoggerService(options);
    return LoggerService.instance;
  }

  /**
   * Reset instance (for testing only)
   */
  static resetInstance(): void {
    LoggerService.instance = null;
  }

  private createLogger(): pino.Logger {
    // stderr, so command output on stdout stays machine-readable
    const prettyStream = pretty({
      destination: 2,
      colorize: true,
      translateTime: "HH:MM:ss",
      ignore: "pid,hostname,app,module",
      messageFormat: (log, messageKey) => {
        const msg = log[messageKey];
        const modulePrefix = log.module ? `[${String(log.module)}] ` : "";
        return `${modulePrefix}${String(msg)}`;
      },
    });

    const streams: pino.StreamEntry[] = [{ stream: prettyStream }];

    if (this.logFile) {
      fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
      const filePrettyStream = pretty({
        colorize: false,
        translateTime: "SYS:standard",
        destination: this.logFile,
        append: true,
        sync: false,
        ignore: "pid,hostname,app,module",
        singleLine: true,
        messageFormat: (log, messageKey) => {
          const msg = log[messageKey];
          const modulePrefix = log.module ? `[${String(log.module)}] ` : "";
          return `${modulePrefix}${String(msg)}`;
        },
      });
      streams.unshift({ stream: filePrettyStream });
    }

    return pino(
      {
        level: this.options.level ?? "info",
        base: {
          pid: process.pid,
          app: this.options.name,
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.multistream(streams)
    );
  }

  /**
   * Get the pino logger instance
   * @param name - Optional module name for child logger
   */
  getLogger(name?: string): pino.Logger {
    if (name) {
      return this.logger.child({ module: name });
    }
    return this.logger;
  }

  getLogFile(): string | null {
    return this.logFile;
  }
}

export type Logger = pino.Logger;

/**
 * Initialize logger - call this first thing in every entry point,
 * before any service is constructed.
 */
export function initializeLogger(options: LoggerOptions): pino.Logger {
  const service = LoggerService.configure(options);
  const logger = service.getLogger();
  logger.info({ logFile: service.getLogFile() }, "Logger initialized");
  return logger;
}

/**
 * Get the logger instance (convenience function)
 * @param name - Optional module name for child logger
 */
export function getLogger(name?: string): pino.Logger {
  return LoggerService.getInstance().getLogger(name);
}

export { LoggerService };

// src/core/logger.ts

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Process-wide logger registry. Each module asks for a logger named after
 * itself; output goes to the console prefixed with that name.
 */
export class LogManager {
  private static instance: LogManager;
  private level: LogLevel = "info";
  private loggers = new Map<string, Logger>();

  private constructor() {}

  public static getInstance(): LogManager {
    if (!LogManager.instance) {
      LogManager.instance = new LogManager();
    }
    return LogManager.instance;
  }

  public setLogLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLogLevel(): LogLevel {
    return this.level;
  }

  public getLogger(source: string): Logger {
    let logger = this.loggers.get(source);
    if (!logger) {
      logger = {
        debug: (message, context) => this.log("debug", source, message, context),
        info: (message, context) => this.log("info", source, message, context),
        warn: (message, context) => this.log("warn", source, message, context),
        error: (message, context) => this.log("error", source, message, context),
      };
      this.loggers.set(source, logger);
    }
    return logger;
  }

  private log(
    level: Exclude<LogLevel, "silent">,
    source: string,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const line = `[${source}] ${message}`;
    const sink =
      level === "debug"
        ? console.debug
        : level === "info"
          ? console.info
          : level === "warn"
            ? console.warn
            : console.error;

    if (context) {
      sink(line, context);
    } else {
      sink(line);
    }
  }
}

export function getLogger(source: string): Logger {
  return LogManager.getInstance().getLogger(source);
}

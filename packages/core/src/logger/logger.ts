export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some(level => level === value);
}

class ConsoleLogger implements Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(prefix: string = "", level: LogLevel = "info") {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LOG_LEVELS.indexOf(this.level);
    const messageLevelIndex = LOG_LEVELS.indexOf(level);

    return currentLevelIndex <= messageLevelIndex && this.level !== "silent";
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

/**
 * Creates a console logger.
 *
 * Without an explicit level, `LOG_LEVEL` is honoured, then tests run silent.
 * The CLI always passes the level resolved from `ROSTER_LOG_LEVEL`, so
 * `LOG_LEVEL` only reaches loggers built with defaults, such as
 * StudentAdapter's fallback.
 */
export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  const envLevel = process.env['LOG_LEVEL'];
  const logLevel = level
    ?? (isLogLevel(envLevel) ? envLevel : undefined)
    ?? (process.env['NODE_ENV'] === "test" ? "silent" : "info");

  return new ConsoleLogger(prefix, logLevel);
}

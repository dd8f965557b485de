export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVELS.some(level => level === value);
}

class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly prefix: string;

  constructor(prefix: string = "", level: LogLevel = "info") {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LEVELS.indexOf(this.level);
    const messageLevelIndex = LEVELS.indexOf(level);

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
}

let defaultLevel: LogLevel | null = null;

/**
 * Overrides the level used by loggers created without an explicit level.
 * The CLI calls this once its flags and config are known.
 */
export function setDefaultLogLevel(level: LogLevel | null): void {
  defaultLevel = level;
}

export function resolveLogLevel(): LogLevel {
  if (defaultLevel) return defaultLevel;
  const fromEnv = process.env['METABLOCK_LOG_LEVEL'];
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env['NODE_ENV'] === "test" ? "silent" : "info";
}

/**
 * Creates a prefixed console logger. Without an explicit level the logger
 * reads the default level on every call, so later overrides apply to it.
 */
export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  if (level) {
    return new ConsoleLogger(prefix, level);
  }

  return {
    debug: (message, ...args) => new ConsoleLogger(prefix, resolveLogLevel()).debug(message, ...args),
    info: (message, ...args) => new ConsoleLogger(prefix, resolveLogLevel()).info(message, ...args),
    warn: (message, ...args) => new ConsoleLogger(prefix, resolveLogLevel()).warn(message, ...args),
    error: (message, ...args) => new ConsoleLogger(prefix, resolveLogLevel()).error(message, ...args),
  };
}

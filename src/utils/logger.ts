/**
 * Leveled logger with scoped children and a pluggable sink.
 *
 * Callers pass identifiers only (usernames, item ids, reasons). Passwords, plaintext,
 * blobs and key material are never handed to a logger.
 */
import { VAULT_CONSTANTS } from "../constants";

export type LogLevelName = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: Record<LogLevelName, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 99
};

export interface LogMeta {
  ts: Date;
  level: Exclude<LogLevelName, "silent">;
  scope: string[];
}

export type LogSink = (meta: LogMeta, message: string, fields?: Record<string, unknown>) => void;

export interface Logger {
  readonly level: LogLevelName;
  trace(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  /** Same level and sink, one more scope segment. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevelName;
  sink?: LogSink;
  scope?: string[];
}

export function isLogLevel(value: unknown): value is LogLevelName {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function levelFromEnv(): LogLevelName {
  const raw = typeof process !== "undefined" ? process.env[VAULT_CONSTANTS.LOG_LEVEL_ENV] : undefined;
  return isLogLevel(raw) ? raw : VAULT_CONSTANTS.DEFAULT_LOG_LEVEL;
}

export const consoleSink: LogSink = (meta, message, fields) => {
  const tag = meta.scope.length ? ` [${meta.scope.join(":")}]` : "";
  const line = `${meta.ts.toISOString()} ${meta.level.toUpperCase()}${tag} ${message}`;
  const args: unknown[] = fields ? [line, fields] : [line];
  switch (meta.level) {
    case "trace":
    case "debug":
      console.debug(...args);
      break;
    case "info":
      console.info(...args);
      break;
    case "warn":
      console.warn(...args);
      break;
    case "error":
      console.error(...args);
      break;
  }
};

class ScopedLogger implements Logger {
  constructor(
    public readonly level: LogLevelName,
    private readonly sink: LogSink,
    private readonly scope: string[]
  ) {}

  private emit(level: LogMeta["level"], message: string, fields?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;
    this.sink({ ts: new Date(), level, scope: this.scope }, message, fields);
  }

  trace(message: string, fields?: Record<string, unknown>): void {
    this.emit("trace", message, fields);
  }
  debug(message: string, fields?: Record<string, unknown>): void {
    this.emit("debug", message, fields);
  }
  info(message: string, fields?: Record<string, unknown>): void {
    this.emit("info", message, fields);
  }
  warn(message: string, fields?: Record<string, unknown>): void {
    this.emit("warn", message, fields);
  }
  error(message: string, fields?: Record<string, unknown>): void {
    this.emit("error", message, fields);
  }

  child(scope: string): Logger {
    return new ScopedLogger(this.level, this.sink, scope ? [...this.scope, scope] : [...this.scope]);
  }
}

/** Level defaults to `VAULT_LOG_LEVEL`, then `warn`. */
export function createLogger(opts: LoggerOptions = {}): Logger {
  return new ScopedLogger(opts.level ?? levelFromEnv(), opts.sink ?? consoleSink, opts.scope ?? []);
}

import type { Clock } from "./ports/clock.js";
import { systemClock } from "./adapters/system-clock.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  /** One JSON object per line instead of `key=value` text */
  json: boolean;
  clock?: Clock;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** Logger that adds `meta` to every entry, e.g. a transfer id */
  child(meta: LogMeta): Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function plainValue(value: unknown): unknown {
  return value instanceof Error ? value.message : value;
}

/** Render one `key=value` pair, quoting values with spaces or quotes */
function textField(key: string, value: unknown): string {
  const raw = plainValue(value);
  const text = typeof raw === "string" ? raw : JSON.stringify(raw);
  if (text === undefined) return `${key}=undefined`;
  return /[\s"=]/.test(text) || text === "" ? `${key}=${JSON.stringify(text)}` : `${key}=${text}`;
}

export function formatText(timestamp: string, level: LogLevel, message: string, meta: LogMeta): string {
  const fields = Object.entries(meta).map(([key, value]) => textField(key, value));
  return [`[${timestamp}]`, level.toUpperCase().padEnd(5), message, ...fields].join(" ");
}

export function formatJson(timestamp: string, level: LogLevel, message: string, meta: LogMeta): string {
  const entry: LogEntry = { timestamp, level, message };
  for (const [key, value] of Object.entries(meta)) {
    entry[key] = plainValue(value);
  }
  return JSON.stringify(entry);
}

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

/**
 * Create a structured logger writing to stderr. Stdout belongs to command
 * results, which scripts may parse as JSON.
 */
export function createLogger(options: LoggerOptions): Logger {
  const threshold = SEVERITY[options.level];
  const clock = options.clock ?? systemClock;
  const format = options.json ? formatJson : formatText;

  const bound = (context: LogMeta): Logger => {
    const at = (level: LogLevel) => (message: string, meta: LogMeta = {}) => {
      if (SEVERITY[level] < threshold) return;
      console.error(format(clock.isoNow(), level, message, { ...context, ...meta }));
    };
    return {
      debug: at("debug"),
      info: at("info"),
      warn: at("warn"),
      error: at("error"),
      child: (meta) => bound({ ...context, ...meta }),
    };
  };

  return bound({});
}

/**
 * Logger that discards everything; the default for library callers.
 */
export function createNoopLogger(): Logger {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}

/**
 * Leveled logger shared by every spanscope package.
 *
 * Output goes to a swappable sink so applications can forward entries to
 * their own logging stack and tests can capture them.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

export type LogSink = (entry: LogEntry) => void;

const consoleSink: LogSink = (entry) => {
  const { level, message, timestamp, ...rest } = entry;
  const meta = Object.keys(rest).length > 0 ? " " + JSON.stringify(rest) : "";
  const line = `[${timestamp}] [${level.toUpperCase()}] [spanscope] ${message}${meta}`;
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

let _sink: LogSink = consoleSink;
let _minLevel: LogLevel = "warn";

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Override the log sink. Pass nothing to restore console output. */
export function setLogSink(sink?: LogSink): void {
  _sink = sink ?? consoleSink;
}

/** Entries below this level are dropped before reaching the sink. */
export function setLogLevel(level: LogLevel): void {
  _minLevel = level;
}

export function getLogLevel(): LogLevel {
  return _minLevel;
}

function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(_minLevel)) return;
  _sink({
    level,
    message,
    timestamp: new Date().toISOString(),
    ...meta,
  });
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => log("debug", msg, meta),
  info:  (msg: string, meta?: Record<string, unknown>) => log("info", msg, meta),
  warn:  (msg: string, meta?: Record<string, unknown>) => log("warn", msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => log("error", msg, meta),
};

import { isLogLevel, logger } from "@spanscope/core";
import type { LogLevel } from "@spanscope/core";

export interface ResolvedConfig {
  /** Record call arguments on spans via SpanHandle.captureInputs(). */
  captureInputs: boolean;
  logLevel:      LogLevel;
  /** e.g. "production"; copied onto every trace record. */
  environment:   string | undefined;
  /** Capacity of the default in-memory trace store. */
  maxTraces:     number;
}

export type ConfigOptions = Partial<ResolvedConfig>;

type Env = Record<string, string | undefined>;

const DEFAULTS: ResolvedConfig = {
  captureInputs: true,
  logLevel:      "warn",
  environment:   undefined,
  maxTraces:     1000,
};

function parseBool(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === "") return fallback;
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  logger.warn(`invalid ${name}, using default`, { value: raw, default: fallback });
  return fallback;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (Number.isInteger(value) && value > 0) return value;
  logger.warn(`invalid ${name}, using default`, { value: raw, default: fallback });
  return fallback;
}

function positiveIntOption(name: string, value: number | undefined): number | undefined {
  if (value === undefined || (Number.isInteger(value) && value > 0)) return value;
  logger.warn(`invalid ${name} option, ignoring it`, { value });
  return undefined;
}

function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
  if (raw === undefined || raw === "") return fallback;
  const value = raw.trim().toLowerCase();
  if (isLogLevel(value)) return value;
  logger.warn("invalid SPANSCOPE_LOG_LEVEL, using default", { value: raw, default: fallback });
  return fallback;
}

/**
 * Merge explicit options over SPANSCOPE_* environment variables over defaults.
 */
export function resolveConfig(opts: ConfigOptions = {}, env: Env = process.env): ResolvedConfig {
  return {
    captureInputs: opts.captureInputs
      ?? parseBool("SPANSCOPE_CAPTURE_INPUTS", env["SPANSCOPE_CAPTURE_INPUTS"], DEFAULTS.captureInputs),
    logLevel: opts.logLevel
      ?? parseLogLevel(env["SPANSCOPE_LOG_LEVEL"], DEFAULTS.logLevel),
    environment: opts.environment
      ?? (env["SPANSCOPE_ENVIRONMENT"] || DEFAULTS.environment),
    maxTraces: positiveIntOption("maxTraces", opts.maxTraces)
      ?? parsePositiveInt("SPANSCOPE_MAX_TRACES", env["SPANSCOPE_MAX_TRACES"], DEFAULTS.maxTraces),
  };
}

/**
 * Whether the log level was chosen by the caller (option or a valid
 * SPANSCOPE_LOG_LEVEL) rather than left at its default.
 */
export function hasExplicitLogLevel(opts: ConfigOptions = {}, env: Env = process.env): boolean {
  if (opts.logLevel !== undefined) return true;
  return isLogLevel(env["SPANSCOPE_LOG_LEVEL"]?.trim().toLowerCase());
}

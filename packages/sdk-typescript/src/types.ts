import type { SpanType, Status } from "@spanscope/core";

export interface TraceOptions {
  name: string;
  input?: unknown;
  /** Overrides the configured environment for this trace. */
  environment?: string;
  tags?: Record<string, string>;
}

export interface TraceEndOptions {
  output?: unknown;
  status?: Status;
  /** Human-readable error message when status is "error". */
  statusMessage?: string;
}

export interface SpanOptions {
  name: string;
  type: SpanType;
  /** Recorded under SpanAttributeKey.INPUTS. */
  input?: unknown;
  /** e.g. "anthropic", "openai" */
  provider?: string;
  /** e.g. "gpt-4o" */
  model?: string;
  attributes?: Record<string, unknown>;
}

export interface SpanEndOptions {
  /** Recorded under SpanAttributeKey.OUTPUTS. */
  output?: unknown;
  status?: Status;
  statusMessage?: string;
  /**
   * Override the model set at span start.
   * Useful when the model isn't known until the response arrives.
   */
  model?: string;
  provider?: string;
  /** Only the counters given here are recorded; omitted ones stay unreported. */
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

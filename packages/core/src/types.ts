/** 128-bit trace ID as 32-char lowercase hex. */
export type TraceId = string;

/** 64-bit span ID as 16-char lowercase hex, encoded from the span's ordinal. */
export type SpanId = string;

export type SpanType = "llm" | "tool" | "retrieval" | "chain" | "custom";
export type Status   = "ok" | "error";

/**
 * Reserved span attribute keys. Readers and writers of these attributes
 * must agree on the exact strings.
 */
export const SpanAttributeKey = {
  INPUTS:        "spanscope.spanInputs",
  OUTPUTS:       "spanscope.spanOutputs",
  REQUEST_ID:    "spanscope.requestId",
  CHAT_MESSAGES: "spanscope.chat.messages",
  CHAT_TOOLS:    "spanscope.chat.tools",
  CHAT_USAGE:    "spanscope.chat.tokenUsage",
} as const;

export type SpanAttributeKey = (typeof SpanAttributeKey)[keyof typeof SpanAttributeKey];

export const TokenUsageKey = {
  INPUT_TOKENS:  "input_tokens",
  OUTPUT_TOKENS: "output_tokens",
  TOTAL_TOKENS:  "total_tokens",
} as const;

export type TokenUsageKey = (typeof TokenUsageKey)[keyof typeof TokenUsageKey];

/** Token counters. An absent key means the counter was not reported. */
export type UsageRecord = Partial<Record<TokenUsageKey, number>>;

/** Anything that exposes span attributes for reading. */
export interface AttributeReader {
  getAttribute(key: string): unknown;
}

/** Anything whose span attributes can be read and written. */
export interface AttributeTarget extends AttributeReader {
  setAttribute(key: string, value: unknown): void;
}

/**
 * A finalized span.
 *
 * Records are frozen when the owning trace ends. Attribute values are
 * plain JSON trees.
 */
export interface SpanRecord {
  id:              SpanId;
  trace_id:        TraceId;
  parent_span_id?: SpanId;
  name:            string;
  type:            SpanType;
  /** ISO 8601, e.g. "2024-01-01T00:00:00.000Z" */
  start_time:      string;
  /** ISO 8601 */
  end_time:        string;
  status:          Status;
  status_message?: string;
  /** e.g. "anthropic", "openai" */
  provider?:       string;
  /** e.g. "gpt-4o" */
  model?:          string;
  attributes:      Record<string, unknown>;
}

/**
 * A finalized trace. `spans` is in creation order.
 */
export interface TraceRecord {
  id:              TraceId;
  name:            string;
  /** Evaluation request id visible when the trace started, if any. */
  request_id?:     string;
  start_time:      string;
  end_time:        string;
  status:          Status;
  status_message?: string;
  input?:          unknown;
  output?:         unknown;
  /** Absent when no span reported token usage. */
  usage?:          UsageRecord;
  environment?:    string;
  tags?:           Record<string, string>;
  spans:           readonly SpanRecord[];
}

export type {
  TraceId,
  SpanId,
  SpanType,
  Status,
  UsageRecord,
  AttributeReader,
  AttributeTarget,
  SpanRecord,
  TraceRecord,
} from "./types.js";
export { SpanAttributeKey, TokenUsageKey } from "./types.js";

export { generateTraceId, encodeSpanId, decodeSpanId } from "./ids.js";

export { aggregateUsageFromSpans } from "./usage.js";
export { deduplicateSpanNamesInPlace } from "./dedupe.js";
export { serializeAttribute, deserializeAttribute, snapshotValue, deepFreeze } from "./serialize.js";

export {
  ChatMessageSchema,
  ChatToolSchema,
  ToolCallSchema,
  ContentPartSchema,
  FunctionToolSchema,
  validateChatMessages,
  validateChatTools,
} from "./schemas.js";
export type { ChatMessage, ChatTool, ToolCall } from "./schemas.js";

export {
  SpanscopeError,
  SchemaValidationError,
  IntrospectionError,
  ArgumentBindingError,
  SpanFinalizedError,
} from "./errors.js";
export type { SchemaValidationErrorOptions } from "./errors.js";

export { logger, setLogSink, setLogLevel, getLogLevel, isLogLevel, LOG_LEVELS } from "./logger.js";
export type { LogLevel, LogEntry, LogSink } from "./logger.js";

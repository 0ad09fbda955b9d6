export { Spanscope } from "./spanscope.js";
export type { SpanscopeOptions } from "./spanscope.js";
export { TraceHandle } from "./trace.js";
export { SpanHandle } from "./span.js";
export type {
  TraceOptions,
  TraceEndOptions,
  SpanOptions,
  SpanEndOptions,
} from "./types.js";

export { resolveConfig } from "./config.js";
export type { ConfigOptions, ResolvedConfig } from "./config.js";
export { InMemoryTraceStore } from "./store.js";
export type { TraceStore } from "./store.js";
export { ExecutionContextScope, maybeGetRequestId } from "./context.js";
export type { ExecutionContext, ExecutionContextProvider } from "./context.js";
export {
  registerSignature,
  signed,
  inspectSignature,
  bindArguments,
  captureFunctionInputArgs,
} from "./inputs.js";
export type { Parameter, Signature, SignatureInspector, AnyFunction, Kwargs } from "./inputs.js";
export {
  setSpanChatMessages,
  setSpanChatTools,
  getSpanChatMessages,
  getSpanChatTools,
} from "./chat.js";

// Re-export core primitives so users only need one import
export type {
  TraceId,
  SpanId,
  SpanType,
  Status,
  UsageRecord,
  SpanRecord,
  TraceRecord,
  ChatMessage,
  ChatTool,
  LogLevel,
  LogEntry,
  LogSink,
} from "@spanscope/core";
export {
  SpanAttributeKey,
  TokenUsageKey,
  SchemaValidationError,
  IntrospectionError,
  ArgumentBindingError,
  SpanFinalizedError,
  SpanscopeError,
  aggregateUsageFromSpans,
  deduplicateSpanNamesInPlace,
  encodeSpanId,
  setLogSink,
  setLogLevel,
} from "@spanscope/core";

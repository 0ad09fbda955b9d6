import { setLogLevel } from "@spanscope/core";
import type { TraceId, TraceRecord } from "@spanscope/core";
import { hasExplicitLogLevel, resolveConfig } from "./config.js";
import type { ConfigOptions, ResolvedConfig } from "./config.js";
import type { ExecutionContextProvider } from "./context.js";
import { InMemoryTraceStore } from "./store.js";
import type { TraceStore } from "./store.js";
import { TraceHandle } from "./trace.js";
import type { TraceRuntime } from "./trace.js";
import type { TraceOptions } from "./types.js";

export interface SpanscopeOptions extends ConfigOptions {
  /** Where finalized traces are saved. Default: an InMemoryTraceStore of `maxTraces`. */
  store?: TraceStore;
  /**
   * Source of the ambient execution context, usually an ExecutionContextScope
   * owned by the code that intercepts calls. Without one, spans are never
   * tagged with a request id.
   */
  contextScope?: ExecutionContextProvider;
  /** Environment to read SPANSCOPE_* settings from. Default: process.env */
  env?: Record<string, string | undefined>;
}

/**
 * The main entry point for the Spanscope SDK.
 *
 * @example
 * ```ts
 * import { Spanscope, setSpanChatMessages } from "@spanscope/sdk";
 *
 * const scope = new Spanscope();
 *
 * const trace = scope.trace({ name: "summarise", input: { text } });
 * const span  = trace.span({ name: "llm", type: "llm", model: "gpt-4o" });
 * setSpanChatMessages(span, [{ role: "user", content: text }]);
 * const result = await callLLM(text);
 * span.end({ output: result.text, inputTokens: result.usage.input, outputTokens: result.usage.output });
 *
 * const record = trace.end({ output: result.text });
 * console.log(record.usage);
 * ```
 */
export class Spanscope {
  readonly #runtime: TraceRuntime;

  constructor(opts: SpanscopeOptions = {}) {
    const { store, contextScope, env, ...configOptions } = opts;
    const config = resolveConfig(configOptions, env);
    // The level is process-wide; leave one set elsewhere alone unless asked.
    if (hasExplicitLogLevel(configOptions, env)) setLogLevel(config.logLevel);

    this.#runtime = {
      store:           store ?? new InMemoryTraceStore(config.maxTraces),
      config,
      contextProvider: contextScope,
    };
  }

  get config(): Readonly<ResolvedConfig> {
    return this.#runtime.config;
  }

  /**
   * Start a new trace. Call .end() on the returned handle when the
   * operation is complete.
   */
  trace(opts: TraceOptions): TraceHandle {
    return new TraceHandle(this.#runtime, opts);
  }

  /** A finalized trace from the store. */
  getTrace(id: TraceId): TraceRecord | undefined {
    return this.#runtime.store.get(id);
  }

  /** Id of the most recently finalized trace. */
  get lastTraceId(): TraceId | undefined {
    return this.#runtime.store.lastTraceId;
  }
}

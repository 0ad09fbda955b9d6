import {
  SpanFinalizedError,
  aggregateUsageFromSpans,
  deduplicateSpanNamesInPlace,
  deepFreeze,
  encodeSpanId,
  generateTraceId,
  logger,
  snapshotValue,
} from "@spanscope/core";
import type { SpanId, TraceId, TraceRecord } from "@spanscope/core";
import type { ResolvedConfig } from "./config.js";
import { maybeGetRequestId } from "./context.js";
import type { ExecutionContextProvider } from "./context.js";
import { SpanHandle } from "./span.js";
import type { SpanOwner } from "./span.js";
import type { TraceStore } from "./store.js";
import type { TraceOptions, TraceEndOptions, SpanOptions } from "./types.js";

/**
 * Collaborators a trace needs, supplied by Spanscope.
 * @internal
 */
export interface TraceRuntime {
  store: TraceStore;
  config: ResolvedConfig;
  contextProvider?: ExecutionContextProvider;
}

// Span bookkeeping for one trace, shared with every SpanHandle in it.
class TraceSpans implements SpanOwner {
  readonly traceId: TraceId;
  readonly captureInputs: boolean;
  readonly spans: SpanHandle[] = [];
  finalized = false;

  readonly #contextProvider: ExecutionContextProvider | undefined;
  #nextOrdinal = 0;

  constructor(traceId: TraceId, captureInputs: boolean, contextProvider?: ExecutionContextProvider) {
    this.traceId          = traceId;
    this.captureInputs    = captureInputs;
    this.#contextProvider = contextProvider;
  }

  nextSpanId(): SpanId {
    return encodeSpanId(this.#nextOrdinal++);
  }

  register(span: SpanHandle): void {
    this.spans.push(span);
  }

  requestId(): string | null {
    return maybeGetRequestId(true, this.#contextProvider);
  }
}

/**
 * A handle to an in-progress trace.
 *
 * Obtain one via Spanscope.trace(). Call .end() when the operation completes;
 * that finalizes every span in it and saves the trace record.
 */
export class TraceHandle {
  readonly id: TraceId;

  readonly #store: TraceStore;
  readonly #spans: TraceSpans;
  readonly #name: string;
  readonly #startTime: string;
  readonly #input: unknown;
  readonly #requestId: string | null;
  readonly #environment: string | undefined;
  readonly #tags: Record<string, string> | undefined;

  #record: TraceRecord | undefined;

  /** @internal */
  constructor(runtime: TraceRuntime, opts: TraceOptions) {
    this.id           = generateTraceId();
    this.#store       = runtime.store;
    this.#spans       = new TraceSpans(this.id, runtime.config.captureInputs, runtime.contextProvider);
    this.#name        = opts.name;
    this.#startTime   = new Date().toISOString();
    this.#input       = snapshotValue(opts.input);
    this.#requestId   = this.#spans.requestId();
    this.#environment = opts.environment ?? runtime.config.environment;
    this.#tags        = opts.tags ? { ...opts.tags } : undefined;
  }

  /** Spans in creation order. */
  get spans(): readonly SpanHandle[] {
    return this.#spans.spans;
  }

  get finalized(): boolean {
    return this.#spans.finalized;
  }

  /**
   * Start a top-level span within this trace.
   * For nested spans, call .span() on the returned SpanHandle instead.
   */
  span(opts: SpanOptions): SpanHandle {
    if (this.#spans.finalized) {
      throw new SpanFinalizedError(`cannot start span "${opts.name}": trace ${this.id} is finalized`);
    }
    return new SpanHandle(this.#spans, opts);
  }

  /**
   * End and finalize the trace.
   *
   * Spans still open are ended, duplicate span names are numbered, token
   * usage is summed across spans, and the resulting record is saved to the
   * store. Calling end() again returns the same record.
   */
  end(opts: TraceEndOptions = {}): TraceRecord {
    if (this.#record) return this.#record;

    const spans = this.#spans.spans;
    const open  = spans.filter((span) => !span.ended);
    if (open.length > 0) {
      logger.debug(`ending ${open.length} unfinished span(s) with their trace`, { trace_id: this.id });
      for (const span of open) span.end();
    }

    deduplicateSpanNamesInPlace(spans);
    const usage = aggregateUsageFromSpans(spans);
    this.#spans.finalized = true;

    // Nothing in the record is shared with the caller or writable.
    const record: TraceRecord = deepFreeze({
      id:             this.id,
      name:           this.#name,
      request_id:     this.#requestId ?? undefined,
      start_time:     this.#startTime,
      end_time:       new Date().toISOString(),
      status:         opts.status ?? "ok",
      status_message: opts.statusMessage,
      input:          this.#input,
      output:         snapshotValue(opts.output),
      usage:          Object.keys(usage).length > 0 ? usage : undefined,
      environment:    this.#environment,
      tags:           this.#tags,
      spans:          spans.map((span) => span.toRecord()),
    });

    this.#record = record;
    this.#store.save(record);
    logger.debug(`trace finalized: ${this.#name}`, { trace_id: this.id, spans: spans.length });
    return record;
  }
}

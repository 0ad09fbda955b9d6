import {
  SpanAttributeKey,
  SpanFinalizedError,
  TokenUsageKey,
  deepFreeze,
  deserializeAttribute,
  serializeAttribute,
} from "@spanscope/core";
import type {
  AttributeTarget,
  SpanId,
  SpanRecord,
  SpanType,
  Status,
  TraceId,
  UsageRecord,
} from "@spanscope/core";
import { captureFunctionInputArgs } from "./inputs.js";
import type { AnyFunction, Kwargs } from "./inputs.js";
import type { SpanOptions, SpanEndOptions } from "./types.js";

/**
 * What a span needs from the trace that owns it.
 * @internal
 */
export interface SpanOwner {
  readonly traceId: TraceId;
  readonly finalized: boolean;
  readonly captureInputs: boolean;
  nextSpanId(): SpanId;
  register(span: SpanHandle): void;
  /** Evaluation request id visible right now, if any. */
  requestId(): string | null;
}

/**
 * A handle to an in-progress span.
 *
 * Obtain one via TraceHandle.span() or SpanHandle.span().
 * Call .end() when the work is complete.
 */
export class SpanHandle implements AttributeTarget {
  readonly id: SpanId;
  readonly traceId: TraceId;
  readonly parentId: SpanId | undefined;
  readonly type: SpanType;
  /** Rewritten by name deduplication when the trace is finalized. */
  name: string;

  readonly #owner: SpanOwner;
  readonly #startTime: string;
  // JSON text; reads always return a fresh copy.
  readonly #attributes = new Map<string, string>();

  #provider: string | undefined;
  #model: string | undefined;
  #endTime: string | undefined;
  #status: Status = "ok";
  #statusMessage: string | undefined;

  /** @internal */
  constructor(owner: SpanOwner, opts: SpanOptions, parentId?: SpanId) {
    this.id         = owner.nextSpanId();
    this.traceId    = owner.traceId;
    this.parentId   = parentId;
    this.name       = opts.name;
    this.type       = opts.type;
    this.#owner     = owner;
    this.#startTime = new Date().toISOString();
    this.#provider  = opts.provider;
    this.#model     = opts.model;

    const requestId = owner.requestId();
    if (requestId !== null) this.setAttribute(SpanAttributeKey.REQUEST_ID, requestId);
    if (opts.input !== undefined) this.setAttribute(SpanAttributeKey.INPUTS, opts.input);
    if (opts.attributes) this.setAttributes(opts.attributes);

    owner.register(this);
  }

  get ended(): boolean {
    return this.#endTime !== undefined;
  }

  getAttribute(key: string): unknown {
    const raw = this.#attributes.get(key);
    return raw === undefined ? undefined : deserializeAttribute(raw);
  }

  setAttribute(key: string, value: unknown): void {
    if (this.#owner.finalized) {
      throw new SpanFinalizedError(`span "${this.name}" (${this.id}) belongs to a finalized trace`);
    }
    this.#attributes.set(key, serializeAttribute(value));
  }

  setAttributes(attributes: Record<string, unknown>): void {
    for (const [key, value] of Object.entries(attributes)) {
      this.setAttribute(key, value);
    }
  }

  /**
   * Record the arguments of a call to `fn` as this span's inputs.
   *
   * `fn` must have a registered signature (see registerSignature). Returns
   * the snapshot, or null when it could not be taken or input capture is
   * disabled; the span is left without inputs in that case.
   */
  captureInputs(fn: AnyFunction, args: readonly unknown[] = [], kwargs: Kwargs = {}): Record<string, unknown> | null {
    if (!this.#owner.captureInputs) return null;
    const snapshot = captureFunctionInputArgs(fn, args, kwargs);
    if (snapshot !== null) this.setAttribute(SpanAttributeKey.INPUTS, snapshot);
    return snapshot;
  }

  /**
   * Start a nested child span with this span as its parent.
   * Call .end() on the returned handle when the child work is complete.
   */
  span(opts: SpanOptions): SpanHandle {
    if (this.#owner.finalized) {
      throw new SpanFinalizedError(`cannot start span "${opts.name}": trace ${this.traceId} is finalized`);
    }
    return new SpanHandle(this.#owner, opts, this.id);
  }

  /**
   * End the span, recording end_time now.
   *
   * Calling end() more than once is a no-op; only the first call is recorded.
   * Model and provider can be overridden here if not known until the response.
   */
  end(opts: SpanEndOptions = {}): void {
    if (this.ended) return;

    if (opts.output !== undefined) this.setAttribute(SpanAttributeKey.OUTPUTS, opts.output);

    const usage: UsageRecord = {};
    if (opts.inputTokens  !== undefined) usage[TokenUsageKey.INPUT_TOKENS]  = opts.inputTokens;
    if (opts.outputTokens !== undefined) usage[TokenUsageKey.OUTPUT_TOKENS] = opts.outputTokens;
    if (opts.totalTokens  !== undefined) usage[TokenUsageKey.TOTAL_TOKENS]  = opts.totalTokens;
    if (Object.keys(usage).length > 0) this.setAttribute(SpanAttributeKey.CHAT_USAGE, usage);

    this.#status        = opts.status ?? "ok";
    this.#statusMessage = opts.statusMessage;
    this.#provider      = opts.provider ?? this.#provider;
    this.#model         = opts.model    ?? this.#model;
    this.#endTime       = new Date().toISOString();
  }

  /** @internal */
  toRecord(): SpanRecord {
    const attributes: Record<string, unknown> = {};
    for (const [key, raw] of this.#attributes) {
      attributes[key] = deserializeAttribute(raw);
    }

    return deepFreeze({
      id:             this.id,
      trace_id:       this.traceId,
      parent_span_id: this.parentId,
      name:           this.name,
      type:           this.type,
      start_time:     this.#startTime,
      end_time:       this.#endTime ?? new Date().toISOString(),
      status:         this.#status,
      status_message: this.#statusMessage,
      provider:       this.#provider,
      model:          this.#model,
      attributes,
    });
  }
}

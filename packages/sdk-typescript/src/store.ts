import { logger } from "@spanscope/core";
import type { TraceId, TraceRecord } from "@spanscope/core";

/** Where finalized traces go. Implement this to keep traces elsewhere. */
export interface TraceStore {
  save(record: TraceRecord): void;
  get(id: TraceId): TraceRecord | undefined;
  /** Id of the most recently saved trace. */
  readonly lastTraceId: TraceId | undefined;
}

/**
 * Keeps the most recent `maxTraces` finalized traces in memory,
 * evicting the oldest first.
 */
export class InMemoryTraceStore implements TraceStore {
  readonly #maxTraces: number;
  readonly #traces = new Map<TraceId, TraceRecord>();
  #lastTraceId: TraceId | undefined;

  constructor(maxTraces = 1000) {
    if (!Number.isInteger(maxTraces) || maxTraces < 1) {
      throw new RangeError(`maxTraces must be a positive integer, got ${maxTraces}`);
    }
    this.#maxTraces = maxTraces;
  }

  save(record: TraceRecord): void {
    // Re-saving moves the trace to the newest position.
    this.#traces.delete(record.id);
    this.#traces.set(record.id, record);
    this.#lastTraceId = record.id;

    while (this.#traces.size > this.#maxTraces) {
      const oldest = this.#traces.keys().next();
      if (oldest.done) break;
      this.#traces.delete(oldest.value);
      logger.debug("evicted trace from in-memory store", { trace_id: oldest.value });
    }
  }

  get(id: TraceId): TraceRecord | undefined {
    return this.#traces.get(id);
  }

  get lastTraceId(): TraceId | undefined {
    return this.#lastTraceId;
  }

  get size(): number {
    return this.#traces.size;
  }
}

import { randomUUID } from "node:crypto";
import type { TraceId, SpanId } from "./types.js";

const MAX_SPAN_ORDINAL = (1n << 64n) - 1n;

/**
 * Generates a W3C-compliant 128-bit trace ID: 32 lowercase hex characters.
 */
export function generateTraceId(): TraceId {
  return randomUUID().replace(/-/g, "");
}

/**
 * Encodes a span ordinal as a 64-bit span ID: 16 lowercase hex characters,
 * zero-padded. Distinct ordinals always give distinct IDs.
 */
export function encodeSpanId(ordinal: number | bigint): SpanId {
  if (typeof ordinal === "number" && !Number.isSafeInteger(ordinal)) {
    throw new RangeError(`span ordinal must be a safe integer, got ${ordinal}`);
  }
  const value = BigInt(ordinal);
  if (value < 0n || value > MAX_SPAN_ORDINAL) {
    throw new RangeError(`span ordinal out of range: ${value}`);
  }
  return value.toString(16).padStart(16, "0");
}

/** Inverse of encodeSpanId. */
export function decodeSpanId(id: SpanId): bigint {
  if (!/^[0-9a-f]{16}$/.test(id)) {
    throw new RangeError(`span id must be 16-char hex, got "${id}"`);
  }
  return BigInt(`0x${id}`);
}

import { logger } from "./logger.js";
import { SpanAttributeKey, TokenUsageKey } from "./types.js";
import type { AttributeReader, UsageRecord } from "./types.js";

const USAGE_KEYS: readonly TokenUsageKey[] = [
  TokenUsageKey.INPUT_TOKENS,
  TokenUsageKey.OUTPUT_TOKENS,
  TokenUsageKey.TOTAL_TOKENS,
];

function isCounter(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/**
 * Sum token usage over a trace's spans.
 *
 * Each counter is summed over the spans that report it; a span silent on
 * a counter contributes 0. A counter no span reports is left out of the
 * result rather than reported as 0. Malformed values count as absent.
 */
export function aggregateUsageFromSpans(spans: Iterable<AttributeReader>): UsageRecord {
  const totals: UsageRecord = {};

  for (const span of spans) {
    const usage = span.getAttribute(SpanAttributeKey.CHAT_USAGE);
    if (usage === undefined || usage === null) continue;

    if (typeof usage !== "object" || Array.isArray(usage)) {
      logger.warn("ignoring malformed token usage attribute", { value: usage });
      continue;
    }

    for (const key of USAGE_KEYS) {
      const value: unknown = Reflect.get(usage, key);
      if (value === undefined || value === null) continue;
      if (!isCounter(value)) {
        logger.warn(`ignoring malformed token usage counter "${key}"`, { value });
        continue;
      }
      totals[key] = (totals[key] ?? 0) + value;
    }
  }

  return totals;
}

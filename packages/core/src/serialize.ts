import { logger } from "./logger.js";

// BigInt has no JSON form; it is stored as a decimal string.
function replacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

/**
 * Serialise an attribute value to JSON text.
 * undefined becomes null. Values JSON cannot represent (cycles) fall back
 * to their string form.
 */
export function serializeAttribute(value: unknown): string {
  if (value === undefined) return "null";
  try {
    return JSON.stringify(value, replacer) ?? "null";
  } catch (err) {
    logger.warn("attribute value is not JSON-serialisable, storing its string form", {
      error: err instanceof Error ? err.message : String(err),
    });
    return JSON.stringify(String(value));
  }
}

export function deserializeAttribute(text: string): unknown {
  return JSON.parse(text);
}

/** Detached JSON copy of a value, as attributes store it. undefined stays undefined. */
export function snapshotValue(value: unknown): unknown {
  return value === undefined ? undefined : deserializeAttribute(serializeAttribute(value));
}

/** Freeze a value and everything reachable from it. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) deepFreeze(child);
  }
  return value;
}

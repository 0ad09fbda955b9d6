import { describe, it, expect } from "vitest";
import { generateTraceId, encodeSpanId, decodeSpanId } from "../ids.js";

describe("generateTraceId", () => {
  it("returns 32-char lowercase hex", () => {
    expect(generateTraceId()).toMatch(/^[0-9a-f]{32}$/);
  });

  it("generates unique IDs", () => {
    const ids = new Set(Array.from({ length: 200 }, generateTraceId));
    expect(ids.size).toBe(200);
  });
});

describe("encodeSpanId", () => {
  it("zero-pads the ordinal to 16-char lowercase hex", () => {
    expect(encodeSpanId(0)).toBe("0000000000000000");
    expect(encodeSpanId(255)).toBe("00000000000000ff");
  });

  it("is half the length of a trace ID", () => {
    expect(encodeSpanId(7).length).toBe(generateTraceId().length / 2);
  });

  it("gives distinct IDs for distinct ordinals", () => {
    const ids = new Set(Array.from({ length: 200 }, (_, i) => encodeSpanId(i)));
    expect(ids.size).toBe(200);
  });

  it("accepts bigints up to 2^64 - 1", () => {
    expect(encodeSpanId((1n << 64n) - 1n)).toBe("ffffffffffffffff");
  });

  it("rejects negative, fractional and oversized ordinals", () => {
    expect(() => encodeSpanId(-1)).toThrow(RangeError);
    expect(() => encodeSpanId(1.5)).toThrow(RangeError);
    expect(() => encodeSpanId(1n << 64n)).toThrow(RangeError);
  });
});

describe("decodeSpanId", () => {
  it("reverses encodeSpanId", () => {
    expect(decodeSpanId(encodeSpanId(4096))).toBe(4096n);
  });

  it("rejects ids that are not 16-char hex", () => {
    expect(() => decodeSpanId("xyz")).toThrow(RangeError);
    expect(() => decodeSpanId("00000000000000FF")).toThrow(RangeError);
  });
});

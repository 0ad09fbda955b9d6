import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ArgumentBindingError, IntrospectionError, setLogSink } from "@spanscope/core";
import type { LogEntry } from "@spanscope/core";
import {
  bindArguments,
  captureFunctionInputArgs,
  inspectSignature,
  registerSignature,
  signed,
} from "../inputs.js";
import type { Signature } from "../inputs.js";

// func(a, b, c=3, d=4, **kwargs)
const funcSignature: Signature = {
  parameters: [
    { name: "a" },
    { name: "b" },
    { name: "c", hasDefault: true },
    { name: "d", hasDefault: true },
    { name: "kwargs", kind: "var-keyword" },
  ],
};

const func = signed(funcSignature, (_a: number, _b: number, _c = 3, _d = 4, _kwargs: Record<string, unknown> = {}) => undefined);

class TestClass {
  func(_a: number, _b: number, _c = 3, _d = 4, _kwargs: Record<string, unknown> = {}): void {}
}
registerSignature(TestClass.prototype.func, { ...funcSignature, receiver: "self" });

let entries: LogEntry[] = [];

beforeEach(() => {
  entries = [];
  setLogSink((entry) => { entries.push(entry); });
});

afterEach(() => {
  setLogSink();
});

describe("captureFunctionInputArgs", () => {
  it("includes only the arguments the caller passed", () => {
    expect(captureFunctionInputArgs(func, [1, 2])).toEqual({ a: 1, b: 2 });
    expect(captureFunctionInputArgs(func, [1, 2], { c: 30 })).toEqual({ a: 1, b: 2, c: 30 });
  });

  it("folds unmatched keywords under the var-keyword parameter", () => {
    expect(captureFunctionInputArgs(func, [1, 2], { c: 30, d: 40, e: 50 })).toEqual({
      a: 1,
      b: 2,
      c: 30,
      d: 40,
      kwargs: { e: 50 },
    });
  });

  it("returns an empty snapshot for a no-parameter function called without arguments", () => {
    const noArgsFunc = signed({ parameters: [] }, () => undefined);
    expect(captureFunctionInputArgs(noArgsFunc)).toEqual({});
  });

  it("leaves out the receiver of a method", () => {
    const instance = new TestClass();
    expect(captureFunctionInputArgs(instance.func, [1, 2])).toEqual({ a: 1, b: 2 });
  });

  it("returns null without throwing when inspection fails", () => {
    const inspect = vi.fn((): Signature => {
      throw new Error("Some error");
    });
    const args = captureFunctionInputArgs(() => undefined, [], {}, inspect);
    expect(args).toBeNull();
    expect(inspect).toHaveBeenCalled();
    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe("warn");
  });

  it("returns null for a function with no registered signature", () => {
    function unregistered(): void {}
    expect(captureFunctionInputArgs(unregistered, [1])).toBeNull();
    expect(entries[0]?.message).toBe('failed to capture inputs for function "unregistered"');
  });

  it("returns null when the arguments do not fit", () => {
    expect(captureFunctionInputArgs(func, [1, 2, 3, 4, 5])).toBeNull();
  });
});

describe("bindArguments", () => {
  it("keeps declaration order whatever the keyword order", () => {
    const result = bindArguments(funcSignature, [1], { d: 4, b: 2 });
    expect(Object.keys(result)).toEqual(["a", "b", "d"]);
  });

  it("collects surplus positionals under the var-positional parameter", () => {
    const signature: Signature = {
      parameters: [{ name: "first" }, { name: "rest", kind: "var-positional" }, { name: "flag", kind: "keyword-only", hasDefault: true }],
    };
    expect(bindArguments(signature, [1, 2, 3], { flag: true })).toEqual({ first: 1, rest: [2, 3], flag: true });
    expect(bindArguments(signature, [1])).toEqual({ first: 1 });
  });

  it("does not fill keyword-only parameters by position", () => {
    const signature: Signature = { parameters: [{ name: "x" }, { name: "y", kind: "keyword-only" }] };
    expect(() => bindArguments(signature, [1, 2])).toThrow(ArgumentBindingError);
  });

  it("rejects too many positional arguments", () => {
    expect(() => bindArguments(funcSignature, [1, 2, 3, 4, 5])).toThrow(
      "too many positional arguments: expected at most 4, got 5",
    );
  });

  it("rejects a keyword that repeats a positional argument", () => {
    expect(() => bindArguments(funcSignature, [1], { a: 2 })).toThrow('multiple values for argument "a"');
  });

  it("rejects unexpected keywords without a var-keyword parameter", () => {
    const signature: Signature = { parameters: [{ name: "x" }] };
    expect(() => bindArguments(signature, [], { y: 1 })).toThrow('unexpected keyword argument "y"');
  });

  it("drops a receiver passed explicitly", () => {
    const signature: Signature = { parameters: [{ name: "self" }, { name: "a" }] };
    expect(bindArguments(signature, [{}, 1])).toEqual({ a: 1 });
  });

  it("keeps a __proto__ keyword as an ordinary key", () => {
    const kwargs: Record<string, unknown> = JSON.parse('{"__proto__":5,"e":1}');
    const result = bindArguments(funcSignature, [1, 2], kwargs);
    expect(JSON.stringify(result)).toBe('{"a":1,"b":2,"kwargs":{"__proto__":5,"e":1}}');
  });

  it("does not mutate the arguments", () => {
    const args = [1, 2];
    const kwargs = { e: 5 };
    bindArguments(funcSignature, args, kwargs);
    expect(args).toEqual([1, 2]);
    expect(kwargs).toEqual({ e: 5 });
  });
});

describe("registerSignature / inspectSignature", () => {
  it("returns the registered signature", () => {
    expect(inspectSignature(func)).toEqual(funcSignature);
  });

  it("throws IntrospectionError for unregistered functions", () => {
    expect(() => inspectSignature(() => undefined)).toThrow(IntrospectionError);
  });

  it("rejects inconsistent descriptors", () => {
    const fn = () => undefined;
    expect(() => registerSignature(fn, { parameters: [{ name: "a" }, { name: "a" }] })).toThrow(IntrospectionError);
    expect(() =>
      registerSignature(fn, { parameters: [{ name: "kw", kind: "var-keyword" }, { name: "a" }] }),
    ).toThrow("var-keyword parameter must be last");
    expect(() =>
      registerSignature(fn, { parameters: [{ name: "a", hasDefault: true }, { name: "b" }] }),
    ).toThrow('required parameter "b" follows a defaulted parameter');
  });
});

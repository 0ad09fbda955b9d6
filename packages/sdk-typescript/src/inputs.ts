import { z } from "zod";
import { ArgumentBindingError, IntrospectionError, logger } from "@spanscope/core";

// ── Signature descriptors ─────────────────────────────────────────────────────
//
// JavaScript cannot reliably reflect a function's parameter names or
// defaults, so instrumented functions declare their shape up front.

export const ParameterSchema = z.object({
  name:       z.string().min(1),
  /** True when the caller may omit the argument. */
  hasDefault: z.boolean().optional(),
  /** Defaults to "positional" (fillable by position or by keyword). */
  kind:       z.enum(["positional", "keyword-only", "var-positional", "var-keyword"]).optional(),
});

export const SignatureSchema = z
  .object({
    parameters: z.array(ParameterSchema),
    /** Name of the method receiver (e.g. "self"); never reported in snapshots. */
    receiver:   z.string().min(1).optional(),
  })
  .superRefine((sig, ctx) => {
    const seen = new Set<string>();
    let sawVarPositional = false;
    let sawKeywordOnly   = false;
    let sawDefault       = false;

    sig.parameters.forEach((param, i) => {
      const kind = param.kind ?? "positional";
      const fail = (message: string) =>
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["parameters", i], message });

      if (seen.has(param.name)) fail(`duplicate parameter "${param.name}"`);
      seen.add(param.name);

      if (kind === "var-keyword" && i !== sig.parameters.length - 1) {
        fail("var-keyword parameter must be last");
      }
      if (kind === "var-positional") {
        if (sawVarPositional) fail("only one var-positional parameter is allowed");
        sawVarPositional = true;
      }
      if (kind === "keyword-only") sawKeywordOnly = true;
      if (kind === "positional") {
        if (sawVarPositional || sawKeywordOnly) {
          fail(`positional parameter "${param.name}" follows a var-positional or keyword-only parameter`);
        }
        if (param.hasDefault) sawDefault = true;
        else if (sawDefault) fail(`required parameter "${param.name}" follows a defaulted parameter`);
      }
    });
  });

export type Parameter = z.infer<typeof ParameterSchema>;
export type Signature = z.infer<typeof SignatureSchema>;

export type AnyFunction = (...args: never[]) => unknown;
export type Kwargs = Record<string, unknown>;
export type SignatureInspector = (fn: AnyFunction) => Signature;

const RECEIVER_NAMES = new Set(["self", "cls"]);

const registry = new WeakMap<AnyFunction, Signature>();

/**
 * Declare the parameter shape of `fn` so its calls can be snapshotted.
 * Throws IntrospectionError when the descriptor is inconsistent.
 */
export function registerSignature(fn: AnyFunction, signature: Signature): void {
  const parsed = SignatureSchema.safeParse(signature);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new IntrospectionError(
      `invalid signature for function "${fn.name || "<anonymous>"}": ${detail}`,
      { cause: parsed.error },
    );
  }
  registry.set(fn, parsed.data);
}

/**
 * Register a signature and hand back the same function.
 *
 * @example
 * ```ts
 * const search = signed(
 *   { parameters: [{ name: "query" }, { name: "limit", hasDefault: true }] },
 *   (query: string, limit = 10) => index.search(query, limit),
 * );
 * ```
 */
export function signed<F extends AnyFunction>(signature: Signature, fn: F): F {
  registerSignature(fn, signature);
  return fn;
}

/** The registered signature of `fn`. Throws IntrospectionError when there is none. */
export function inspectSignature(fn: AnyFunction): Signature {
  if (typeof fn !== "function") {
    throw new IntrospectionError(`expected a function, received ${typeof fn}`);
  }
  const signature = registry.get(fn);
  if (!signature) {
    throw new IntrospectionError(`no signature registered for function "${fn.name || "<anonymous>"}"`);
  }
  return signature;
}

// ── Binding ───────────────────────────────────────────────────────────────────

// Plain assignment would treat a "__proto__" key as the prototype setter.
function setOwn(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Map call-site arguments onto parameter names.
 *
 * Only arguments the caller actually passed appear in the result; defaults
 * are not applied. Keywords with no matching parameter are folded into one
 * object under the var-keyword parameter, surplus positionals into an array
 * under the var-positional one. The receiver is always left out. Keys
 * follow declaration order.
 */
export function bindArguments(
  signature: Signature,
  args: readonly unknown[],
  kwargs: Kwargs = {},
): Record<string, unknown> {
  const params        = signature.parameters;
  const positional    = params.filter((p) => (p.kind ?? "positional") === "positional");
  const varPositional = params.find((p) => p.kind === "var-positional");
  const varKeyword    = params.find((p) => p.kind === "var-keyword");

  const bound: Map<string, unknown> = new Map();
  const extraArgs: unknown[] = [];
  const extraKwargs: Kwargs = {};

  args.forEach((value, i) => {
    const param = positional[i];
    if (param) {
      bound.set(param.name, value);
    } else if (varPositional) {
      extraArgs.push(value);
    } else {
      throw new ArgumentBindingError(
        `too many positional arguments: expected at most ${positional.length}, got ${args.length}`,
      );
    }
  });

  for (const [key, value] of Object.entries(kwargs)) {
    const param = params.find(
      (p) => p.name === key && (p.kind === undefined || p.kind === "positional" || p.kind === "keyword-only"),
    );
    if (param) {
      if (bound.has(key)) {
        throw new ArgumentBindingError(`multiple values for argument "${key}"`);
      }
      bound.set(key, value);
    } else if (varKeyword) {
      setOwn(extraKwargs, key, value);
    } else {
      throw new ArgumentBindingError(`unexpected keyword argument "${key}"`);
    }
  }

  const result: Record<string, unknown> = {};
  for (const param of params) {
    if (RECEIVER_NAMES.has(param.name) || param.name === signature.receiver) continue;

    if (param.kind === "var-positional") {
      if (extraArgs.length > 0) setOwn(result, param.name, extraArgs);
    } else if (param.kind === "var-keyword") {
      if (Object.keys(extraKwargs).length > 0) setOwn(result, param.name, extraKwargs);
    } else if (bound.has(param.name)) {
      setOwn(result, param.name, bound.get(param.name));
    }
  }
  return result;
}

/**
 * Snapshot the arguments of one call, for a span's inputs.
 *
 * Returns null when the function's shape is unknown or the arguments do not
 * fit it; the trace is still recorded, just without inputs.
 */
export function captureFunctionInputArgs(
  fn: AnyFunction,
  args: readonly unknown[] = [],
  kwargs: Kwargs = {},
  inspect: SignatureInspector = inspectSignature,
): Record<string, unknown> | null {
  try {
    return bindArguments(inspect(fn), args, kwargs);
  } catch (err) {
    logger.warn(`failed to capture inputs for function "${fn.name || "<anonymous>"}"`, {
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

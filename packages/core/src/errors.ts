/** Base class for every error thrown by spanscope packages. */
export class SpanscopeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    // Keep instanceof working when compiled down to older targets.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface SchemaValidationErrorOptions {
  /** Name of the schema that rejected the value, e.g. "ChatMessage". */
  schema: string;
  /** Position of the offending element in the submitted array. */
  index: number;
  /** Dotted path of the offending field inside the element ("" for the element itself). */
  field: string;
  /** Validator message for the first failing field. */
  reason: string;
  /** Number of problems found in the element. */
  issueCount?: number;
  cause?: unknown;
}

/**
 * A structured attribute (chat message, chat tool) did not match its schema.
 * Nothing was written to the span.
 */
export class SchemaValidationError extends SpanscopeError {
  readonly schema: string;
  readonly index: number;
  readonly field: string;
  readonly reason: string;

  constructor(opts: SchemaValidationErrorOptions) {
    const count = opts.issueCount ?? 1;
    const where = opts.field === "" ? "" : ` field "${opts.field}"`;
    super(
      `${count} validation error${count === 1 ? "" : "s"} for ${opts.schema} at index ${opts.index}:${where} ${opts.reason}`,
      { cause: opts.cause },
    );
    this.schema = opts.schema;
    this.index  = opts.index;
    this.field  = opts.field;
    this.reason = opts.reason;
  }
}

/** A function's parameter shape could not be determined. */
export class IntrospectionError extends SpanscopeError {}

/** Call-site arguments do not fit a function's declared parameters. */
export class ArgumentBindingError extends SpanscopeError {}

/** A span was modified after its trace was finalized. */
export class SpanFinalizedError extends SpanscopeError {}

import { AsyncLocalStorage } from "node:async_hooks";
import { logger } from "@spanscope/core";

/** Ambient metadata for one evaluation or prediction call. */
export interface ExecutionContext {
  readonly requestId: string;
  readonly isEvaluate: boolean;
}

/** Read access to the innermost active execution context. */
export interface ExecutionContextProvider {
  current(): ExecutionContext | undefined;
}

/**
 * Task-local execution context stack.
 *
 * Owned by whatever layer intercepts calls: it wraps an invocation in
 * run(), and everything that runs inside, across awaits, sees that context.
 * Nested run() calls shadow the outer context until they return; concurrent
 * tasks each see their own.
 */
export class ExecutionContextScope implements ExecutionContextProvider {
  readonly #storage = new AsyncLocalStorage<ExecutionContext>();

  run<T>(context: ExecutionContext, fn: () => T): T {
    return this.#storage.run(context, fn);
  }

  current(): ExecutionContext | undefined {
    return this.#storage.getStore();
  }
}

/**
 * Request id of the innermost active context, if its evaluation flag
 * equals `isEvaluate`. Returns null when there is no provider, no active
 * context, or the flag does not match.
 */
export function maybeGetRequestId(
  isEvaluate: boolean,
  provider?: ExecutionContextProvider,
): string | null {
  if (!provider) return null;

  let context: ExecutionContext | undefined;
  try {
    context = provider.current();
  } catch (err) {
    logger.debug("execution context unavailable", {
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }

  if (!context || context.isEvaluate !== isEvaluate) return null;
  return context.requestId;
}

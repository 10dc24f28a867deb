/**
 * @module
 * Context plumbing around pipeline stages: the scoped correlation context a
 * caller injects (acquired and released around every stage), and the task
 * context the group itself exposes to code running inside a stage.
 */

import { createContext as createUnctx } from "unctx";
import { AsyncLocalStorage } from "node:async_hooks";
import type { CancellationToken } from "./cancellation";
import { type Logger } from "./logger";

// =================================================================
// Section 1: Logging Context Bracket
// =================================================================

/**
 * A scoped correlation context (think MDC values, request ids). The group
 * never inspects it; it only calls `acquire()` before and `release()` after
 * every stage it runs.
 */
export interface LoggingContext {
  acquire(): void;
  release(): void;
}

/**
 * Runs `body` between `context.acquire()` and `context.release()`. Release
 * happens on every exit path; a release failure is logged and never replaces
 * the body's own outcome. Without a context the body simply runs.
 *
 * Each call gets its own correlation scope, so values a context publishes
 * on acquire stay with this body and never reach the caller.
 */
export async function withLoggingContext<T>(
  context: LoggingContext | undefined,
  logger: Logger,
  body: () => T | Promise<T>,
): Promise<T> {
  if (!context) return body();
  return correlationStorage.run(correlationStorage.getStore(), () =>
    bracket(context, logger, body),
  );
}

async function bracket<T>(
  context: LoggingContext,
  logger: Logger,
  body: () => T | Promise<T>,
): Promise<T> {
  context.acquire();
  try {
    return await body();
  } finally {
    try {
      context.release();
    } catch (releaseError) {
      logger.error("[LoggingContext] Exception closing logging context", releaseError);
    }
  }
}

// =================================================================
// Section 2: Correlation Context Provider
// =================================================================

interface CorrelationFrame {
  readonly values: Readonly<Record<string, unknown>>;
  readonly parent: CorrelationFrame | undefined;
}

// Async-scoped: concurrent stages of different groups each see their own frame.
const correlationStorage = new AsyncLocalStorage<CorrelationFrame | undefined>();

/**
 * A `LoggingContext` that publishes a fixed set of correlation values while it
 * is acquired. The values follow the acquiring code across `await`s and are
 * invisible to concurrently running code elsewhere. Nested acquires stack;
 * each release restores what was visible before the matching acquire.
 */
export interface CorrelationContext extends LoggingContext {
  readonly values: Readonly<Record<string, unknown>>;
  /** Number of acquires not yet matched by a release, across all scopes. */
  readonly depth: number;
}

/**
 * Creates the default correlation provider.
 *
 * @example
 * ```typescript
 * const group = createTaskGroup({
 *   loggingContext: createCorrelationContext({ requestId: "req-42" }),
 * });
 * group.addTask("lookup", () => {
 *   log.info("looking up", useCorrelation()); // { requestId: "req-42" }
 * });
 * ```
 */
export function createCorrelationContext(
  values: Record<string, unknown>,
): CorrelationContext {
  const frozen = Object.freeze({ ...values });
  let depth = 0;

  return {
    values: frozen,
    get depth() {
      return depth;
    },
    acquire() {
      depth++;
      correlationStorage.enterWith({
        values: frozen,
        parent: correlationStorage.getStore(),
      });
    },
    release() {
      if (depth === 0) return;
      depth--;
      const frame = correlationStorage.getStore();
      if (frame?.values === frozen) {
        correlationStorage.enterWith(frame.parent);
      }
    },
  };
}

/**
 * Returns the correlation values of the currently acquired correlation
 * context, or `undefined` when none is acquired.
 */
export function useCorrelation(): Readonly<Record<string, unknown>> | undefined {
  return correlationStorage.getStore()?.values;
}

// =================================================================
// Section 3: Task Context
// =================================================================

/** The pipeline stages a task goes through. */
export type TaskStage = "work" | "callback" | "evaluation";

/**
 * What code running inside a stage can learn about the task it belongs to.
 */
export interface TaskContext {
  readonly taskId: string;
  readonly taskName: string;
  readonly stage: TaskStage;
  readonly token: CancellationToken;
}

const taskUnctx = createUnctx<TaskContext>({
  asyncContext: true,
  AsyncLocalStorage,
});

/**
 * Runs `body` with `context` as the active task context. The context follows
 * the body across `await`s.
 * @internal
 */
export function runInTaskContext<T>(
  context: TaskContext,
  body: () => T | Promise<T>,
): Promise<T> {
  return taskUnctx.callAsync(context, body);
}

/**
 * Returns the task context of the stage currently running, or `undefined`
 * outside of any stage.
 *
 * @example
 * ```typescript
 * group.addTask("mirror-1", async () => {
 *   logger.info(`running ${useTaskContext()?.taskName}`);
 * });
 * ```
 */
export function useTaskContext(): TaskContext | undefined {
  return taskUnctx.tryUse() ?? undefined;
}

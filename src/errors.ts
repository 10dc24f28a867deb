/**
 * @module
 * Error types raised or reported by task groups. Structural errors are thrown
 * to the caller; task failures never are, they travel through the group's
 * error channel (its logger and `onError` hook) instead.
 */

// =================================================================
// Section 1: Structural Errors
// =================================================================

/**
 * Identifies which structural rule a caller broke.
 * - `GROUP_STARTED`: the group was mutated after `start()`.
 * - `NO_TASKS`: `start()` was called on a group without tasks.
 * - `NO_RESULT`: a single result was requested but no task succeeded.
 * - `AMBIGUOUS_RESULT`: a single result was requested but several tasks succeeded.
 */
export type StructuralErrorCode =
  | "GROUP_STARTED"
  | "NO_TASKS"
  | "NO_RESULT"
  | "AMBIGUOUS_RESULT";

/**
 * Thrown synchronously (or as the rejection of a `waitFor*` promise) when the
 * group is used in a way its lifecycle does not allow. Never retried.
 */
export class StructuralError extends Error {
  public readonly _tag = "StructuralError" as const;
  public readonly code: StructuralErrorCode;

  constructor(code: StructuralErrorCode, message: string) {
    super(message);
    this.name = "StructuralError";
    this.code = code;
    Object.setPrototypeOf(this, StructuralError.prototype);
  }
}

/**
 * Type guard to check if an error is a StructuralError.
 */
export function isStructuralError(error: unknown): error is StructuralError {
  return (
    error instanceof StructuralError && error._tag === "StructuralError"
  );
}

// =================================================================
// Section 2: Task Failures
// =================================================================

/**
 * The pipeline stage a failure was raised in.
 */
export type FailureStage =
  | "work"
  | "callback"
  | "evaluator"
  | "completion-callback";

/**
 * Base class of every failure a group reports through its error channel.
 * The original exception is kept as `cause`.
 */
export abstract class TaskFailure extends Error {
  public abstract readonly stage: FailureStage;
  /** Generated id of the failing task; absent for group-level failures. */
  public readonly taskId?: string;
  public readonly taskName?: string;

  protected constructor(
    message: string,
    cause: unknown,
    task?: { readonly id: string; readonly name: string },
  ) {
    super(message, { cause });
    this.taskId = task?.id;
    this.taskName = task?.name;
  }
}

/** An exception raised by a task's work. */
export class WorkFailure extends TaskFailure {
  public readonly _tag = "WorkFailure" as const;
  public readonly stage = "work" as const;

  constructor(task: { readonly id: string; readonly name: string }, cause: unknown) {
    super(`Exception running task [${task.name}]: ${describe(cause)}`, cause, task);
    this.name = "WorkFailure";
    Object.setPrototypeOf(this, WorkFailure.prototype);
  }
}

/** An exception raised by a task's completion callback. */
export class CallbackFailure extends TaskFailure {
  public readonly _tag = "CallbackFailure" as const;
  public readonly stage = "callback" as const;

  constructor(task: { readonly id: string; readonly name: string }, cause: unknown) {
    super(
      `Exception executing callback for [${task.name}]: ${describe(cause)}`,
      cause,
      task,
    );
    this.name = "CallbackFailure";
    Object.setPrototypeOf(this, CallbackFailure.prototype);
  }
}

/** An exception raised by the definition of done, or an invalid verdict. */
export class EvaluatorFailure extends TaskFailure {
  public readonly _tag = "EvaluatorFailure" as const;
  public readonly stage = "evaluator" as const;

  constructor(task: { readonly id: string; readonly name: string }, cause: unknown) {
    super(
      `Exception with definition of done on task [${task.name}]: ${describe(cause)}`,
      cause,
      task,
    );
    this.name = "EvaluatorFailure";
    Object.setPrototypeOf(this, EvaluatorFailure.prototype);
  }
}

/** An exception raised by the group's completion callback. */
export class CompletionCallbackFailure extends TaskFailure {
  public readonly _tag = "CompletionCallbackFailure" as const;
  public readonly stage = "completion-callback" as const;

  constructor(cause: unknown) {
    super(`Exception executing completion callback: ${describe(cause)}`, cause);
    this.name = "CompletionCallbackFailure";
    Object.setPrototypeOf(this, CompletionCallbackFailure.prototype);
  }
}

/**
 * Type guard to check if an error is one of the reported task failures.
 */
export function isTaskFailure(error: unknown): error is TaskFailure {
  return error instanceof TaskFailure;
}

// =================================================================
// Section 3: Cancellation
// =================================================================

/**
 * The default reason a cancellation token carries, and what
 * `CancellationToken.throwIfCancelled()` throws.
 */
export class TaskCancelledError extends Error {
  public readonly _tag = "TaskCancelledError" as const;
  public readonly taskName?: string;

  constructor(taskName?: string, message?: string) {
    super(
      message ??
        (taskName === undefined
          ? "Operation cancelled"
          : `Task [${taskName}] was cancelled`),
    );
    this.name = "TaskCancelledError";
    this.taskName = taskName;
    Object.setPrototypeOf(this, TaskCancelledError.prototype);
  }
}

/**
 * Type guard to check if an error is a TaskCancelledError.
 */
export function isTaskCancelledError(error: unknown): error is TaskCancelledError {
  return (
    error instanceof TaskCancelledError && error._tag === "TaskCancelledError"
  );
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

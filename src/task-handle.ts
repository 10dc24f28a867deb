/**
 * @module
 * A single unit of work and its completion pipeline. Every handle walks an
 * explicit state machine:
 *
 * ```text
 * pending → running → succeeded | failed
 *         → [callback-scheduled → callback-done]
 *         → [evaluation-done]
 * ```
 *
 * with `cancelled` reachable from every state before the work and its
 * callback have finished. Each stage is posted to the group's executor as an
 * independent unit and runs inside the group's logging context.
 */

import { type Result, ResultAsync } from "neverthrow";
import { CancellationToken } from "./cancellation";
import {
  type TaskStage,
  runInTaskContext,
  withLoggingContext,
  type LoggingContext,
} from "./context";
import {
  CallbackFailure,
  EvaluatorFailure,
  StructuralError,
  TaskCancelledError,
  WorkFailure,
  type TaskFailure,
} from "./errors";
import type { Evaluator } from "./evaluator";
import type { Executor } from "./executor";
import type { Logger } from "./logger";
import { notDone, type Outcome } from "./outcome";

// =================================================================
// Section 1: Types
// =================================================================

/**
 * The computation a task performs. It receives the task's cancellation token
 * and may poll it or hand `token.signal` to cancellable APIs.
 */
export type Work<T> = (token: CancellationToken) => T | Promise<T>;

/**
 * A per-task completion handler. Exactly one of `value` and `error` is
 * meaningful: `error` is `undefined` when the work succeeded.
 */
export type TaskCallback<T> = (
  value: T | undefined,
  error: unknown,
) => void | Promise<void>;

export type TaskState =
  | "pending"
  | "running"
  | "succeeded"
  | "failed"
  | "callback-scheduled"
  | "callback-done"
  | "evaluation-done"
  | "cancelled";

/** The work's terminal result: its value, or the error it threw. */
export type TaskSettlement<T> = Result<T, unknown>;

const TRANSITIONS: Readonly<Record<TaskState, readonly TaskState[]>> = {
  pending: ["running", "cancelled"],
  running: ["succeeded", "failed", "cancelled"],
  succeeded: ["callback-scheduled", "evaluation-done", "cancelled"],
  failed: ["callback-scheduled", "evaluation-done", "cancelled"],
  "callback-scheduled": ["callback-done", "cancelled"],
  "callback-done": ["evaluation-done"],
  "evaluation-done": [],
  cancelled: [],
};

/**
 * Returns true if a handle may move from `from` to `to`.
 */
export function canTransition(from: TaskState, to: TaskState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * The read-only view of a task the group hands out and keeps in its list.
 */
export interface TaskRef {
  readonly id: string;
  readonly name: string;
  readonly state: TaskState;
  readonly isFinished: boolean;
  readonly hasCallback: boolean;
  cancel(reason?: unknown): boolean;
}

/**
 * What a handle needs from the group that owns it.
 * @internal
 */
export interface TaskOwner<R, G> {
  readonly group: G;
  readonly isStarted: boolean;
  readonly executor: Executor;
  readonly loggingContext: LoggingContext | undefined;
  readonly logger: Logger;
  readonly evaluator: Evaluator<R> | undefined;
  recordOutcome(task: TaskRef, outcome: Outcome<R>): void;
  cancelRemaining(excluding?: TaskRef): number;
  reportError(failure: TaskFailure): void;
}

const CANCELLED = Symbol("cancelled");

// =================================================================
// Section 2: TaskHandle
// =================================================================

/**
 * Not meant to be instantiated directly, use `TaskGroup.addTask` instead.
 *
 * @template T The value the work produces.
 * @template R The value type of the group's outcomes.
 * @template G The owning group, returned by `attachCallback` for chaining.
 */
export class TaskHandle<T, R, G = unknown> implements TaskRef {
  readonly id: string;
  readonly name: string;
  private currentState: TaskState = "pending";
  private callback: TaskCallback<T> | undefined;
  private result: TaskSettlement<T> | undefined;
  private pipeline: Promise<void> | undefined;
  private readonly token = new CancellationToken();

  constructor(
    id: string,
    name: string,
    private readonly work: Work<T>,
    private readonly owner: TaskOwner<R, G>,
  ) {
    this.id = id;
    this.name = name;
  }

  get state(): TaskState {
    return this.currentState;
  }

  /** The work's terminal result, once known. Stays unset if cancelled first. */
  get settlement(): TaskSettlement<T> | undefined {
    return this.result;
  }

  get hasCallback(): boolean {
    return this.callback !== undefined;
  }

  /**
   * True once the work and its callback (if any) have finished, or the task
   * was cancelled. A finished task ignores cancellation requests.
   */
  get isFinished(): boolean {
    switch (this.currentState) {
      case "callback-done":
      case "evaluation-done":
      case "cancelled":
        return true;
      case "succeeded":
      case "failed":
        return !this.hasCallback;
      default:
        return false;
    }
  }

  /**
   * Sets the handler that receives the work's value or error once it is
   * known. Replaces a previously attached handler.
   *
   * @returns The owning group so further tasks can be chained.
   * @throws {StructuralError} If the group has already started.
   */
  attachCallback(callback: TaskCallback<T>): G {
    if (this.owner.isStarted) {
      throw new StructuralError(
        "GROUP_STARTED",
        "Cannot change callback of currently executing instance",
      );
    }
    this.callback = callback;
    return this.owner.group;
  }

  /**
   * Requests cancellation. Stages that have not started are skipped and the
   * task ends in `cancelled`; work already running is not interrupted but its
   * result is discarded. Returns `false` if the task was already finished.
   */
  cancel(reason: unknown = new TaskCancelledError(this.name)): boolean {
    if (this.isFinished) return false;
    this.transition("cancelled");
    try {
      this.token.cancel(reason);
    } catch (listenerError) {
      this.owner.logger.error(
        `[TaskHandle: ${this.name}] Cancellation listener failed`,
        listenerError,
      );
    }
    return true;
  }

  /**
   * Starts the pipeline on first call and returns it. The returned promise
   * never rejects.
   * @internal
   */
  begin(): Promise<void> {
    if (!this.pipeline) {
      this.pipeline = this.run().catch((error: unknown) => {
        this.owner.logger.error(
          `[TaskHandle: ${this.name}] Pipeline failed unexpectedly`,
          error,
        );
      });
    }
    return this.pipeline;
  }

  // --- Pipeline ---

  private async run(): Promise<void> {
    const settlement = await this.runWork();
    if (settlement === CANCELLED) return;

    const callback = this.callback;
    if (callback) {
      const delivered = await this.runCallback(callback, settlement);
      if (!delivered) return;
    } else if (settlement.isErr()) {
      this.owner.reportError(new WorkFailure(this, settlement.error));
    }

    await this.runEvaluation(settlement);
  }

  private async runWork(): Promise<TaskSettlement<T> | typeof CANCELLED> {
    if (this.token.isCancelled) return CANCELLED;
    this.transition("running");
    this.owner.logger.debug(`[TaskHandle: ${this.name}] Starting work`);

    const settlement = await this.runStage("work", () => this.work(this.token));
    // A sweep may land between the stage settling and this continuation.
    if (settlement === CANCELLED || this.token.isCancelled) return CANCELLED;

    this.result = settlement;
    this.transition(settlement.isOk() ? "succeeded" : "failed");
    return settlement;
  }

  private async runCallback(
    callback: TaskCallback<T>,
    settlement: TaskSettlement<T>,
  ): Promise<boolean> {
    if (this.token.isCancelled) return false;
    this.transition("callback-scheduled");

    const delivery = await this.runStage("callback", () =>
      settlement.match(
        (value) => callback(value, undefined),
        (error) => callback(undefined, error),
      ),
    );
    if (delivery === CANCELLED || this.token.isCancelled) return false;

    if (delivery.isErr()) {
      this.owner.reportError(new CallbackFailure(this, delivery.error));
    }
    this.transition("callback-done");
    return true;
  }

  private async runEvaluation(settlement: TaskSettlement<T>): Promise<void> {
    const evaluator = this.owner.evaluator;
    if (!evaluator) return;

    const verdict = await this.runStage("evaluation", () =>
      settlement.match(
        (value) => evaluator.evaluate(value, undefined, this.name),
        (error) => evaluator.evaluate(undefined, error, this.name),
      ),
    );
    if (verdict === CANCELLED || this.token.isCancelled) return;

    let outcome: Outcome<R>;
    if (verdict.isErr()) {
      this.owner.reportError(new EvaluatorFailure(this, verdict.error));
      outcome = notDone();
    } else {
      outcome = verdict.value;
    }

    this.transition("evaluation-done");
    this.owner.recordOutcome(this, outcome);
    if (outcome.succeeded) {
      this.owner.logger.info(
        `[TaskHandle: ${this.name}] Definition of done met, cancelling remaining tasks`,
      );
      this.owner.cancelRemaining(this);
    }
  }

  /**
   * Posts one stage to the executor, inside the logging and task contexts.
   * Resolves with the stage's result, or `CANCELLED` as soon as the token is
   * cancelled, whichever comes first. Never rejects.
   */
  private async runStage<S>(
    stage: TaskStage,
    body: () => S | Promise<S>,
  ): Promise<Result<S, unknown> | typeof CANCELLED> {
    if (this.token.isCancelled) return CANCELLED;

    const { executor, loggingContext, logger } = this.owner;
    const scheduled = ResultAsync.fromPromise(
      executor.postTask(
        () =>
          runInTaskContext(
            { taskId: this.id, taskName: this.name, stage, token: this.token },
            () => withLoggingContext(loggingContext, logger, body),
          ),
        { signal: this.token.signal },
      ),
      (error) => error,
    );

    const settled = await Promise.race([
      scheduled,
      this.token.whenCancelled.then((): typeof CANCELLED => CANCELLED),
    ]);
    return this.token.isCancelled ? CANCELLED : settled;
  }

  private transition(to: TaskState): void {
    if (!canTransition(this.currentState, to)) {
      throw new Error(
        `[TaskHandle: ${this.name}] Illegal state transition ${this.currentState} -> ${to}`,
      );
    }
    this.currentState = to;
  }
}

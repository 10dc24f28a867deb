/**
 * @module
 * The coordinator of a group of parallel tasks. A group runs every task on a
 * shared executor, lets each task report to its own callback, and optionally
 * applies a shared "definition of done": the first task whose result satisfies
 * it stops the others.
 *
 * @example
 * ```typescript
 * const group = createTaskGroup<string>({ executor: createExecutor({ concurrency: 8 }) });
 *
 * group
 *   .addTask("mirror-eu", (token) => fetchText(euUrl, token.signal))
 *   .attachCallback(logResponse)
 *   .addTask("mirror-us", (token) => fetchText(usUrl, token.signal))
 *   .attachCallback(logResponse)
 *   .setEvaluator((html) =>
 *     typeof html === "string" && html.includes("<title>") ? done(html) : notDone(),
 *   )
 *   .setCompletionCallback(() => logger.info("All tasks finished!"));
 *
 * const page = await group.waitForSingleResult();
 * ```
 *
 * Tasks do not start when added: work begins with `start()` or any of the
 * `waitFor*` methods.
 */

import { ResultAsync } from "neverthrow";
import { withLoggingContext, type LoggingContext } from "./context";
import {
  CompletionCallbackFailure,
  StructuralError,
  TaskCancelledError,
  type TaskFailure,
} from "./errors";
import { Evaluator, type DefinitionOfDone } from "./evaluator";
import { getDefaultExecutor, type Executor } from "./executor";
import { consoleLogger, type Logger } from "./logger";
import type { Outcome } from "./outcome";
import { ResultRegistry } from "./result-registry";
import { TaskHandle, type TaskOwner, type TaskRef, type Work } from "./task-handle";

/**
 * Construction options of a task group. Every option is optional.
 */
export interface TaskGroupOptions {
  /**
   * The worker pool every stage of every task runs on.
   * @default the shared executor from `getDefaultExecutor()`
   */
  executor?: Executor;
  /**
   * Scoped correlation context acquired before and released after every
   * stage, e.g. one from `createCorrelationContext`.
   */
  loggingContext?: LoggingContext;
  /**
   * Where failures and lifecycle events are logged.
   * @default consoleLogger
   */
  logger?: Logger;
  /**
   * Called with every failure the group reports, after it has been logged.
   */
  onError?: (failure: TaskFailure) => void;
}

/** A completion callback run once every task's pipeline has finished. */
export type CompletionCallback = () => void | Promise<void>;

let groupCounter = 0;

/** Runs a set of tasks in parallel and collects their outcomes. */
export class TaskGroup<R = unknown> {
  private readonly handles: TaskRef[] = [];
  private readonly pipelines = new Map<string, () => Promise<void>>();
  private readonly registry = new ResultRegistry<R>();
  private readonly owner: TaskOwner<R, this>;
  private readonly label: string;
  private evaluator: Evaluator<R> | undefined;
  private completionCallback: CompletionCallback | undefined;
  private started = false;
  private aggregateResolved = false;
  private completion: Promise<void> | undefined;
  private nextTaskNumber = 0;

  private readonly executor: Executor;
  private readonly loggingContext: LoggingContext | undefined;
  private readonly logger: Logger;
  private readonly onError: ((failure: TaskFailure) => void) | undefined;

  constructor(options: TaskGroupOptions = {}) {
    this.executor = options.executor ?? getDefaultExecutor();
    this.loggingContext = options.loggingContext;
    this.logger = options.logger ?? consoleLogger;
    this.onError = options.onError;
    this.label = `group-${++groupCounter}`;

    // The view of this group handed to its tasks.
    const group = this;
    this.owner = {
      group,
      get isStarted() {
        return group.started;
      },
      executor: this.executor,
      loggingContext: this.loggingContext,
      logger: this.logger,
      get evaluator() {
        return group.evaluator;
      },
      recordOutcome: (task, outcome) => this.recordOutcome(task, outcome),
      cancelRemaining: (excluding) => this.cancelRemaining(excluding),
      reportError: (failure) => this.reportError(failure),
    };
  }

  // --- Building the group ---

  /**
   * Registers a task. Its work begins when the group starts.
   *
   * @param name A label for the task; names need not be unique.
   * @param work What the task does. It receives the task's cancellation token.
   * @throws {StructuralError} If the group has already started.
   */
  addTask<T>(name: string, work: Work<T>): TaskHandle<T, R, this> {
    this.assertNotStarted("Cannot add new tasks to currently executing instance");
    if (typeof work !== "function") {
      throw new TypeError(`Work of task [${name}] must be a function`);
    }

    const id = `${this.label}/task-${++this.nextTaskNumber}`;
    const handle = new TaskHandle<T, R, this>(id, name, work, this.owner);
    this.handles.push(handle);
    this.pipelines.set(id, () => handle.begin());
    this.logger.debug(`[TaskGroup: ${this.label}] Added task [${name}] as ${id}`);
    return handle;
  }

  /**
   * Sets the callback run once after every task has finished.
   * @throws {StructuralError} If the group has already started.
   */
  setCompletionCallback(callback: CompletionCallback): this {
    this.assertNotStarted("Cannot change callback of currently executing instance");
    this.completionCallback = callback;
    return this;
  }

  /**
   * Sets the definition of done applied to every task of the group, including
   * tasks added later. Once it accepts a task's result, all unfinished tasks
   * are cancelled.
   * @throws {StructuralError} If the group has already started.
   */
  setEvaluator(definitionOfDone: DefinitionOfDone<R>): this {
    this.assertNotStarted("Cannot change definition of done of currently executing instance");
    this.evaluator = new Evaluator(definitionOfDone);
    return this;
  }

  // --- Running the group ---

  /**
   * Starts every task and returns immediately. Calling it again has no effect.
   * @throws {StructuralError} If the group has no tasks.
   */
  start(): this {
    if (this.started) return this;
    if (this.handles.length === 0) {
      throw new StructuralError("NO_TASKS", "No tasks defined!");
    }

    this.started = true;
    this.logger.debug(
      `[TaskGroup: ${this.label}] Starting ${this.handles.length} task(s)`,
    );

    const aggregate = Promise.all(
      [...this.pipelines.values()].map((begin) => begin()),
    ).then(() => {
      this.aggregateResolved = true;
      this.logger.debug(`[TaskGroup: ${this.label}] All tasks finished`);
    });
    this.completion = aggregate.then(() => this.runCompletionCallback());
    return this;
  }

  /**
   * Starts the group if needed and resolves once every task's pipeline and
   * the completion callback have finished. Never rejects because of a task.
   */
  async waitForTasks(): Promise<void> {
    this.start();
    await this.completion;
  }

  /**
   * Waits for the tasks, then returns a snapshot of the recorded outcomes in
   * task insertion order. Empty when no definition of done is set.
   */
  async waitForResults(): Promise<ResultRegistry<R>> {
    await this.waitForTasks();
    return this.registry.snapshot(this.handles.map((handle) => handle.id));
  }

  /**
   * Waits for the tasks, then returns the value of the one successful outcome.
   * @throws {StructuralError} `NO_RESULT` if no task succeeded,
   *         `AMBIGUOUS_RESULT` if more than one did.
   */
  async waitForSingleResult(): Promise<R | undefined> {
    const results = await this.waitForResults();
    return results.getSingleResult().value;
  }

  /**
   * Like `waitForSingleResult`, but reports structural errors as an `Err`
   * instead of rejecting.
   */
  waitForSingleResultSafe(): ResultAsync<R | undefined, StructuralError> {
    return ResultAsync.fromPromise(this.waitForResults(), (error) => {
      // Only structural errors become an Err; anything else still rejects.
      if (error instanceof StructuralError) return error;
      throw error;
    }).andThen((results) =>
      results.getSingleResultSafe().map((outcome) => outcome.value),
    );
  }

  /** False until started; afterwards, whether every pipeline has finished. */
  isDone(): boolean {
    return this.started && this.aggregateResolved;
  }

  /**
   * Requests cancellation of every task, other than `excluding`, whose work
   * or callback has not finished yet. Safe to call repeatedly.
   *
   * @returns The number of tasks this call cancelled.
   */
  cancelRemaining(excluding?: TaskRef): number {
    let cancelled = 0;
    for (const handle of this.handles) {
      if (handle === excluding || handle.isFinished) continue;
      const reason = new TaskCancelledError(
        handle.name,
        excluding
          ? `Task [${handle.name}] was cancelled after task [${excluding.name}] met the definition of done`
          : undefined,
      );
      if (handle.cancel(reason)) cancelled++;
    }
    if (cancelled > 0) {
      this.logger.debug(
        `[TaskGroup: ${this.label}] Cancelled ${cancelled} remaining task(s)`,
      );
    }
    return cancelled;
  }

  // --- Inspection ---

  /** The group's tasks in insertion order. */
  get tasks(): readonly TaskRef[] {
    return [...this.handles];
  }

  get size(): number {
    return this.handles.length;
  }

  get isStarted(): boolean {
    return this.started;
  }

  /** The live registry; may still be filling up while tasks run. */
  get results(): ResultRegistry<R> {
    return this.registry;
  }

  // --- Internals ---

  private assertNotStarted(message: string): void {
    if (this.started) {
      throw new StructuralError("GROUP_STARTED", message);
    }
  }

  private recordOutcome(task: TaskRef, outcome: Outcome<R>): void {
    if (!this.registry.record(task, outcome)) {
      this.logger.warn(
        `[TaskGroup: ${this.label}] Ignoring second outcome for task [${task.name}]`,
      );
    }
  }

  private reportError(failure: TaskFailure): void {
    this.logger.error(`[TaskGroup: ${this.label}] ${failure.message}`, failure);
    if (!this.onError) return;
    try {
      this.onError(failure);
    } catch (hookError) {
      this.logger.error(`[TaskGroup: ${this.label}] onError hook failed`, hookError);
    }
  }

  private async runCompletionCallback(): Promise<void> {
    const callback = this.completionCallback;
    if (!callback) return;
    try {
      await this.executor.postTask(() =>
        withLoggingContext(this.loggingContext, this.logger, callback),
      );
    } catch (error) {
      this.reportError(new CompletionCallbackFailure(error));
    }
  }
}

/**
 * Creates a new task group.
 *
 * @template R The value type of the outcomes the definition of done produces.
 */
export function createTaskGroup<R = unknown>(options: TaskGroupOptions = {}): TaskGroup<R> {
  return new TaskGroup<R>(options);
}

/**
 * @module
 * The store of per-task outcomes. Entries are keyed by the task's generated
 * id, since task names are labels and may repeat; name-based accessors are
 * layered on top. Each task's entry is written at most once, by the pipeline
 * owning that task, and may be read at any time.
 */

import { type Result, ok, err } from "neverthrow";
import { StructuralError } from "./errors";
import type { Outcome } from "./outcome";

/**
 * One registry entry: the outcome together with the task it belongs to.
 */
export interface RegisteredOutcome<R> {
  readonly taskId: string;
  readonly taskName: string;
  readonly outcome: Outcome<R>;
}

export class ResultRegistry<R> implements Iterable<RegisteredOutcome<R>> {
  private readonly entries = new Map<string, RegisteredOutcome<R>>();

  /**
   * Records `outcome` for `task`. Returns `false`, leaving the registry
   * untouched, if the task already has an outcome.
   */
  record(
    task: { readonly id: string; readonly name: string },
    outcome: Outcome<R>,
  ): boolean {
    if (this.entries.has(task.id)) return false;
    this.entries.set(task.id, {
      taskId: task.id,
      taskName: task.name,
      outcome,
    });
    return true;
  }

  has(taskId: string): boolean {
    return this.entries.has(taskId);
  }

  /** The outcome recorded for the task with this id. */
  get(taskId: string): Outcome<R> | undefined {
    return this.entries.get(taskId)?.outcome;
  }

  /** The first recorded outcome of a task with this name. */
  getByName(taskName: string): Outcome<R> | undefined {
    for (const entry of this.entries.values()) {
      if (entry.taskName === taskName) return entry.outcome;
    }
    return undefined;
  }

  /** Every recorded outcome of tasks with this name. */
  getAllByName(taskName: string): Outcome<R>[] {
    return [...this.entries.values()]
      .filter((entry) => entry.taskName === taskName)
      .map((entry) => entry.outcome);
  }

  /**
   * Outcomes keyed by task name. When several tasks share a name the one
   * recorded last wins; use iteration or `getAllByName` to see all of them.
   */
  getResults(): Map<string, Outcome<R>> {
    const results = new Map<string, Outcome<R>>();
    for (const entry of this.entries.values()) {
      results.set(entry.taskName, entry.outcome);
    }
    return results;
  }

  /** Names of the tasks that have an outcome, one per entry. */
  getTasks(): string[] {
    return [...this.entries.values()].map((entry) => entry.taskName);
  }

  get size(): number {
    return this.entries.size;
  }

  isEmpty(): boolean {
    return this.entries.size === 0;
  }

  /** Entries whose outcome succeeded. */
  successful(): RegisteredOutcome<R>[] {
    return [...this.entries.values()].filter((entry) => entry.outcome.succeeded);
  }

  hasMoreThanOneResult(): boolean {
    return this.successful().length > 1;
  }

  /**
   * The single successful outcome, or a `StructuralError` when there is none
   * (`NO_RESULT`) or more than one (`AMBIGUOUS_RESULT`).
   */
  getSingleResultSafe(): Result<Outcome<R>, StructuralError> {
    const successful = this.successful();
    if (successful.length > 1) {
      return err(
        new StructuralError(
          "AMBIGUOUS_RESULT",
          `More than one result found (${successful
            .map((entry) => entry.taskName)
            .join(", ")}), you will need to pick out what you need.`,
        ),
      );
    }
    const [single] = successful;
    if (!single) {
      return err(new StructuralError("NO_RESULT", "No results found!"));
    }
    return ok(single.outcome);
  }

  /**
   * The single successful outcome.
   * @throws {StructuralError} If no task or more than one task succeeded.
   */
  getSingleResult(): Outcome<R> {
    const result = this.getSingleResultSafe();
    if (result.isErr()) throw result.error;
    return result.value;
  }

  /**
   * A detached copy. With `order`, entries for those task ids come first in
   * that order, followed by any others in recording order.
   */
  snapshot(order: Iterable<string> = []): ResultRegistry<R> {
    const copy = new ResultRegistry<R>();
    for (const taskId of order) {
      const entry = this.entries.get(taskId);
      if (entry) copy.entries.set(taskId, entry);
    }
    for (const [taskId, entry] of this.entries) {
      if (!copy.entries.has(taskId)) copy.entries.set(taskId, entry);
    }
    return copy;
  }

  [Symbol.iterator](): Iterator<RegisteredOutcome<R>> {
    return this.entries.values();
  }
}

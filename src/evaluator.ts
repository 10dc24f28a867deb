/**
 * @module
 * The "definition of done": a shared stopping rule applied to every task's
 * terminal result. The first task whose result it accepts stops the others.
 */

import { isOutcome, toOutcome, type Outcome } from "./outcome";

/**
 * The user function behind an evaluator. It receives the task's value (or
 * `undefined` if the work failed), the work's error (or `undefined`) and the
 * task's name. Tasks of one group may produce values of different types, so
 * the value arrives as `unknown` and is narrowed by the function.
 *
 * @example
 * ```typescript
 * const containsApple: DefinitionOfDone<string> = (value, error, name) =>
 *   typeof value === "string" && value.toLowerCase().includes("apple")
 *     ? done(value)
 *     : notDone();
 * ```
 */
export type DefinitionOfDone<R> = (
  value: unknown,
  error: unknown,
  taskName: string,
) => Outcome<R> | Promise<Outcome<R>>;

/** Applies a definition of done to a task's terminal result. */
export class Evaluator<R> {
  constructor(private readonly definitionOfDone: DefinitionOfDone<R>) {}

  /**
   * Applies the definition of done. Rejects if the function throws or hands
   * back something that is not an outcome.
   */
  async evaluate(value: unknown, error: unknown, taskName: string): Promise<Outcome<R>> {
    const verdict = await this.definitionOfDone(value, error, taskName);
    // User code outside the type system may hand back anything.
    if (!isOutcome(verdict)) {
      const received: unknown = verdict;
      throw new TypeError(
        `Definition of done must return an outcome, got ${
          received === null ? "null" : typeof received
        }`,
      );
    }
    return toOutcome(verdict);
  }
}

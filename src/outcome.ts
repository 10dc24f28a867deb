/**
 * The verdict a definition of done returns for one task: did the task's
 * result satisfy the stopping condition, and what value (if any) it produced.
 */
export interface Outcome<R> {
  readonly succeeded: boolean;
  readonly value?: R;
}

/** A successful outcome carrying `value`. Stops the remaining tasks. */
export function done<R>(value: R): Outcome<R> {
  return { succeeded: true, value };
}

/** An unsuccessful outcome, optionally keeping the value that was inspected. */
export function notDone<R = never>(value?: R): Outcome<R> {
  return value === undefined ? { succeeded: false } : { succeeded: false, value };
}

export function hasValue<R>(outcome: Outcome<R>): outcome is Outcome<R> & { readonly value: R } {
  return outcome.value !== undefined && outcome.value !== null;
}

/**
 * Runtime check for values handed back by user code. Only `succeeded` is
 * required, and it must be a boolean when present.
 */
export function isOutcome(value: unknown): value is Outcome<unknown> {
  if (typeof value !== "object" || value === null) return false;
  return !("succeeded" in value) || typeof value.succeeded === "boolean";
}

/**
 * Normalises an outcome from user code: a missing `succeeded` means `false`.
 */
export function toOutcome<R>(outcome: Outcome<R>): Outcome<R> {
  const succeeded = outcome.succeeded === true;
  return "value" in outcome && outcome.value !== undefined
    ? { succeeded, value: outcome.value }
    : { succeeded };
}

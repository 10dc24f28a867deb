// cancellation.ts
import { TaskCancelledError } from "./errors";

/**
 * Cooperative cancellation handed to every work computation. Cancelling is a
 * request: work that never looks at its token runs to completion, its result
 * is simply discarded by the group.
 *
 * @example
 * ```typescript
 * group.addTask("fetch mirror", async (token) => {
 *   const response = await fetch(url, { signal: token.signal });
 *   token.throwIfCancelled();
 *   return response.text();
 * });
 * ```
 */
export class CancellationToken {
  private cancelled = false;
  private cancelReason: unknown = undefined;
  private readonly callbacks = new Set<(reason: unknown) => void>();
  private readonly controller = new AbortController();
  private resolveCancelled: () => void = () => {};

  /** Resolves once the token is cancelled; stays pending otherwise. */
  readonly whenCancelled: Promise<void> = new Promise<void>((resolve) => {
    this.resolveCancelled = resolve;
  });

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** The reason passed to `cancel()`, `undefined` while not cancelled. */
  get reason(): unknown {
    return this.cancelReason;
  }

  /** An `AbortSignal` aborted together with this token, for fetch & co. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  onCancel(callback: (reason: unknown) => void): () => void {
    if (this.cancelled) {
      callback(this.cancelReason);
      return () => {};
    }
    this.callbacks.add(callback);
    return () => this.callbacks.delete(callback);
  }

  /**
   * Cancels the token. Returns `false` if it was already cancelled. Errors
   * thrown by `onCancel` listeners are collected and rethrown together once
   * every listener has run.
   */
  cancel(reason: unknown = new TaskCancelledError()): boolean {
    if (this.cancelled) return false;
    this.cancelled = true;
    this.cancelReason = reason;
    this.resolveCancelled();
    this.controller.abort(reason);

    const errors: unknown[] = [];
    for (const callback of this.callbacks) {
      try {
        callback(reason);
      } catch (error) {
        errors.push(error);
      }
    }
    this.callbacks.clear();

    if (errors.length > 0) {
      throw new AggregateError(errors, "One or more cancellation listeners failed");
    }
    return true;
  }

  throwIfCancelled(): void {
    if (this.cancelled) {
      throw this.cancelReason instanceof Error
        ? this.cancelReason
        : new TaskCancelledError();
    }
  }
}

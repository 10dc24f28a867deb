/**
 * @module
 * The shared worker pool every pipeline stage runs on. An executor accepts
 * callbacks through `postTask`, runs at most `concurrency` of them at a time
 * and starts the rest in FIFO order as slots free up.
 */

import { availableParallelism } from "node:os";
import { TaskCancelledError } from "./errors";

// =================================================================
// Section 1: Core Types
// =================================================================

/**
 * Per-call scheduling options.
 */
export interface PostTaskOptions {
  /**
   * Aborting the signal before the callback starts removes it from the queue
   * and rejects the returned promise with the signal's reason. A callback that
   * already started is not interrupted.
   */
  signal?: AbortSignal;
}

/**
 * Defines the contract for a worker pool. Any object implementing it can be
 * handed to a task group, e.g. to share one pool across several groups.
 */
export interface Executor {
  /**
   * Schedules a callback. The callback never runs synchronously inside
   * `postTask`.
   * @returns A Promise that resolves or rejects with the callback's outcome.
   */
  postTask<T>(callback: () => T | Promise<T>, options?: PostTaskOptions): Promise<T>;
  /** The maximum number of callbacks running at once. */
  readonly concurrency: number;
}

export interface ExecutorOptions {
  /**
   * The maximum number of callbacks that are allowed to run concurrently.
   * @default os.availableParallelism()
   */
  concurrency?: number;
}

// =================================================================
// Section 2: Pool Implementation
// =================================================================

interface Waiter {
  grant(): void;
}

// Semaphore whose waiters can leave the queue when their signal aborts.
class Semaphore {
  private permits: number;
  private readonly queue: Waiter[] = [];

  constructor(permits: number) {
    this.permits = permits;
  }

  get waiting(): number {
    return this.queue.length;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw abortReason(signal);
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.queue.indexOf(waiter);
        if (index !== -1) this.queue.splice(index, 1);
        reject(signal ? abortReason(signal) : new TaskCancelledError());
      };
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next.grant();
    } else {
      this.permits++;
    }
  }
}

class PoolExecutor implements Executor {
  readonly concurrency: number;
  private readonly semaphore: Semaphore;
  private running = 0;

  constructor(concurrency: number) {
    this.concurrency = concurrency;
    this.semaphore = new Semaphore(concurrency);
  }

  /** Callbacks currently running. */
  get active(): number {
    return this.running;
  }

  /** Callbacks waiting for a free slot. */
  get pending(): number {
    return this.semaphore.waiting;
  }

  async postTask<T>(
    callback: () => T | Promise<T>,
    options: PostTaskOptions = {},
  ): Promise<T> {
    const { signal } = options;
    await this.semaphore.acquire(signal);
    this.running++;
    try {
      // The slot may have been granted in the same tick the signal aborted.
      if (signal?.aborted) throw abortReason(signal);
      return await callback();
    } finally {
      this.running--;
      this.semaphore.release();
    }
  }
}

export type PoolStats = Pick<PoolExecutor, "active" | "pending">;

/**
 * Creates a new concurrency-limited executor.
 *
 * @example
 * ```typescript
 * const executor = createExecutor({ concurrency: 4 });
 * const group = createTaskGroup({ executor });
 * ```
 */
export function createExecutor(options: ExecutorOptions = {}): Executor & PoolStats {
  const concurrency = options.concurrency ?? availableParallelism();
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(
      `Executor concurrency must be a positive integer, got ${concurrency}`,
    );
  }
  return new PoolExecutor(concurrency);
}

let defaultExecutor: (Executor & PoolStats) | null = null;

/**
 * The shared executor used by groups created without one, sized to the
 * platform's available parallelism. Created on first use.
 */
export function getDefaultExecutor(): Executor & PoolStats {
  if (!defaultExecutor) {
    defaultExecutor = createExecutor();
  }
  return defaultExecutor;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new TaskCancelledError();
}

import { CancelledError } from "./errors";

/**
 * Process-wide cancellation broadcast plus a registry of the tasks it governs.
 *
 * Shutdown is two-phase: `shutdown()` aborts the shared signal, which every
 * task observes at its next suspension point; `waitShutdownComplete()` then
 * resolves once every spawned task has finished.
 */
export class Shutdown {
  private readonly controller = new AbortController();
  private readonly tasks = new Set<Promise<void>>();
  private readonly onTaskError: (err: unknown) => void;

  constructor(onTaskError: (err: unknown) => void) {
    this.onTaskError = onTaskError;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get requested(): boolean {
    return this.controller.signal.aborted;
  }

  get running(): number {
    return this.tasks.size;
  }

  /**
   * Runs `task` with the shutdown signal. Rejections are reported to the
   * error callback and never escape.
   */
  spawn(task: (signal: AbortSignal) => Promise<void>): void {
    const running: Promise<void> = task(this.signal)
      .catch((err: unknown) => this.onTaskError(err))
      .finally(() => {
        this.tasks.delete(running);
      });
    this.tasks.add(running);
  }

  shutdown(reason: unknown = new CancelledError()): void {
    this.controller.abort(reason);
  }

  async waitShutdownComplete(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all(this.tasks);
    }
  }
}

/**
 * Races `promise` against `signal`; on abort, rejects with `CancelledError`
 * and calls `onCancel` so the losing operation can release its resources.
 */
export function cancellable<T>(
  promise: Promise<T>,
  signal: AbortSignal,
  onCancel?: (value: T) => void
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let cancelled = false;

    const onAbort = () => {
      cancelled = true;
      reject(new CancelledError(undefined, { cause: signal.reason }));
    };

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        if (cancelled) {
          onCancel?.(value);
        } else {
          resolve(value);
        }
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

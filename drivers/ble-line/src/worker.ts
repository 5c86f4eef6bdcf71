import { CancelledError, isCancellation } from "./errors";

export type FailureHandler = (err: unknown, source: string) => void;

export interface Task {
  readonly name: string;
  readonly signal: AbortSignal;
  readonly done: Promise<void>;
  /** Aborts the task and resolves once its body has returned. */
  cancel(): Promise<void>;
}

/**
 * The single context all device I/O runs on: a FIFO of jobs that run one at a
 * time, plus long-running tasks that can be cancelled and awaited. Nothing
 * thrown by a job or task escapes; cancellations end quietly and every other
 * failure goes to `onFailure`.
 */
export class WorkerContext {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private closed = false;

  constructor(private readonly onFailure: FailureHandler) {}

  get isClosed(): boolean {
    return this.closed;
  }

  submit(name: string, job: () => Promise<void> | void): boolean {
    if (this.closed) return false;
    this.pending += 1;
    this.tail = this.tail.then(async () => {
      try {
        await job();
      } catch (err) {
        this.report(err, name);
      } finally {
        this.pending -= 1;
      }
    });
    return true;
  }

  spawn(name: string, body: (signal: AbortSignal) => Promise<void>): Task {
    const controller = new AbortController();
    const done = Promise.resolve()
      .then(() => body(controller.signal))
      .catch((err: unknown) => this.report(err, name));
    return {
      name,
      signal: controller.signal,
      done,
      cancel: async () => {
        if (!controller.signal.aborted) {
          controller.abort(new CancelledError(`${name} cancelled`));
        }
        await done;
      }
    };
  }

  async drained(): Promise<void> {
    while (this.pending > 0) {
      await this.tail;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.drained();
  }

  private report(err: unknown, source: string): void {
    if (isCancellation(err)) return;
    this.onFailure(err, source);
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Races `fn` against a time budget and an optional abort signal. The budget
 * rejects with the error from `onTimeout`, the signal with `CancelledError`.
 */
export function runWithTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) return Promise.reject(new CancelledError());
  return new Promise<T>((resolve, reject) => {
    const cleanup = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };
    const onAbort = (): void => {
      cleanup();
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(onTimeout());
    }, timeoutMs);
    signal?.addEventListener("abort", onAbort, { once: true });
    void Promise.resolve()
      .then(fn)
      .then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (err: unknown) => {
          cleanup();
          reject(err);
        }
      );
  });
}

import { afterEach, describe, expect, it, vi } from "vitest";
import { CancelledError } from "../src/errors";
import { WorkerContext, runWithTimeout, sleep } from "../src/worker";

describe("WorkerContext", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs jobs one at a time in submission order", async () => {
    const order: string[] = [];
    const worker = new WorkerContext(() => undefined);
    worker.submit("a", async () => {
      order.push("a:start");
      await Promise.resolve();
      order.push("a:end");
    });
    worker.submit("b", () => {
      order.push("b");
    });
    await worker.drained();
    expect(order).toEqual(["a:start", "a:end", "b"]);
  });

  it("reports failures and keeps going", async () => {
    const failures: string[] = [];
    const worker = new WorkerContext((err, source) => {
      failures.push(`${source}: ${err instanceof Error ? err.message : String(err)}`);
    });
    let ran = false;
    worker.submit("boom", () => {
      throw new Error("bad");
    });
    worker.submit("quiet", () => {
      throw new CancelledError();
    });
    worker.submit("after", () => {
      ran = true;
    });
    await worker.drained();
    expect(failures).toEqual(["boom: bad"]);
    expect(ran).toBe(true);
  });

  it("refuses work once closed", async () => {
    const worker = new WorkerContext(() => undefined);
    await worker.close();
    expect(worker.submit("late", () => undefined)).toBe(false);
    expect(worker.isClosed).toBe(true);
  });

  it("cancels a task and waits for it to finish", async () => {
    vi.useFakeTimers();
    const onFailure = vi.fn();
    const worker = new WorkerContext(onFailure);
    let cleanedUp = false;
    const task = worker.spawn("loop", async (signal) => {
      try {
        for (;;) await sleep(1000, signal);
      } finally {
        cleanedUp = true;
      }
    });
    await vi.advanceTimersByTimeAsync(2500);
    await task.cancel();
    expect(cleanedUp).toBe(true);
    expect(task.signal.aborted).toBe(true);
    expect(onFailure).not.toHaveBeenCalled();
  });
});

describe("sleep", () => {
  it("rejects right away when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});

describe("runWithTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects with the timeout error once the budget passes", async () => {
    vi.useFakeTimers();
    const pending = runWithTimeout(() => new Promise<never>(() => undefined), 50, () => new Error("too slow"));
    const assertion = expect(pending).rejects.toThrow("too slow");
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it("passes through the result", async () => {
    await expect(runWithTimeout(async () => 7, 50, () => new Error("too slow"))).resolves.toBe(7);
  });

  it("rejects with CancelledError on abort", async () => {
    const controller = new AbortController();
    const pending = runWithTimeout(() => new Promise<never>(() => undefined), 1000, () => new Error("x"), controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});

import { describe, it, expect, vi, afterEach } from "vitest";
import { DeadlineExceeded, OperationAborted, createDeadline, raceAbort, sleep } from "../../src/utils/abort.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("sleep", () => {
  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    const done = vi.fn();

    const pending = sleep(100).then(done);
    await vi.advanceTimersByTimeAsync(99);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await pending;

    expect(done).toHaveBeenCalledTimes(1);
  });

  it("rejects with the abort reason", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error("stop"));

    await expect(pending).rejects.toThrow("stop");
    await expect(sleep(1, controller.signal)).rejects.toThrow("stop");
  });

  it("wraps a non-error reason", async () => {
    const controller = new AbortController();
    controller.abort("because");

    await expect(sleep(1, controller.signal)).rejects.toBeInstanceOf(OperationAborted);
  });
});

describe("raceAbort", () => {
  it("settles with the promise when nothing aborts", async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve(7), controller.signal)).resolves.toBe(7);
    await expect(raceAbort(Promise.reject(new Error("inner")), controller.signal)).rejects.toThrow("inner");
  });

  it("stops waiting on abort while the promise keeps running", async () => {
    let finish: (value: string) => void = () => undefined;
    const work = new Promise<string>((resolve) => {
      finish = resolve;
    });
    const controller = new AbortController();

    const waiting = raceAbort(work, controller.signal);
    controller.abort(new Error("gave up"));
    await expect(waiting).rejects.toThrow("gave up");

    finish("done");
    await expect(work).resolves.toBe("done");
  });
});

describe("createDeadline", () => {
  it("aborts with DeadlineExceeded when the timeout passes", async () => {
    vi.useFakeTimers();
    const deadline = createDeadline(undefined, 50);

    await vi.advanceTimersByTimeAsync(50);

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.signal.reason).toBeInstanceOf(DeadlineExceeded);
    deadline.dispose();
  });

  it("follows the parent signal and stops after dispose", () => {
    vi.useFakeTimers();
    const parent = new AbortController();
    const deadline = createDeadline(parent.signal, 50);

    parent.abort(new Error("caller left"));
    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.signal.reason).toEqual(new Error("caller left"));
    deadline.dispose();

    const other = new AbortController();
    const disposed = createDeadline(other.signal, 50);
    disposed.dispose();
    other.abort();
    vi.advanceTimersByTime(100);
    expect(disposed.signal.aborted).toBe(false);
  });
});

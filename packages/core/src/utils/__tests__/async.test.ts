import { afterEach, describe, expect, it, vi } from "vitest";
import { AbortError, StoreError } from "../../errors/index.js";
import { raceAbort, withTimeout } from "../async.js";

function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("raceAbort", () => {
  it("passes the promise through without a signal", async () => {
    await expect(raceAbort(Promise.resolve(7))).resolves.toBe(7);
  });

  it("settles with the promise when the signal never fires", async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve("ok"), controller.signal)).resolves.toBe("ok");
    await expect(
      raceAbort(Promise.reject(new Error("boom")), controller.signal)
    ).rejects.toThrow("boom");
  });

  it("rejects with AbortError when the signal fires first", async () => {
    const controller = new AbortController();
    const pending = deferred<string>();

    const raced = raceAbort(pending.promise, controller.signal);
    controller.abort();

    await expect(raced).rejects.toBeInstanceOf(AbortError);
    pending.resolve("late");
  });

  it("rejects at once for an aborted signal", async () => {
    await expect(raceAbort(new Promise(() => undefined), AbortSignal.abort())).rejects.toBeInstanceOf(
      AbortError
    );
  });
});

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves when the promise wins", async () => {
    await expect(withTimeout(Promise.resolve(1), 100, () => new Error("late"))).resolves.toBe(1);
  });

  it("rejects with the onTimeout error when time runs out", async () => {
    vi.useFakeTimers();
    const onTimeout = vi.fn(() => new StoreError("timeout", "too slow"));

    const result = withTimeout(new Promise(() => undefined), 50, onTimeout);
    const assertion = expect(result).rejects.toThrow("too slow");
    await vi.advanceTimersByTimeAsync(50);
    await assertion;

    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  it("does not call onTimeout after the promise settled", async () => {
    vi.useFakeTimers();
    const onTimeout = vi.fn(() => new Error("late"));

    await withTimeout(Promise.resolve("done"), 50, onTimeout);
    await vi.advanceTimersByTimeAsync(100);

    expect(onTimeout).not.toHaveBeenCalled();
  });
});

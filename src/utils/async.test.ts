/**
 * Tests for async utilities
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createMutex, deferred, sleep } from "./async.js";

describe("sleep", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should resolve after specified time", async () => {
    const onDone = vi.fn();
    const promise = sleep(1000).then(onDone);

    await vi.advanceTimersByTimeAsync(999);
    expect(onDone).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await promise;
    expect(onDone).toHaveBeenCalledTimes(1);
  });

  it("should resolve early when the signal aborts", async () => {
    const controller = new AbortController();
    const onDone = vi.fn();
    const promise = sleep(10_000, controller.signal).then(onDone);

    controller.abort();
    await promise;

    expect(onDone).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("should resolve immediately for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(10_000, controller.signal)).resolves.toBeUndefined();
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe("deferred", () => {
  it("should create a deferred promise", async () => {
    const d = deferred<string>();
    d.resolve("value");

    await expect(d.promise).resolves.toBe("value");
  });

  it("should allow rejection", async () => {
    const d = deferred<string>();
    d.reject(new Error("boom"));

    await expect(d.promise).rejects.toThrow("boom");
  });
});

describe("createMutex", () => {
  it("should allow sequential access", async () => {
    const mutex = createMutex();
    const order: string[] = [];

    const first = mutex.withLock(async () => {
      order.push("first:start");
      await Promise.resolve();
      order.push("first:end");
    });
    const second = mutex.withLock(() => {
      order.push("second");
    });

    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.isLocked()).toBe(false);
  });

  it("should release the lock when the body throws", async () => {
    const mutex = createMutex();

    await expect(
      mutex.withLock(() => {
        throw new Error("guard failed");
      }),
    ).rejects.toThrow("guard failed");

    expect(mutex.isLocked()).toBe(false);
    await expect(mutex.withLock(() => 42)).resolves.toBe(42);
  });
});

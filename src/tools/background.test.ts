/**
 * Tests for owned background tasks
 */

import { describe, it, expect, vi } from "vitest";
import { BackgroundTasks } from "./background.js";
import { NotReadyError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { deferred } from "../utils/async.js";

describe("BackgroundTasks", () => {
  it("should track a task until it settles", async () => {
    const tasks = new BackgroundTasks(createLogger({ level: "fatal" }));
    const gate = deferred<void>();

    tasks.run("handoff", () => gate.promise);

    expect(tasks.size).toBe(1);
    expect(tasks.labels()).toEqual(["handoff"]);

    gate.resolve();
    await tasks.whenIdle();

    expect(tasks.size).toBe(0);
  });

  it("should log failures instead of rejecting", async () => {
    const logger = createLogger({ level: "fatal" });
    const error = vi.spyOn(logger, "error");
    const tasks = new BackgroundTasks(logger);
    const failure = new Error("transport refused");

    tasks.run("start_demo", async () => {
      throw failure;
    });
    await tasks.whenIdle();

    expect(error).toHaveBeenCalledWith({ event: "task:failed", task: "start_demo", error: failure });
  });

  it("should only warn when a guard rejects the work", async () => {
    const logger = createLogger({ level: "fatal" });
    const warn = vi.spyOn(logger, "warn");
    const error = vi.spyOn(logger, "error");
    const tasks = new BackgroundTasks(logger);

    tasks.run("start_demo", async () => {
      throw new NotReadyError("gathering");
    });
    await tasks.whenIdle();

    expect(warn).toHaveBeenCalledWith({ event: "task:rejected", task: "start_demo", code: "NOT_READY" });
    expect(error).not.toHaveBeenCalled();
  });

  it("should wait for tasks started while waiting", async () => {
    const tasks = new BackgroundTasks(createLogger({ level: "fatal" }));
    const order: string[] = [];

    tasks.run("first", async () => {
      order.push("first");
      tasks.run("second", async () => {
        order.push("second");
      });
    });
    await tasks.whenIdle();

    expect(order).toEqual(["first", "second"]);
    expect(tasks.size).toBe(0);
  });
});

/**
 * Tests for the session controller
 */

import { describe, it, expect, beforeEach } from "vitest";
import { SessionController } from "./controller.js";
import { createLogger } from "../utils/logger.js";
import { MockSessionPort } from "../../test/mocks/session.js";

const persona = { name: "Voxa", instructions: "Gather requirements.", voice: "marin" };

describe("SessionController", () => {
  let port: MockSessionPort;
  let controller: SessionController;

  beforeEach(() => {
    port = new MockSessionPort();
    controller = new SessionController(port, createLogger({ level: "fatal" }));
  });

  it("should start sessions through the port", async () => {
    const handle = await controller.start(persona);

    expect(handle).toEqual({ id: "session-1", persona: "Voxa" });
    expect(port.start).toHaveBeenCalledWith(persona);
  });

  it("should propagate start failures", async () => {
    port.failStartFor("Voxa");

    await expect(controller.start(persona)).rejects.toThrow("transport refused");
  });

  it("should report speak failures without throwing", async () => {
    const handle = await controller.start(persona);
    port.failSpeak();

    await expect(controller.speak(handle, "Hello")).resolves.toBe(false);
  });

  it("should stop a handle once and treat repeats as no-ops", async () => {
    const handle = await controller.start(persona);

    await controller.stop(handle);
    await expect(controller.stop(handle)).resolves.toBeUndefined();
    await controller.stop(handle);

    expect(port.stop).toHaveBeenCalledTimes(1);
    expect(port.trail()).toEqual(["start:Voxa", "stop:Voxa"]);
    expect(controller.isStopped(handle)).toBe(true);
  });

  it("should share one teardown between concurrent stops", async () => {
    const handle = await controller.start(persona);

    await Promise.all([controller.stop(handle), controller.stop(handle), controller.stop(handle)]);

    expect(port.stop).toHaveBeenCalledTimes(1);
  });

  it("should swallow port stop failures after logging them", async () => {
    const handle = await controller.start(persona);
    port.stop.mockRejectedValueOnce(new Error("already gone"));

    await expect(controller.stop(handle)).resolves.toBeUndefined();
    await expect(controller.stop(handle)).resolves.toBeUndefined();
    expect(port.stop).toHaveBeenCalledTimes(1);
  });

  it("should not speak on a stopped handle", async () => {
    const handle = await controller.start(persona);
    await controller.stop(handle);

    await expect(controller.speak(handle, "Anyone there?")).resolves.toBe(false);
    expect(port.speak).not.toHaveBeenCalled();
  });
});

/**
 * Tests for the in-memory call recorder
 */

import { describe, it, expect } from "vitest";
import { InMemoryCallRecorder } from "./analytics.js";

describe("InMemoryCallRecorder", () => {
  it("should record a call from start to end", async () => {
    const recorder = new InMemoryCallRecorder();

    await recorder.startCall("ctx-1", "Voxa");
    await recorder.logTransition("ctx-1", "gathering", "confirming", "requirements_confirmed");
    await recorder.endCall("ctx-1", "completed", 5);

    const record = recorder.getRecord("ctx-1");
    expect(record?.initialPersona).toBe("Voxa");
    expect(record?.status).toBe("completed");
    expect(record?.rating).toBe(5);
    expect(record?.endedAt).toBeDefined();
    expect(record?.transitions.map((t) => [t.from, t.to, t.reason])).toEqual([
      ["gathering", "confirming", "requirements_confirmed"],
    ]);
  });

  it("should leave rating unset when none is given", async () => {
    const recorder = new InMemoryCallRecorder();

    await recorder.startCall("ctx-1", "Voxa");
    await recorder.endCall("ctx-1", "abandoned");

    expect(recorder.getRecord("ctx-1")?.rating).toBeUndefined();
    expect(recorder.getRecord("ctx-1")?.status).toBe("abandoned");
  });

  it("should create an implicit record for unknown contexts", async () => {
    const recorder = new InMemoryCallRecorder();

    await recorder.logTransition("ctx-2", "processing", "gathering", "synthesis_failed");

    expect(recorder.getRecord("ctx-2")?.initialPersona).toBe("unknown");
    expect(recorder.getRecord("ctx-2")?.transitions).toHaveLength(1);
  });

  it("should return undefined for contexts never seen", () => {
    expect(new InMemoryCallRecorder().getRecord("missing")).toBeUndefined();
  });
});

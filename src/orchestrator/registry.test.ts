/**
 * Tests for the context registry
 */

import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from "vitest";
import { ContextRegistry } from "./registry.js";
import { createOrchestrator } from "./orchestrator.js";
import { createCatalogSynthesizer } from "./synthesis.js";
import { loadCategoryTable } from "../catalog/table.js";
import type { CategoryTable } from "../catalog/schema.js";
import { createLogger } from "../utils/logger.js";
import { MockSessionPort } from "../../test/mocks/session.js";

const logger = createLogger({ level: "fatal" });
let table: CategoryTable;

beforeAll(async () => {
  table = await loadCategoryTable();
});

describe("ContextRegistry", () => {
  let port: MockSessionPort;
  let registry: ContextRegistry;

  beforeEach(() => {
    vi.useFakeTimers();
    port = new MockSessionPort();
    registry = new ContextRegistry({
      create: (contextId) =>
        createOrchestrator({
          contextId,
          session: port,
          synthesizer: createCatalogSynthesizer(table),
          logger,
        }),
      teardownGraceMs: 10_000,
      logger,
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should return the same orchestrator for concurrent lookups", async () => {
    const [a, b] = await Promise.all([registry.getOrCreate("ctx-1"), registry.getOrCreate("ctx-1")]);
    const other = await registry.getOrCreate("ctx-2");

    expect(a).toBe(b);
    expect(other).not.toBe(a);
    expect(registry.size).toBe(2);
  });

  it("should tear a closed context down after the grace delay", async () => {
    const orchestrator = await registry.getOrCreate("ctx-1");
    await orchestrator.open();

    await orchestrator.closeSession();
    await vi.advanceTimersByTimeAsync(9_999);
    expect(registry.has("ctx-1")).toBe(true);
    expect(port.liveSessions()).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1);
    await registry.whenIdle();

    expect(registry.has("ctx-1")).toBe(false);
    expect(port.liveSessions()).toEqual([]);
  });

  it("should hand out a fresh orchestrator after teardown", async () => {
    const first = await registry.getOrCreate("ctx-1");
    await first.closeSession();
    await vi.advanceTimersByTimeAsync(10_000);
    await registry.whenIdle();

    const second = await registry.getOrCreate("ctx-1");

    expect(second).not.toBe(first);
    expect(second.getState()).toBe("gathering");
  });

  it("should leave open contexts alone", async () => {
    const orchestrator = await registry.getOrCreate("ctx-1");
    await orchestrator.open();

    await vi.advanceTimersByTimeAsync(60_000);

    expect(registry.get("ctx-1")).toBe(orchestrator);
    expect(port.liveSessions()).toHaveLength(1);
  });

  it("should dispose everything and cancel timers on shutdown", async () => {
    const closing = await registry.getOrCreate("ctx-1");
    const open = await registry.getOrCreate("ctx-2");
    await closing.open();
    await open.open();
    await closing.closeSession();

    await registry.shutdown();

    expect(registry.size).toBe(0);
    expect(port.liveSessions()).toEqual([]);
    expect(vi.getTimerCount()).toBe(0);
  });
});

/**
 * Tests for logger utilities
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, afterEach } from "vitest";
import {
  createChildLogger,
  createContextLogger,
  createLogger,
  getLogger,
  logEvent,
  logTiming,
  setLogger,
} from "./logger.js";

describe("createLogger", () => {
  it("should create a logger with default config", () => {
    const logger = createLogger();

    expect(logger.settings.name).toBe("relay");
    expect(logger.settings.minLevel).toBe(3);
    expect(logger.settings.type).toBe("pretty");
  });

  it("should create a logger with custom config", () => {
    const logger = createLogger({ name: "custom", level: "debug", prettyPrint: false });

    expect(logger.settings.name).toBe("custom");
    expect(logger.settings.minLevel).toBe(2);
    expect(logger.settings.type).toBe("json");
  });

  describe("file logging", () => {
    let dir: string | undefined;

    afterEach(async () => {
      if (dir) await fs.rm(dir, { recursive: true, force: true });
      dir = undefined;
    });

    it("should append JSON lines under the log directory", async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "relay-logs-"));
      const logDir = path.join(dir, "nested");
      const logger = createLogger({
        name: "file-test",
        level: "info",
        prettyPrint: false,
        logToFile: true,
        logDir,
      });
      vi.spyOn(console, "log").mockImplementation(() => undefined);

      logger.info({ event: "context:connected", contextId: "ctx-1" });

      const content = await fs.readFile(path.join(logDir, "file-test.log"), "utf-8");
      const lines = content.trim().split("\n");
      expect(lines).toHaveLength(1);
      expect(lines[0]).toContain('"contextId":"ctx-1"');
      vi.restoreAllMocks();
    });
  });
});

describe("createChildLogger", () => {
  it("should create a named sub logger", () => {
    const parent = createLogger({ name: "parent" });
    const child = createChildLogger(parent, "ctx:abc");

    expect(child.settings.name).toBe("ctx:abc");
  });
});

describe("createContextLogger", () => {
  it("should tag every entry with the context id", () => {
    const parent = createLogger({ level: "info", prettyPrint: false });
    const child = createContextLogger(parent, "ctx-7");
    const entries: Record<string, unknown>[] = [];
    child.attachTransport((logObj) => {
      entries.push(logObj);
    });
    vi.spyOn(console, "log").mockImplementation(() => undefined);

    child.info({ event: "agent:saved" });

    expect(child.settings.name).toBe("ctx:ctx-7");
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ contextId: "ctx-7" });
    vi.restoreAllMocks();
  });
});

describe("getLogger and setLogger", () => {
  it("should return the same global instance until replaced", () => {
    const first = getLogger();
    expect(getLogger()).toBe(first);

    const custom = createLogger({ name: "custom" });
    setLogger(custom);

    expect(getLogger()).toBe(custom);
  });
});

describe("logEvent", () => {
  it("should log a structured event at info level", () => {
    const logger = createLogger({ level: "fatal" });
    const info = vi.spyOn(logger, "info");

    logEvent(logger, "context:connected", { contextId: "ctx-1" });

    expect(info).toHaveBeenCalledWith({ event: "context:connected", contextId: "ctx-1" });
  });
});

describe("logTiming", () => {
  it("should log successful operation timing", async () => {
    const logger = createLogger({ level: "fatal" });
    const debug = vi.spyOn(logger, "debug");

    const result = await logTiming(logger, "catalog:load", async () => "loaded");

    expect(result).toBe("loaded");
    expect(debug).toHaveBeenCalledWith(
      expect.objectContaining({ operation: "catalog:load", status: "success" }),
    );
  });

  it("should log and rethrow failures", async () => {
    const logger = createLogger({ level: "fatal" });
    const error = vi.spyOn(logger, "error");

    await expect(
      logTiming(logger, "catalog:load", async () => {
        throw new Error("missing table");
      }),
    ).rejects.toThrow("missing table");

    expect(error).toHaveBeenCalledWith(
      expect.objectContaining({ operation: "catalog:load", status: "error" }),
    );
  });
});

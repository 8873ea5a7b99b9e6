/**
 * Tests for configuration loader
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { configExists, loadConfig, resolveConfig } from "./loader.js";
import { ConfigError } from "../utils/errors.js";

describe("loadConfig", () => {
  let dir: string;
  let globalPath: string;
  let projectPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "relay-config-"));
    globalPath = path.join(dir, "global.json");
    projectPath = path.join(dir, "project.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should return defaults when no files exist", async () => {
    const config = await loadConfig({ globalPath, configPath: projectPath, env: {} });

    expect(config.timings.synthesisTimeoutMs).toBe(30000);
    expect(config.creator.name).toBe("Voxa");
  });

  it("should let the project file override the global one", async () => {
    await fs.writeFile(globalPath, "{ creator: { voice: 'sage', name: 'Nova' } }", "utf-8");
    await fs.writeFile(projectPath, "{ creator: { voice: 'ash' }, // project wins\n }", "utf-8");

    const config = await loadConfig({ globalPath, configPath: projectPath, env: {} });

    expect(config.creator.voice).toBe("ash");
    expect(config.creator.name).toBe("Nova");
  });

  it("should let the environment override both files", async () => {
    await fs.writeFile(projectPath, JSON.stringify({ timings: { synthesisTimeoutMs: 1000 } }));

    const config = await loadConfig({
      globalPath,
      configPath: projectPath,
      env: { RELAY_SYNTHESIS_TIMEOUT_MS: "2500" },
    });

    expect(config.timings.synthesisTimeoutMs).toBe(2500);
  });

  it("should ignore an invalid global file", async () => {
    await fs.writeFile(globalPath, "{ unknownSection: true }", "utf-8");

    const config = await loadConfig({ globalPath, configPath: projectPath, env: {} });

    expect(config.logging.level).toBe("info");
  });

  it("should reject an invalid project file with its issues", async () => {
    await fs.writeFile(projectPath, "{ timings: { settleMs: 'soon' } }", "utf-8");

    await expect(
      loadConfig({ globalPath, configPath: projectPath, env: {} }),
    ).rejects.toMatchObject({
      code: "CONFIG_ERROR",
      issues: [{ path: "timings.settleMs", message: "Expected number, received string" }],
    });
  });

  it("should reject a project file that is not JSON5", async () => {
    await fs.writeFile(projectPath, "{ timings: ", "utf-8");

    await expect(
      loadConfig({ globalPath, configPath: projectPath, env: {} }),
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("should report whether a config file exists", async () => {
    await fs.writeFile(projectPath, "{}", "utf-8");

    await expect(configExists(projectPath)).resolves.toBe(true);
    await expect(configExists(globalPath)).resolves.toBe(false);
  });
});

describe("resolveConfig", () => {
  it("should merge sections key by key", () => {
    const config = resolveConfig([
      { timings: { settleMs: 1, farewellGraceMs: 2 } },
      { timings: { settleMs: 3 } },
    ]);

    expect(config.timings.settleMs).toBe(3);
    expect(config.timings.farewellGraceMs).toBe(2);
    expect(config.timings.restoreSettleMs).toBe(2000);
  });
});

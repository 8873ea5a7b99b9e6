/**
 * Tests for environment overrides
 */

import { describe, it, expect } from "vitest";
import { readEnvOverrides } from "./env.js";
import { ConfigError } from "../utils/errors.js";

describe("readEnvOverrides", () => {
  it("should return an empty layer when nothing is set", () => {
    expect(readEnvOverrides({})).toEqual({});
  });

  it("should map every supported variable", () => {
    const layer = readEnvOverrides({
      RELAY_LOG_LEVEL: "DEBUG",
      RELAY_SYNTHESIS_TIMEOUT_MS: "45000",
      RELAY_CREATOR_VOICE: "coral",
      RELAY_PERSISTENCE_DIR: "/tmp/agents",
    });

    expect(layer).toEqual({
      logging: { level: "debug" },
      timings: { synthesisTimeoutMs: 45000 },
      creator: { voice: "coral" },
      persistence: { driver: "file", directory: "/tmp/agents" },
    });
  });

  it("should ignore blank values", () => {
    expect(readEnvOverrides({ RELAY_CREATOR_VOICE: "   " })).toEqual({});
  });

  it("should collect every invalid variable into one error", () => {
    let caught: unknown;
    try {
      readEnvOverrides({ RELAY_LOG_LEVEL: "loud", RELAY_SYNTHESIS_TIMEOUT_MS: "-5" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((i) => i.path)).toEqual([
        "RELAY_LOG_LEVEL",
        "RELAY_SYNTHESIS_TIMEOUT_MS",
      ]);
    }
  });
});

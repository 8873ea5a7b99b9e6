/**
 * Tests for configuration schema
 */

import { describe, it, expect } from "vitest";
import {
  RelayConfigLayerSchema,
  RelayConfigSchema,
  TimingsConfigSchema,
  createDefaultConfig,
  validateConfig,
} from "./schema.js";

describe("RelayConfigSchema", () => {
  it("should fill every default from an empty object", () => {
    const config = createDefaultConfig();

    expect(config.timings).toEqual({
      synthesisTimeoutMs: 30000,
      engagementIntervalMs: 3000,
      farewellGraceMs: 5000,
      settleMs: 3000,
      restoreSettleMs: 2000,
      teardownGraceMs: 10000,
    });
    expect(config.engagement.maxFillers).toBe(2);
    expect(config.engagement.fillers).toHaveLength(2);
    expect(config.creator.name).toBe("Voxa");
    expect(config.creator.voice).toBe("marin");
    expect(config.catalog.categoriesPath).toBeUndefined();
    expect(config.persistence).toEqual({ driver: "memory", directory: ".relay/agents" });
    expect(config.logging).toEqual({ level: "info", prettyPrint: true, logToFile: false });
  });

  it("should keep provided values and default the rest of a section", () => {
    const config = RelayConfigSchema.parse({ timings: { settleMs: 10 } });

    expect(config.timings.settleMs).toBe(10);
    expect(config.timings.farewellGraceMs).toBe(5000);
  });

  it("should reject unknown log levels", () => {
    const result = validateConfig({ logging: { level: "verbose" } });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(["logging", "level"]);
  });

  it("should reject a non-positive synthesis ceiling", () => {
    expect(TimingsConfigSchema.safeParse({ synthesisTimeoutMs: 0 }).success).toBe(false);
  });

  it("should accept an empty filler list", () => {
    const result = validateConfig({ engagement: { fillers: [] } });

    expect(result.success).toBe(true);
    expect(result.data?.engagement.fillers).toEqual([]);
  });
});

describe("RelayConfigLayerSchema", () => {
  it("should not apply defaults to a partial layer", () => {
    const layer = RelayConfigLayerSchema.parse({ timings: { settleMs: 1 } });

    expect(layer).toEqual({ timings: { settleMs: 1 } });
  });

  it("should reject unknown keys", () => {
    expect(RelayConfigLayerSchema.safeParse({ timing: {} }).success).toBe(false);
    expect(RelayConfigLayerSchema.safeParse({ timings: { settle: 1 } }).success).toBe(false);
  });
});

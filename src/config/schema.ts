/**
 * Configuration schema for persona-relay
 */

import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "../utils/logger.js";

const LogLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === "string" && LOG_LEVELS.some((level) => level === value),
  { message: `Expected one of: ${LOG_LEVELS.join(", ")}` },
);

/**
 * Protocol delays and ceilings, all in milliseconds
 */
export const TimingsConfigSchema = z.object({
  synthesisTimeoutMs: z.number().int().min(1).default(30000),
  engagementIntervalMs: z.number().int().min(1).default(3000),
  farewellGraceMs: z.number().int().min(0).default(5000),
  settleMs: z.number().int().min(0).default(3000),
  restoreSettleMs: z.number().int().min(0).default(2000),
  teardownGraceMs: z.number().int().min(0).default(10000),
});

export type TimingsConfig = z.infer<typeof TimingsConfigSchema>;

export const DEFAULT_FILLERS = [
  "Great! I'm working on creating your custom agent right now. This should only take a few moments.",
  "Give me just a moment here... I'm putting all the pieces together for your agent. This is always the fun part!",
] as const;

/**
 * Keep-alive utterances while synthesis runs
 */
export const EngagementConfigSchema = z.object({
  maxFillers: z.number().int().min(0).default(2),
  fillers: z.array(z.string().min(1)).default([...DEFAULT_FILLERS]),
});

export type EngagementConfig = z.infer<typeof EngagementConfigSchema>;

export const DEFAULT_CREATOR_INSTRUCTIONS = [
  "You are Voxa, a warm and upbeat assistant who builds custom voice agents for businesses.",
  "Ask about the business name and type first, then its main functions, preferred tone and target audience.",
  "Store every detail the moment the user shares it, read back a summary, and only build the agent once the user confirms.",
  "While the agent is being built, keep the user company and do not accept changes until they have tried it.",
].join("\n");

/**
 * The static requirements-gathering persona
 */
export const CreatorConfigSchema = z.object({
  name: z.string().min(1).default("Voxa"),
  voice: z.string().min(1).default("marin"),
  instructions: z.string().min(1).default(DEFAULT_CREATOR_INSTRUCTIONS),
});

export type CreatorConfig = z.infer<typeof CreatorConfigSchema>;

/**
 * Category table override
 */
export const CatalogConfigSchema = z.object({
  categoriesPath: z.string().optional(),
});

export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;

/**
 * Where synthesized agents are saved
 */
export const PersistenceConfigSchema = z.object({
  driver: z.enum(["memory", "file"]).default("memory"),
  directory: z.string().min(1).default(".relay/agents"),
});

export type PersistenceConfig = z.infer<typeof PersistenceConfigSchema>;

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default("info"),
  prettyPrint: z.boolean().default(true),
  /** Also append JSON lines to ~/.relay/logs/relay.log */
  logToFile: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Complete configuration schema
 */
export const RelayConfigSchema = z.object({
  timings: TimingsConfigSchema.default({}),
  engagement: EngagementConfigSchema.default({}),
  creator: CreatorConfigSchema.default({}),
  catalog: CatalogConfigSchema.default({}),
  persistence: PersistenceConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

/**
 * Shape of a single configuration layer (file or environment).
 *
 * Partial sections never apply defaults, so a layer only carries the values
 * it actually sets and cannot mask a lower-priority layer.
 */
export const RelayConfigLayerSchema = z
  .object({
    timings: TimingsConfigSchema.partial().strict().optional(),
    engagement: EngagementConfigSchema.partial().strict().optional(),
    creator: CreatorConfigSchema.partial().strict().optional(),
    catalog: CatalogConfigSchema.partial().strict().optional(),
    persistence: PersistenceConfigSchema.partial().strict().optional(),
    logging: LoggingConfigSchema.partial().strict().optional(),
  })
  .strict();

export type RelayConfigLayer = z.infer<typeof RelayConfigLayerSchema>;

/**
 * Validate configuration object
 */
export function validateConfig(config: unknown): {
  success: boolean;
  data?: RelayConfig;
  error?: z.ZodError;
} {
  const result = RelayConfigSchema.safeParse(config);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Create default configuration
 */
export function createDefaultConfig(): RelayConfig {
  return RelayConfigSchema.parse({});
}

/**
 * Environment overrides for persona-relay
 *
 * The highest-priority configuration layer. Only a handful of settings are
 * exposed; everything else goes through the config files.
 */

import { ConfigError, type ConfigIssue } from "../utils/errors.js";
import { LOG_LEVELS, type LogLevel } from "../utils/logger.js";
import type { RelayConfigLayer } from "./schema.js";

export const ENV_VARS = {
  logLevel: "RELAY_LOG_LEVEL",
  synthesisTimeoutMs: "RELAY_SYNTHESIS_TIMEOUT_MS",
  creatorVoice: "RELAY_CREATOR_VOICE",
  persistenceDir: "RELAY_PERSISTENCE_DIR",
} as const;

function readVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parseLogLevel(value: string): LogLevel | undefined {
  const lower = value.toLowerCase();
  return LOG_LEVELS.find((level) => level === lower);
}

/**
 * Build a configuration layer from environment variables
 *
 * @throws ConfigError when a variable is set to an unusable value
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): RelayConfigLayer {
  const layer: RelayConfigLayer = {};
  const issues: ConfigIssue[] = [];

  const level = readVar(env, ENV_VARS.logLevel);
  if (level !== undefined) {
    const parsed = parseLogLevel(level);
    if (parsed) {
      layer.logging = { level: parsed };
    } else {
      issues.push({
        path: ENV_VARS.logLevel,
        message: `Expected one of: ${LOG_LEVELS.join(", ")}`,
      });
    }
  }

  const timeout = readVar(env, ENV_VARS.synthesisTimeoutMs);
  if (timeout !== undefined) {
    const ms = Number(timeout);
    if (Number.isInteger(ms) && ms > 0) {
      layer.timings = { synthesisTimeoutMs: ms };
    } else {
      issues.push({ path: ENV_VARS.synthesisTimeoutMs, message: "Expected a positive integer" });
    }
  }

  const voice = readVar(env, ENV_VARS.creatorVoice);
  if (voice !== undefined) {
    layer.creator = { voice };
  }

  const directory = readVar(env, ENV_VARS.persistenceDir);
  if (directory !== undefined) {
    layer.persistence = { driver: "file", directory };
  }

  if (issues.length > 0) {
    throw new ConfigError("Invalid environment configuration", { issues });
  }

  return layer;
}

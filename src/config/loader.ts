/**
 * Configuration loader for persona-relay
 *
 * Supports hierarchical configuration with priority:
 * 1. Environment variables
 * 2. Project config (<project>/.relay/config.json)
 * 3. Global config (~/.relay/config.json)
 * 4. Built-in defaults
 */

import fs from "node:fs/promises";
import JSON5 from "json5";
import {
  RelayConfigLayerSchema,
  RelayConfigSchema,
  type RelayConfig,
  type RelayConfigLayer,
} from "./schema.js";
import { readEnvOverrides } from "./env.js";
import { CONFIG_PATHS, getProjectConfigPath } from "./paths.js";
import { ConfigError, toError } from "../utils/errors.js";

export interface LoadConfigOptions {
  /** Explicit project config file (defaults to <cwd>/.relay/config.json) */
  configPath?: string;
  cwd?: string;
  /** Global config file (defaults to ~/.relay/config.json) */
  globalPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration with hierarchical fallback
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RelayConfig> {
  const layers: RelayConfigLayer[] = [];

  // Global config is lenient: a broken user file must not stop every project
  const globalConfig = await loadConfigFile(options.globalPath ?? CONFIG_PATHS.config, {
    strict: false,
  });
  if (globalConfig) layers.push(globalConfig);

  const projectConfig = await loadConfigFile(
    options.configPath ?? getProjectConfigPath(options.cwd),
  );
  if (projectConfig) layers.push(projectConfig);

  layers.push(readEnvOverrides(options.env));

  return resolveConfig(layers);
}

/**
 * Merge layers (lowest priority first) over the defaults and validate
 */
export function resolveConfig(layers: readonly RelayConfigLayer[]): RelayConfig {
  const merged = layers.reduce<RelayConfigLayer>((base, layer) => mergeLayers(base, layer), {});
  const result = RelayConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError("Invalid configuration", {
      issues: result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
  }
  return result.data;
}

/**
 * Load a single config file, returning null if not found
 */
async function loadConfigFile(
  configPath: string,
  options: { strict?: boolean } = {},
): Promise<RelayConfigLayer | null> {
  const { strict = true } = options;

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw new ConfigError("Failed to load configuration", {
      configPath,
      cause: toError(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (error) {
    if (!strict) return null;
    throw new ConfigError("Configuration is not valid JSON5", {
      configPath,
      cause: toError(error),
    });
  }

  const result = RelayConfigLayerSchema.safeParse(parsed);
  if (!result.success) {
    if (!strict) return null;
    throw new ConfigError("Invalid configuration", {
      issues: result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      configPath,
    });
  }

  return result.data;
}

/**
 * Section-wise merge; values set in `override` win
 */
function mergeLayers(base: RelayConfigLayer, override: RelayConfigLayer): RelayConfigLayer {
  return {
    timings: { ...base.timings, ...override.timings },
    engagement: { ...base.engagement, ...override.engagement },
    creator: { ...base.creator, ...override.creator },
    catalog: { ...base.catalog, ...override.catalog },
    persistence: { ...base.persistence, ...override.persistence },
    logging: { ...base.logging, ...override.logging },
  };
}

/**
 * Check if a configuration file exists
 */
export async function configExists(configPath?: string): Promise<boolean> {
  try {
    await fs.access(configPath ?? getProjectConfigPath());
    return true;
  } catch {
    return false;
  }
}

/**
 * Centralized configuration paths
 *
 * User-level relay configuration is stored in ~/.relay/
 */

import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Base directory for user-level configuration
 * ~/.relay/
 */
export const RELAY_HOME = join(homedir(), ".relay");

/**
 * Configuration paths
 */
export const CONFIG_PATHS = {
  /** Base directory: ~/.relay/ */
  home: RELAY_HOME,

  /** Global config file: ~/.relay/config.json */
  config: join(RELAY_HOME, "config.json"),

  /** Logs directory: ~/.relay/logs/ */
  logs: join(RELAY_HOME, "logs"),
} as const;

/**
 * Project config path: <cwd>/.relay/config.json
 */
export function getProjectConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, ".relay", "config.json");
}

/**
 * Centralized configuration paths
 *
 * All tapdeck configuration is stored in ~/.tapdeck/
 */

import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Base directory for all tapdeck configuration
 * ~/.tapdeck/
 */
export const TAPDECK_HOME = join(homedir(), ".tapdeck");

/**
 * Configuration paths
 */
export const CONFIG_PATHS = {
  /** Base directory: ~/.tapdeck/ */
  home: TAPDECK_HOME,

  /** Main config file: ~/.tapdeck/config.json */
  config: join(TAPDECK_HOME, "config.json"),

  /** Logs directory: ~/.tapdeck/logs/ */
  logs: join(TAPDECK_HOME, "logs"),
} as const;

/**
 * Project-level config file: <cwd>/.tapdeck/config.json
 */
export function getProjectConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, ".tapdeck", "config.json");
}

/**
 * Configuration loader for tapdeck
 *
 * Supports hierarchical configuration with priority:
 * 1. Environment variables
 * 2. Project config (<project>/.tapdeck/config.json) or an explicit path
 * 3. Global config (~/.tapdeck/config.json)
 * 4. Built-in defaults
 */

import fs from "node:fs/promises";
import path from "node:path";
import JSON5 from "json5";
import {
  PartialTapdeckConfigSchema,
  TapdeckConfigSchema,
  createDefaultConfigObject,
  type PartialTapdeckConfig,
  type TapdeckConfig,
} from "./schema.js";
import { applyEnvOverrides } from "./env.js";
import { CONFIG_PATHS, getProjectConfigPath } from "./paths.js";
import { ConfigError, type ConfigIssue } from "../utils/errors.js";

export interface LoadConfigOptions {
  /** Global config file (default: ~/.tapdeck/config.json) */
  globalPath?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration with hierarchical fallback
 */
export async function loadConfig(
  configPath?: string,
  options: LoadConfigOptions = {},
): Promise<TapdeckConfig> {
  let config = createDefaultConfig();

  // Global config is lenient: a broken file there should not lock the user out
  const globalConfig = await loadConfigFile(options.globalPath ?? CONFIG_PATHS.config, {
    strict: false,
  });
  if (globalConfig) {
    config = deepMergeConfig(config, globalConfig);
  }

  const projectConfig = await loadConfigFile(configPath ?? getProjectConfigPath());
  if (projectConfig) {
    config = deepMergeConfig(config, projectConfig);
  }

  return applyEnvOverrides(config, options.env ?? process.env);
}

/**
 * Load a single config file, returning null if not found
 */
async function loadConfigFile(
  configPath: string,
  options: { strict?: boolean } = {},
): Promise<PartialTapdeckConfig | null> {
  const { strict = true } = options;

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw new ConfigError("Failed to load configuration", {
      configPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (error) {
    if (!strict) return null;
    throw new ConfigError("Configuration is not valid JSON5", {
      configPath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    if (!strict) return null;
    throw new ConfigError("Invalid configuration: expected an object", { configPath });
  }

  const result = PartialTapdeckConfigSchema.safeParse(parsed);
  if (!result.success) {
    if (!strict) return null;
    throw new ConfigError("Invalid configuration", {
      issues: toIssues(result.error.issues),
      configPath,
    });
  }

  return result.data;
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT"
  );
}

function toIssues(issues: { path: (string | number)[]; message: string }[]): ConfigIssue[] {
  return issues.map((i) => ({ path: i.path.join("."), message: i.message }));
}

/**
 * Deep merge configuration objects
 */
function deepMergeConfig(base: TapdeckConfig, override: PartialTapdeckConfig): TapdeckConfig {
  return {
    tasks: { ...base.tasks, ...override.tasks },
    brew: { ...base.brew, ...override.brew },
    logging: { ...base.logging, ...override.logging },
  };
}

/**
 * Save configuration to file
 *
 * @param configPath - Path to save to (defaults to project config)
 * @param global - If true, saves to global config instead
 */
export async function saveConfig(
  config: TapdeckConfig,
  configPath?: string,
  global: boolean = false,
): Promise<void> {
  const resolvedPath = configPath ?? (global ? CONFIG_PATHS.config : getProjectConfigPath());

  const result = TapdeckConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError("Cannot save invalid configuration", {
      issues: toIssues(result.error.issues),
      configPath: resolvedPath,
    });
  }

  await fs.mkdir(path.dirname(resolvedPath), { recursive: true });
  await fs.writeFile(resolvedPath, JSON.stringify(result.data, null, 2), "utf-8");
}

/**
 * Create default configuration
 */
export function createDefaultConfig(): TapdeckConfig {
  return createDefaultConfigObject();
}

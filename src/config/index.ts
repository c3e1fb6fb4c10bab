/**
 * Configuration module exports
 */

export {
  TapdeckConfigSchema,
  PartialTapdeckConfigSchema,
  TasksConfigSchema,
  BrewConfigSchema,
  LoggingConfigSchema,
  type TapdeckConfig,
  type PartialTapdeckConfig,
  type TasksConfig,
  type BrewConfig,
  type LoggingConfig,
} from "./schema.js";
export { loadConfig, saveConfig, createDefaultConfig, type LoadConfigOptions } from "./loader.js";
export { applyEnvOverrides, ENV_VARS } from "./env.js";
export { CONFIG_PATHS, TAPDECK_HOME, getProjectConfigPath } from "./paths.js";

/**
 * Environment overrides for tapdeck
 *
 * Environment variables take precedence over every config file.
 */

import { TapdeckConfigSchema, type TapdeckConfig } from "./schema.js";
import { ConfigError } from "../utils/errors.js";

/**
 * Recognised variables and the config field each one sets
 */
export const ENV_VARS = {
  logLevel: "TAPDECK_LOG_LEVEL",
  brewPath: "TAPDECK_BREW_PATH",
  maxConcurrentDetails: "TAPDECK_MAX_CONCURRENT_DETAILS",
  detailTimeoutMs: "TAPDECK_DETAIL_TIMEOUT_MS",
} as const;

/**
 * Return a copy of `config` with environment overrides applied
 *
 * @throws ConfigError when an override does not validate
 */
export function applyEnvOverrides(config: TapdeckConfig, env: NodeJS.ProcessEnv): TapdeckConfig {
  const logLevel = env[ENV_VARS.logLevel];
  const brewPath = env[ENV_VARS.brewPath];
  const maxConcurrent = readNumber(env, ENV_VARS.maxConcurrentDetails);
  const detailTimeout = readNumber(env, ENV_VARS.detailTimeoutMs);

  const result = TapdeckConfigSchema.safeParse({
    ...config,
    tasks: {
      ...config.tasks,
      maxConcurrentDetails: maxConcurrent ?? config.tasks.maxConcurrentDetails,
      detailTimeoutMs: detailTimeout ?? config.tasks.detailTimeoutMs,
    },
    brew: { ...config.brew, executable: brewPath || config.brew.executable },
    logging: { ...config.logging, level: logLevel ? logLevel.toLowerCase() : config.logging.level },
  });

  if (!result.success) {
    throw new ConfigError("Invalid configuration from environment", {
      issues: result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
  }
  return result.data;
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`, {
      issues: [{ path: name, message: "Expected a number" }],
    });
  }
  return value;
}

/**
 * Configuration schema for tapdeck
 */

import { z } from "zod";

/**
 * Background task configuration
 */
export const TasksConfigSchema = z.object({
  maxConcurrentDetails: z.number().int().min(1).max(100).default(15),
  detailTimeoutMs: z.number().int().min(100).default(10000),
  abandonPolicy: z.enum(["abandon", "abort"]).default("abandon"),
  frameIntervalMs: z.number().int().min(10).max(1000).default(100),
});

export type TasksConfig = z.infer<typeof TasksConfigSchema>;

/**
 * Homebrew invocation
 */
export const BrewConfigSchema = z.object({
  executable: z.string().min(1).default("brew"),
  commandTimeoutMs: z.number().int().min(1000).default(600000), // 10 min
  autoLoadDetails: z.boolean().default(true),
});

export type BrewConfig = z.infer<typeof BrewConfigSchema>;

export const LoggingConfigSchema = z.object({
  level: z.enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  logToFile: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Complete configuration schema
 */
export const TapdeckConfigSchema = z.object({
  tasks: TasksConfigSchema.default({}),
  brew: BrewConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type TapdeckConfig = z.infer<typeof TapdeckConfigSchema>;

/**
 * What a config file may contain: every section and field optional, no
 * defaults filled in, so merging only sees values actually present
 */
export const PartialTapdeckConfigSchema = z
  .object({
    tasks: TasksConfigSchema.partial(),
    brew: BrewConfigSchema.partial(),
    logging: LoggingConfigSchema.partial(),
  })
  .partial();

export type PartialTapdeckConfig = z.infer<typeof PartialTapdeckConfigSchema>;

/**
 * Create default configuration
 */
export function createDefaultConfigObject(): TapdeckConfig {
  return TapdeckConfigSchema.parse({});
}

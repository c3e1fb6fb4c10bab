/**
 * Logging system for tapdeck
 * Based on tslog with structured output
 */

import { Logger, type ILogObj } from "tslog";
import fs from "node:fs";
import path from "node:path";

/**
 * Log levels
 */
export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Logger configuration
 */
export interface LoggerConfig {
  name: string;
  level: LogLevel;
  prettyPrint: boolean;
  /** Write records to the console; when false only attached transports see them */
  console: boolean;
  logToFile: boolean;
  logDir?: string;
}

/**
 * Default logger configuration
 */
const DEFAULT_CONFIG: LoggerConfig = {
  name: "tapdeck",
  level: "info",
  prettyPrint: true,
  console: true,
  logToFile: false,
};

/**
 * Map log level string to tslog minLevel number
 */
function levelToNumber(level: LogLevel): number {
  const levels: Record<LogLevel, number> = {
    silly: 0,
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
  };
  return levels[level];
}

/**
 * Create a logger instance
 */
export function createLogger(config: Partial<LoggerConfig> = {}): Logger<ILogObj> {
  const finalConfig = { ...DEFAULT_CONFIG, ...config };

  const logger = new Logger<ILogObj>({
    type: finalConfig.console ? "pretty" : "hidden",
    name: finalConfig.name,
    minLevel: levelToNumber(finalConfig.level),
    prettyLogTemplate: finalConfig.prettyPrint
      ? "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] "
      : undefined,
    prettyLogTimeZone: "local",
    stylePrettyLogs: finalConfig.prettyPrint,
  });

  if (finalConfig.logToFile && finalConfig.logDir) {
    setupFileLogging(logger, finalConfig.logDir, finalConfig.name);
  }

  return logger;
}

/**
 * Setup file logging
 */
function setupFileLogging(logger: Logger<ILogObj>, logDir: string, name: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const logFile = path.join(logDir, `${name}.log`);

  logger.attachTransport((logObj) => {
    const line = JSON.stringify(logObj) + "\n";
    fs.appendFileSync(logFile, line);
  });
}

/**
 * Create a child logger with a specific name
 */
export function createChildLogger(parent: Logger<ILogObj>, name: string): Logger<ILogObj> {
  return parent.getSubLogger({ name });
}

/**
 * Global logger instance
 */
let globalLogger: Logger<ILogObj> | null = null;

/**
 * Get the global logger instance
 */
export function getLogger(): Logger<ILogObj> {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

/**
 * Set the global logger instance
 */
export function setLogger(logger: Logger<ILogObj>): void {
  globalLogger = logger;
}

/**
 * Initialize logging for the CLI session
 */
export function initializeLogging(
  logDir: string,
  options: { level?: LogLevel; logToFile?: boolean; console?: boolean } = {},
): Logger<ILogObj> {
  const logger = createLogger({
    name: "tapdeck",
    level: options.level ?? "info",
    prettyPrint: process.stdout.isTTY ?? true,
    console: options.console ?? true,
    logToFile: options.logToFile ?? false,
    logDir,
  });

  setLogger(logger);
  return logger;
}

/**
 * Log execution timing
 */
export async function logTiming<T>(
  logger: Logger<ILogObj>,
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  const start = performance.now();
  try {
    const result = await fn();
    const duration = performance.now() - start;
    logger.debug({ operation, durationMs: duration.toFixed(2), status: "success" });
    return result;
  } catch (error) {
    const duration = performance.now() - start;
    logger.error({ operation, durationMs: duration.toFixed(2), status: "error", error });
    throw error;
  }
}

/**
 * Render one tslog record as a `[LEVEL] message` line
 */
export function formatLogLine(logObj: Record<string, unknown>): string {
  const meta = logObj["_meta"];
  let level = "INFO";
  if (meta && typeof meta === "object" && "logLevelName" in meta) {
    if (typeof meta.logLevelName === "string") {
      level = meta.logLevelName;
    }
  }

  const parts: string[] = [];
  for (let i = 0; i in logObj; i++) {
    const arg = logObj[i];
    parts.push(typeof arg === "string" ? arg : JSON.stringify(arg));
  }

  return `[${level}] ${parts.join(" ")}`;
}

/**
 * Capture formatted log lines from a logger and its sub-loggers.
 *
 * `drain()` hands back everything captured since the previous call, which lets
 * a frame loop move log output into its log pane once per frame.
 */
export function createLogCapture(
  logger: Logger<ILogObj>,
  options: { maxBuffered?: number } = {},
): { drain: () => string[] } {
  const maxBuffered = options.maxBuffered ?? 1000;
  let buffer: string[] = [];

  logger.attachTransport((logObj) => {
    buffer.push(formatLogLine(logObj));
    if (buffer.length > maxBuffered) {
      buffer.splice(0, buffer.length - maxBuffered);
    }
  });

  return {
    drain: () => {
      const lines = buffer;
      buffer = [];
      return lines;
    },
  };
}

/**
 * Utility exports for tapdeck
 */

// Logger
export {
  createLogger,
  createChildLogger,
  createLogCapture,
  formatLogLine,
  getLogger,
  setLogger,
  initializeLogging,
  logTiming,
  type LogLevel,
  type LoggerConfig,
} from "./logger.js";

// Errors
export {
  TapdeckError,
  ConfigError,
  ProviderError,
  ExecutorError,
  ResultCellError,
  TimeoutError,
  isTapdeckError,
  formatError,
  errorMessage,
} from "./errors.js";

// Async utilities
export { timeout, deferred, abortable } from "./async.js";

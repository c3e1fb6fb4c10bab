/**
 * Error handling for tapdeck
 * Custom error types with context and recovery information
 */

/**
 * Base error class for tapdeck
 */
export class TapdeckError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;
  readonly recoverable: boolean;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: {
      code: string;
      context?: Record<string, unknown>;
      recoverable?: boolean;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "TapdeckError";
    this.code = options.code;
    this.context = options.context ?? {};
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;

    Error.captureStackTrace(this, TapdeckError);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * A Homebrew invocation failed
 */
export class ProviderError extends TapdeckError {
  readonly command: string;
  readonly exitCode?: number;
  readonly stderr?: string;

  constructor(
    message: string,
    options: {
      command: string;
      exitCode?: number;
      stderr?: string;
      cause?: Error;
    },
  ) {
    super(message, {
      code: "PROVIDER_ERROR",
      context: { command: options.command, exitCode: options.exitCode },
      recoverable: true,
      suggestion: `Run '${options.command}' in a terminal to see the full output`,
      cause: options.cause,
    });
    this.name = "ProviderError";
    this.command = options.command;
    this.exitCode = options.exitCode;
    this.stderr = options.stderr;
  }
}

/**
 * Configuration error
 */
export class ConfigError extends TapdeckError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: {
      issues?: ConfigIssue[];
      configPath?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: "CONFIG_ERROR",
      context: { configPath: options.configPath, issues: options.issues },
      recoverable: true,
      suggestion: "Check your ~/.tapdeck/config.json for errors",
      cause: options.cause,
    });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  /**
   * Format issues as a readable string
   */
  formatIssues(): string {
    if (this.issues.length === 0) return "";
    return this.issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * The executor could not accept more background work.
 * Signals resource exhaustion; callers are not expected to recover.
 */
export class ExecutorError extends TapdeckError {
  readonly taskName: string;

  constructor(
    message: string,
    options: {
      taskName: string;
      activeCount?: number;
      cause?: Error;
    },
  ) {
    super(message, {
      code: "EXECUTOR_ERROR",
      context: { taskName: options.taskName, activeCount: options.activeCount },
      recoverable: false,
      suggestion: "Restart tapdeck; the background executor is no longer usable",
      cause: options.cause,
    });
    this.name = "ExecutorError";
    this.taskName = options.taskName;
  }
}

/**
 * A result cell was written twice, read twice, or released without a lock
 */
export class ResultCellError extends TapdeckError {
  readonly cell: string;

  constructor(message: string, options: { cell: string }) {
    super(message, {
      code: "RESULT_CELL_ERROR",
      context: { cell: options.cell },
      recoverable: false,
    });
    this.name = "ResultCellError";
    this.cell = options.cell;
  }
}

/**
 * Timeout error
 */
export class TimeoutError extends TapdeckError {
  readonly timeoutMs: number;
  readonly operation: string;

  constructor(
    message: string,
    options: {
      timeoutMs: number;
      operation: string;
    },
  ) {
    super(message, {
      code: "TIMEOUT_ERROR",
      context: { timeoutMs: options.timeoutMs, operation: options.operation },
      recoverable: true,
      suggestion: "Try increasing the timeout in the tasks configuration",
    });
    this.name = "TimeoutError";
    this.timeoutMs = options.timeoutMs;
    this.operation = options.operation;
  }
}

/**
 * Check if error is a specific type
 */
export function isTapdeckError(error: unknown): error is TapdeckError {
  return error instanceof TapdeckError;
}

/**
 * Default suggestions for common error codes.
 * Used as fallback when an error doesn't have a specific suggestion.
 */
const ERROR_SUGGESTIONS: Record<string, string> = {
  PROVIDER_ERROR: "Check that Homebrew is installed and 'brew doctor' reports no problems.",
  CONFIG_ERROR: "Check your ~/.tapdeck/config.json or remove it to restore the defaults.",
  EXECUTOR_ERROR: "Restart tapdeck; the background executor is no longer usable.",
  TIMEOUT_ERROR: "Operation timed out. Try increasing the timeout in config.",
  UNEXPECTED_ERROR: "An unexpected error occurred. Run with TAPDECK_LOG_LEVEL=debug for details.",
};

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof TapdeckError) {
    let message = `[${error.code}] ${error.message}`;
    const suggestion = error.suggestion ?? ERROR_SUGGESTIONS[error.code];
    if (suggestion) {
      message += `\n  Suggestion: ${suggestion}`;
    }
    return message;
  }

  if (error instanceof Error) {
    return `${error.message}\n  Suggestion: ${ERROR_SUGGESTIONS["UNEXPECTED_ERROR"]}`;
  }

  return String(error);
}

/**
 * Human-readable message of any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof ProviderError && error.stderr) {
    return error.stderr;
  }
  return error instanceof Error ? error.message : String(error);
}

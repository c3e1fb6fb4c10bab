/**
 * CLI session: configuration, logging, provider and coordinator for one command
 */

import type { ILogObj, Logger } from "tslog";
import { loadConfig } from "../config/loader.js";
import { CONFIG_PATHS } from "../config/paths.js";
import type { TapdeckConfig } from "../config/schema.js";
import { BrewProvider } from "../provider/brew.js";
import type { PackageProvider } from "../provider/types.js";
import { TaskCoordinator } from "../tasks/coordinator.js";
import type { TaskResult } from "../tasks/result.js";
import { createChildLogger, createLogCapture, initializeLogging } from "../utils/logger.js";
import { runFrameLoop, terminalOutput, type FrameLoopSummary, type FrameOutput } from "./frame-loop.js";

export interface Session {
  config: TapdeckConfig;
  coordinator: TaskCoordinator;
  logger: Logger<ILogObj>;
  output: FrameOutput;
  /** Run the frame loop until everything submitted so far has finished */
  run(label: string, onResult?: (result: TaskResult) => void): Promise<FrameLoopSummary>;
  close(): Promise<void>;
}

export interface SessionOptions {
  /** Use this provider instead of running brew */
  provider?: PackageProvider;
  output?: FrameOutput;
}

/**
 * Build a session from an already loaded configuration
 */
export function createSession(config: TapdeckConfig, options: SessionOptions = {}): Session {
  // Log records go to the log pane (and the log file), not straight to the terminal
  const logger = initializeLogging(CONFIG_PATHS.logs, {
    level: config.logging.level,
    logToFile: config.logging.logToFile,
    console: false,
  });
  const capture = createLogCapture(logger);

  const provider =
    options.provider ??
    new BrewProvider({
      executable: config.brew.executable,
      commandTimeoutMs: config.brew.commandTimeoutMs,
      logger: createChildLogger(logger, "brew"),
    });

  const coordinator = new TaskCoordinator({
    provider,
    maxConcurrentDetails: config.tasks.maxConcurrentDetails,
    detailTimeoutMs: config.tasks.detailTimeoutMs,
    abandonPolicy: config.tasks.abandonPolicy,
    logger: createChildLogger(logger, "coordinator"),
  });

  const output = options.output ?? terminalOutput;

  return {
    config,
    coordinator,
    logger,
    output,
    run: (label, onResult) =>
      runFrameLoop({
        coordinator,
        intervalMs: config.tasks.frameIntervalMs,
        label,
        onResult,
        drainLogs: capture.drain,
        output,
      }),
    close: () => coordinator.shutdown(),
  };
}

/**
 * Load configuration and build a session
 */
export async function openSession(
  configPath?: string,
  options: SessionOptions = {},
): Promise<Session> {
  const config = await loadConfig(configPath);
  return createSession(config, options);
}

/**
 * Open a session, run `fn`, and always close the session
 */
export async function withSession<T>(
  open: () => Promise<Session>,
  fn: (session: Session) => Promise<T>,
): Promise<T> {
  const session = await open();
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}

/**
 * Frame loop
 *
 * Drives a TaskCoordinator at a fixed cadence: one `poll()` per frame, a
 * redrawn status line, and log lines printed above it. Stops by itself once
 * nothing is outstanding.
 */

import logUpdate from "log-update";
import chalk from "chalk";
import type { TaskCoordinator } from "../tasks/coordinator.js";
import { isEmptyTaskResult, type TaskResult } from "../tasks/result.js";

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

/**
 * Where the loop draws
 */
export interface FrameOutput {
  /** Replace the status area */
  render(frame: string): void;
  /** Print lines above the status area */
  print(lines: string[]): void;
  /** Keep the last frame on screen and stop updating it */
  done(): void;
}

export const terminalOutput: FrameOutput = {
  render: (frame) => logUpdate(frame),
  print: (lines) => {
    if (lines.length === 0) return;
    logUpdate.clear();
    console.log(lines.join("\n"));
  },
  done: () => logUpdate.done(),
};

export interface FrameLoopOptions {
  coordinator: TaskCoordinator;
  intervalMs: number;
  /** What the status line says is going on */
  label: string;
  /** Called for every frame whose result is not empty */
  onResult?: (result: TaskResult) => void;
  /** Log lines to print each frame */
  drainLogs?: () => string[];
  output?: FrameOutput;
}

export interface FrameLoopSummary {
  frames: number;
}

/**
 * Status line for one frame
 */
export function formatStatusLine(coordinator: TaskCoordinator, label: string, frame: number): string {
  const spinner = SPINNER_FRAMES[frame % SPINNER_FRAMES.length] ?? "";
  const parts = [`${chalk.cyan(spinner)} ${label}`];

  const kinds = coordinator.outstandingKinds();
  if (kinds.length > 0) {
    parts.push(chalk.dim(kinds.join(", ")));
  }

  const loading = coordinator.inFlightEnrichmentCount();
  const queued = coordinator.pendingEnrichmentCount();
  if (loading + queued > 0) {
    parts.push(chalk.dim(`details: ${loading} loading, ${queued} queued`));
  }

  return parts.join("  ");
}

export function runFrameLoop(options: FrameLoopOptions): Promise<FrameLoopSummary> {
  const output = options.output ?? terminalOutput;
  let frames = 0;

  return new Promise((resolve, reject) => {
    const timer = setInterval(() => {
      try {
        const result = options.coordinator.poll();
        frames++;

        output.print(options.drainLogs?.() ?? []);
        if (!isEmptyTaskResult(result)) {
          options.onResult?.(result);
        }

        if (!options.coordinator.isBusy()) {
          clearInterval(timer);
          output.render(`${chalk.green("✔")} ${options.label}`);
          output.done();
          resolve({ frames });
          return;
        }

        output.render(formatStatusLine(options.coordinator, options.label, frames));
      } catch (error) {
        clearInterval(timer);
        output.done();
        reject(error);
      }
    }, options.intervalMs);
  });
}

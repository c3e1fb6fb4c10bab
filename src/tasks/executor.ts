/**
 * Background executor
 *
 * Runs background jobs off the frame loop. Jobs are fire-and-forget: each one
 * writes its own result cells before it finishes, and nothing a job throws
 * ever reaches the caller of `spawn()`.
 */

import type { ILogObj, Logger } from "tslog";
import { ExecutorError, errorMessage } from "../utils/errors.js";
import { createChildLogger, getLogger, logTiming } from "../utils/logger.js";
import { timeout } from "../utils/async.js";

/**
 * A unit of background work
 */
export type BackgroundWork = () => Promise<void>;

export interface ExecutorOptions {
  /** Maximum number of jobs alive at once (default: 256) */
  maxActive?: number;
  logger?: Logger<ILogObj>;
}

export interface RunBlockingOptions {
  /** Reject with a TimeoutError when the work takes longer */
  timeoutMs?: number;
}

export class Executor {
  private readonly active: Set<Promise<void>> = new Set();
  private readonly maxActive: number;
  private readonly logger: Logger<ILogObj>;
  private closed = false;
  private spawned = 0;

  constructor(options: ExecutorOptions = {}) {
    this.maxActive = options.maxActive ?? 256;
    this.logger = options.logger ?? createChildLogger(getLogger(), "executor");
  }

  /**
   * Schedule a job. Returns immediately; the job starts on a later microtask.
   *
   * @throws ExecutorError when the executor is shut down or saturated
   */
  spawn(name: string, work: BackgroundWork): void {
    if (this.closed) {
      throw new ExecutorError(`Cannot start "${name}": the executor is shut down`, {
        taskName: name,
      });
    }
    if (this.active.size >= this.maxActive) {
      throw new ExecutorError(
        `Cannot start "${name}": ${this.active.size} background jobs are already running`,
        { taskName: name, activeCount: this.active.size },
      );
    }

    this.spawned++;
    this.logger.trace(`Spawning ${name}`);

    const job: Promise<void> = Promise.resolve()
      .then(work)
      .catch((error: unknown) => {
        this.logger.error(`Background job "${name}" failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.active.delete(job);
      });

    this.active.add(job);
  }

  /**
   * Run short work that a user action needs an answer from before it can
   * continue (for example a cleanup preview shown in a confirmation dialog).
   * Never call this from the frame loop.
   */
  async runBlocking<T>(
    name: string,
    work: () => Promise<T>,
    options: RunBlockingOptions = {},
  ): Promise<T> {
    if (this.closed) {
      throw new ExecutorError(`Cannot run "${name}": the executor is shut down`, {
        taskName: name,
      });
    }

    return logTiming(this.logger, name, () =>
      options.timeoutMs !== undefined ? timeout(work(), options.timeoutMs, name) : work(),
    );
  }

  /**
   * Number of spawned jobs that have not finished yet
   */
  get activeCount(): number {
    return this.active.size;
  }

  /**
   * Number of jobs spawned since creation
   */
  get spawnedCount(): number {
    return this.spawned;
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  /**
   * Resolve once every spawned job (including ones spawned meanwhile) has finished
   */
  async idle(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all(this.active);
    }
  }

  /**
   * Refuse new work and wait for running jobs
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    await this.idle();
  }
}

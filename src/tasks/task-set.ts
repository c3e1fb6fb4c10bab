/**
 * Singleton task set
 *
 * Holds the long-running operations of which at most one per kind may be
 * outstanding: list loads, searches and mutations.
 */

import type { ILogObj, Logger } from "tslog";
import type { BackgroundWork, Executor } from "./executor.js";
import type { ResultCell } from "./result-cell.js";
import type { OperationCompletion, PackageListField, TaskFragment } from "./result.js";
import {
  describeTask,
  singletonKey,
  type ListOutcome,
  type OperationOutcome,
  type SingletonTask,
} from "./types.js";
import { createChildLogger, getLogger } from "../utils/logger.js";

export type PollOneResult = { keep: true } | { keep: false; fragment: TaskFragment };

const KEEP: PollOneResult = { keep: true };

export interface TaskSetOptions {
  executor: Executor;
  logger?: Logger<ILogObj>;
}

export class TaskSet {
  private readonly outstanding: Map<string, SingletonTask> = new Map();
  private readonly executor: Executor;
  private readonly logger: Logger<ILogObj>;

  constructor(options: TaskSetOptions) {
    this.executor = options.executor;
    this.logger = options.logger ?? createChildLogger(getLogger(), "task-set");
  }

  /**
   * Record a task and start its work, unless a task with the same key is
   * still outstanding, in which case the submission is dropped.
   *
   * @returns whether the task was accepted
   */
  submit(task: SingletonTask, work: BackgroundWork): boolean {
    const key = singletonKey(task);
    if (this.outstanding.has(key)) {
      this.logger.warn(`${describeTask(task)} is already running, ignoring duplicate`);
      return false;
    }

    this.executor.spawn(key, work);
    this.outstanding.set(key, task);
    this.logger.info(`Started: ${describeTask(task)}`);
    return true;
  }

  has(key: string): boolean {
    return this.outstanding.has(key);
  }

  get size(): number {
    return this.outstanding.size;
  }

  outstandingKeys(): string[] {
    return Array.from(this.outstanding.keys());
  }

  /**
   * Try to collect one task's result without waiting. A cell that is still
   * empty or held by its writer is left for the next frame.
   */
  pollOne(task: SingletonTask): PollOneResult {
    switch (task.kind) {
      case "loadInstalled":
        return takeList(task.cell, "installedPackages");
      case "loadOutdated":
        return takeList(task.cell, "outdatedPackages");
      case "search":
        return takeList(task.cell, "searchResults");
      case "loadServices": {
        const read = task.cell.tryTake();
        if (read.status !== "ready") return KEEP;
        const { services, logs } = read.value;
        return { keep: false, fragment: { type: "services", services, logs } };
      }
      case "mutatePackage": {
        const { action, packageName } = task;
        return takeOperation(task.cell, (outcome) => ({
          kind: "mutatePackage",
          action,
          packageName,
          success: outcome.success,
          message: outcome.message,
        }));
      }
      case "updateAll":
        return takeOperation(task.cell, (outcome) => ({
          kind: "updateAll",
          success: outcome.success,
          message: outcome.message,
        }));
      case "maintenance": {
        const { op } = task;
        return takeOperation(task.cell, (outcome) => ({
          kind: "maintenance",
          op,
          success: outcome.success,
          message: outcome.message,
        }));
      }
      case "serviceAction": {
        const { action, serviceName } = task;
        return takeOperation(task.cell, (outcome) => ({
          kind: "serviceAction",
          action,
          serviceName,
          success: outcome.success,
          message: outcome.message,
        }));
      }
    }
  }

  /**
   * Poll every outstanding task and forget the finished ones
   */
  pollAll(): TaskFragment[] {
    const fragments: TaskFragment[] = [];

    for (const [key, task] of this.outstanding) {
      const polled = this.pollOne(task);
      if (polled.keep) continue;

      this.outstanding.delete(key);
      this.logger.debug(`Finished: ${describeTask(task)}`);
      fragments.push(polled.fragment);
    }

    return fragments;
  }
}

function takeList(
  cell: ResultCell<ListOutcome>,
  field: PackageListField,
): PollOneResult {
  const read = cell.tryTake();
  if (read.status !== "ready") return KEEP;
  const { packages, logs } = read.value;
  return { keep: false, fragment: { type: "packages", field, packages, logs } };
}

function takeOperation(
  cell: ResultCell<OperationOutcome>,
  toCompletion: (outcome: OperationOutcome) => OperationCompletion,
): PollOneResult {
  const read = cell.tryTake();
  if (read.status !== "ready") return KEEP;
  return {
    keep: false,
    fragment: { type: "completion", completion: toCompletion(read.value), logs: read.value.logs },
  };
}

/**
 * Task Module
 *
 * Asynchronous task coordination between background package operations and
 * a frame loop that must never wait.
 */

// Types
export type {
  TaskRequest,
  SingletonRequest,
  DetailRequest,
  SingletonTask,
  SingletonKind,
  ListOutcome,
  ServicesOutcome,
  OperationOutcome,
} from "./types.js";
export { singletonKey, describeTask } from "./types.js";

export type {
  TaskResult,
  TaskFragment,
  DetailResult,
  OperationCompletion,
  PackageListField,
} from "./result.js";
export { createTaskResult, isEmptyTaskResult, mergeFragment } from "./result.js";

// Building blocks
export { ResultCell, type CellRead, type CellGuard, type CellStatus } from "./result-cell.js";
export { Executor, type BackgroundWork, type ExecutorOptions } from "./executor.js";
export { TaskSet, type PollOneResult } from "./task-set.js";
export {
  EnrichmentQueue,
  DEFAULT_MAX_CONCURRENT,
  DEFAULT_TIMEOUT_MS,
  type AbandonPolicy,
  type EnrichmentOutcome,
  type EnrichmentCompletion,
  type EnrichmentLookup,
  type RequestOutcome,
} from "./enrichment-queue.js";
export { createSingletonJob, type JobContext, type SingletonJob } from "./jobs.js";

// Coordinator
export { TaskCoordinator, type TaskCoordinatorOptions } from "./coordinator.js";

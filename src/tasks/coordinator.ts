/**
 * Task Coordinator
 *
 * Entry point of the asynchronous core. The frame loop submits requests,
 * calls `poll()` once per frame and renders whatever the returned TaskResult
 * holds. Neither call ever waits on background work.
 *
 * @example
 * ```typescript
 * const coordinator = new TaskCoordinator({ provider: new BrewProvider() });
 * coordinator.submit({ kind: "search", query: "node" });
 *
 * setInterval(() => {
 *   const result = coordinator.poll();
 *   if (result.searchResults) coordinator.requestDetailsFor(result.searchResults);
 *   render(result);
 * }, 100);
 * ```
 */

import type { ILogObj, Logger } from "tslog";
import { createPackage, needsDetail, type Package, type PackageType } from "../domain/package.js";
import type { CleanupPreview } from "../domain/package.js";
import type { MaintenanceOp, PackageProvider } from "../provider/types.js";
import { createChildLogger, getLogger } from "../utils/logger.js";
import {
  EnrichmentQueue,
  type AbandonPolicy,
  type EnrichmentCompletion,
  type RequestOutcome,
} from "./enrichment-queue.js";
import { Executor } from "./executor.js";
import { createSingletonJob } from "./jobs.js";
import {
  createTaskResult,
  mergeFragment,
  type DetailResult,
  type TaskResult,
} from "./result.js";
import { TaskSet } from "./task-set.js";
import type { DetailRequest, SingletonRequest, TaskRequest } from "./types.js";

export interface TaskCoordinatorOptions {
  provider: PackageProvider;
  executor?: Executor;
  /** Detail lookups in flight at once (default: 15) */
  maxConcurrentDetails?: number;
  /** Per-lookup timeout in ms (default: 10000) */
  detailTimeoutMs?: number;
  abandonPolicy?: AbandonPolicy;
  /** Timeout for blocking previews in ms (default: none) */
  previewTimeoutMs?: number;
  now?: () => number;
  logger?: Logger<ILogObj>;
}

export class TaskCoordinator {
  private readonly provider: PackageProvider;
  private readonly executor: Executor;
  private readonly taskSet: TaskSet;
  private readonly details: EnrichmentQueue<PackageType, Package>;
  private readonly now: () => number;
  private readonly logger: Logger<ILogObj>;
  private readonly previewTimeoutMs?: number;

  constructor(options: TaskCoordinatorOptions) {
    this.provider = options.provider;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createChildLogger(getLogger(), "coordinator");
    this.executor =
      options.executor ?? new Executor({ logger: createChildLogger(this.logger, "executor") });
    this.previewTimeoutMs = options.previewTimeoutMs;

    this.taskSet = new TaskSet({
      executor: this.executor,
      logger: createChildLogger(this.logger, "task-set"),
    });
    this.details = new EnrichmentQueue<PackageType, Package>({
      executor: this.executor,
      lookup: (name, packageType, signal) =>
        this.provider.getPackageInfo(name, packageType, { signal }),
      maxConcurrent: options.maxConcurrentDetails,
      timeoutMs: options.detailTimeoutMs,
      abandonPolicy: options.abandonPolicy,
      now: this.now,
      logger: createChildLogger(this.logger, "enrichment"),
    });
  }

  /**
   * Submit a request. Singleton requests whose kind is already running and
   * detail requests for a name already loading or queued are dropped.
   *
   * @returns whether the request was accepted
   */
  submit(request: TaskRequest): boolean {
    if (request.kind === "loadPackageDetail") {
      return this.requestDetail(request) !== "duplicate";
    }
    return this.submitSingleton(request);
  }

  /**
   * Collect everything that finished since the previous call. Never blocks
   * and never throws for a failed task; failures are part of the result.
   */
  poll(): TaskResult {
    const result = createTaskResult();
    if (!this.isBusy()) {
      return result;
    }

    for (const fragment of this.taskSet.pollAll()) {
      mergeFragment(result, fragment);
    }

    for (const [name, completion] of this.details.pollAll()) {
      result.packageDetails.set(name, toDetailResult(completion));
      result.completedDetailLoads.push(name);
    }

    this.replenishDetails();
    return result;
  }

  /**
   * Queue detail lookups for every package that has no version yet and has
   * not already failed, as done after a search
   *
   * @returns number of lookups launched or queued
   */
  requestDetailsFor(packages: readonly Package[]): number {
    let accepted = 0;
    for (const pkg of packages) {
      if (!needsDetail(pkg)) continue;
      const outcome = this.requestDetail({
        kind: "loadPackageDetail",
        name: pkg.name,
        packageType: pkg.packageType,
      });
      if (outcome !== "duplicate") accepted++;
    }
    if (accepted > 0) {
      this.logger.info(`Auto-loading details for ${accepted} packages`);
    }
    return accepted;
  }

  /**
   * Ask the provider what a cleanup would remove. This waits for the answer
   * and is meant for a confirmation dialog, not for the frame loop.
   */
  async previewCleanup(op: MaintenanceOp): Promise<CleanupPreview> {
    return this.executor.runBlocking(
      `preview:${op}`,
      () => this.provider.getCleanupPreview(op),
      { timeoutMs: this.previewTimeoutMs },
    );
  }

  isEnrichmentInFlight(name: string): boolean {
    return this.details.isInFlight(name);
  }

  pendingEnrichmentCount(): number {
    return this.details.pendingCount;
  }

  inFlightEnrichmentCount(): number {
    return this.details.inFlightCount;
  }

  canAdmitMoreEnrichment(): boolean {
    return this.details.canAdmitMore();
  }

  /**
   * Dedup keys of the singleton tasks still outstanding
   */
  outstandingKinds(): string[] {
    return this.taskSet.outstandingKeys();
  }

  /**
   * Whether anything is still outstanding or queued
   */
  isBusy(): boolean {
    return (
      this.taskSet.size > 0 || this.details.inFlightCount > 0 || this.details.pendingCount > 0
    );
  }

  /**
   * Refuse new work, cancel detail lookups (timed-out ones still running
   * included) and wait for the singleton jobs to finish
   */
  async shutdown(): Promise<void> {
    this.details.cancelAll();
    await this.executor.shutdown();
  }

  private submitSingleton(request: SingletonRequest): boolean {
    const job = createSingletonJob(request, {
      provider: this.provider,
      logger: this.logger,
      now: this.now,
    });
    return this.taskSet.submit(job.task, job.work);
  }

  private requestDetail(request: DetailRequest): RequestOutcome {
    return this.details.request(request.name, request.packageType);
  }

  /**
   * Top the in-flight set back up from the queue, earliest request first
   */
  private replenishDetails(): void {
    if (!this.details.canAdmitMore() || this.details.pendingCount === 0) return;

    const admitted = this.details.admitPending();
    this.logger.info(
      `Starting batch load of ${admitted} packages (${this.details.pendingCount} remaining in queue)`,
    );
  }
}

function toDetailResult(completion: EnrichmentCompletion<PackageType, Package>): DetailResult {
  const { itemId, category, outcome } = completion;
  switch (outcome.status) {
    case "loaded":
      return { status: "loaded", package: outcome.detail };
    case "failed":
      return {
        status: "failed",
        package: createPackage(itemId, category, { versionLoadFailed: true }),
        message: outcome.message,
      };
    case "timedOut":
      return {
        status: "timedOut",
        package: createPackage(itemId, category, { versionLoadFailed: true }),
        message: `load failed: no answer after ${outcome.elapsedMs}ms`,
      };
  }
}

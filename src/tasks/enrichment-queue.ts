/**
 * Enrichment Queue
 *
 * Bounded-concurrency runner for many small per-item lookups (package
 * details keyed by name). At most `maxConcurrent` lookups are in flight; the
 * rest wait in a FIFO queue. Each item is tracked at most once, and an
 * in-flight lookup that does not answer within `timeoutMs` is reported as
 * timed out and dropped from tracking.
 *
 * What happens to a dropped lookup depends on the abandon policy:
 * - `abandon` (default): the lookup keeps running in the background and its
 *   late result is discarded. It still occupies an executor job until it ends.
 * - `abort`: the lookup's AbortSignal fires so the provider can kill the
 *   underlying command right away.
 *
 * `cancelAll()` aborts every lookup still running, abandoned ones included,
 * so shutting down never waits on a lookup nobody is tracking any more.
 */

import type { ILogObj, Logger } from "tslog";
import type { Executor } from "./executor.js";
import { ResultCell } from "./result-cell.js";
import { abortable } from "../utils/async.js";
import { errorMessage } from "../utils/errors.js";
import { createChildLogger, getLogger } from "../utils/logger.js";

export const DEFAULT_MAX_CONCURRENT = 15;
export const DEFAULT_TIMEOUT_MS = 10_000;

export type AbandonPolicy = "abandon" | "abort";

export type EnrichmentOutcome<TDetail> =
  | { status: "loaded"; detail: TDetail }
  | { status: "failed"; message: string }
  | { status: "timedOut"; elapsedMs: number };

export interface EnrichmentCompletion<TCategory, TDetail> {
  itemId: string;
  category: TCategory;
  outcome: EnrichmentOutcome<TDetail>;
}

/**
 * Performs one lookup. Rejecting counts as a completed, failed lookup; only
 * never settling leads to a timeout.
 */
export type EnrichmentLookup<TCategory, TDetail> = (
  itemId: string,
  category: TCategory,
  signal: AbortSignal,
) => Promise<TDetail>;

export type RequestOutcome = "launched" | "queued" | "duplicate";

export interface EnrichmentQueueOptions<TCategory, TDetail> {
  executor: Executor;
  lookup: EnrichmentLookup<TCategory, TDetail>;
  /** Maximum lookups in flight (default: 15) */
  maxConcurrent?: number;
  /** Per-item timeout in ms (default: 10000) */
  timeoutMs?: number;
  abandonPolicy?: AbandonPolicy;
  /** Clock, in epoch ms */
  now?: () => number;
  logger?: Logger<ILogObj>;
}

interface InFlightEntry<TCategory, TDetail> {
  category: TCategory;
  startedAt: number;
  cell: ResultCell<EnrichmentOutcome<TDetail>>;
  controller: AbortController;
  abandoned: boolean;
  /** The lookup job has ended */
  settled: boolean;
}

interface PendingEntry<TCategory> {
  itemId: string;
  category: TCategory;
}

export class EnrichmentQueue<TCategory, TDetail> {
  private readonly inFlight: Map<string, InFlightEntry<TCategory, TDetail>> = new Map();
  private pending: PendingEntry<TCategory>[] = [];
  /** Timed out but still running */
  private readonly abandoned: Set<InFlightEntry<TCategory, TDetail>> = new Set();

  private readonly executor: Executor;
  private readonly lookup: EnrichmentLookup<TCategory, TDetail>;
  private readonly now: () => number;
  private readonly logger: Logger<ILogObj>;

  readonly maxConcurrent: number;
  readonly timeoutMs: number;
  readonly abandonPolicy: AbandonPolicy;

  constructor(options: EnrichmentQueueOptions<TCategory, TDetail>) {
    this.executor = options.executor;
    this.lookup = options.lookup;
    this.maxConcurrent = options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.abandonPolicy = options.abandonPolicy ?? "abandon";
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createChildLogger(getLogger(), "enrichment");
  }

  /**
   * Ask for an item. Starts it now if there is capacity, queues it otherwise,
   * and ignores items already in flight or queued.
   */
  request(itemId: string, category: TCategory): RequestOutcome {
    if (this.inFlight.has(itemId)) {
      this.logger.debug(`Already loading ${itemId}, skipping`);
      return "duplicate";
    }
    if (this.isPending(itemId)) {
      this.logger.debug(`Already queued for loading: ${itemId}`);
      return "duplicate";
    }
    if (this.canAdmitMore()) {
      this.launchNow(itemId, category);
      return "launched";
    }

    this.pending.push({ itemId, category });
    return "queued";
  }

  /**
   * Start a lookup immediately. Callers go through `request()` or
   * `admitPending()`, which keep the cap and the one-place invariant.
   */
  launchNow(itemId: string, category: TCategory): void {
    const entry: InFlightEntry<TCategory, TDetail> = {
      category,
      startedAt: this.now(),
      cell: new ResultCell(itemId),
      controller: new AbortController(),
      abandoned: false,
      settled: false,
    };

    this.executor.spawn(`detail:${itemId}`, async () => {
      const { signal } = entry.controller;
      let outcome: EnrichmentOutcome<TDetail>;
      try {
        const detail = await abortable(this.lookup(itemId, category, signal), signal);
        outcome = { status: "loaded", detail };
      } catch (error) {
        outcome = { status: "failed", message: errorMessage(error) };
      } finally {
        entry.settled = true;
        this.abandoned.delete(entry);
      }

      if (entry.abandoned) {
        this.logger.debug(`Discarding late result for ${itemId}`);
        return;
      }
      entry.cell.write(outcome);
    });

    this.inFlight.set(itemId, entry);
    this.logger.debug(`Started lookup for ${itemId}`);
  }

  canAdmitMore(): boolean {
    return this.inFlight.size < this.maxConcurrent;
  }

  /**
   * Free in-flight slots
   */
  get capacity(): number {
    return Math.max(0, this.maxConcurrent - this.inFlight.size);
  }

  /**
   * Remove up to `count` queued items, earliest request first
   */
  drainPending(count: number): PendingEntry<TCategory>[] {
    if (count <= 0) return [];
    return this.pending.splice(0, count);
  }

  /**
   * Launch queued items while there is capacity, earliest request first. An
   * item leaves the queue only once its lookup has been spawned, so an
   * executor failure leaves it queued.
   *
   * @returns number of lookups launched
   * @throws ExecutorError when the executor refuses a lookup
   */
  admitPending(): number {
    let admitted = 0;
    while (this.canAdmitMore()) {
      const [next] = this.drainPending(1);
      if (!next) break;
      try {
        this.launchNow(next.itemId, next.category);
      } catch (error) {
        this.pending.unshift(next);
        throw error;
      }
      admitted++;
    }
    return admitted;
  }

  /**
   * Abort every running lookup, abandoned ones included, and forget queued
   * items
   */
  cancelAll(): void {
    for (const entry of [...this.inFlight.values(), ...this.abandoned]) {
      entry.abandoned = true;
      entry.controller.abort();
    }
    this.logger.debug(
      `Cancelled ${this.inFlight.size + this.abandoned.size} lookups, dropped ${this.pending.length} queued`,
    );
    this.inFlight.clear();
    this.abandoned.clear();
    this.pending = [];
  }

  /**
   * Lookups that timed out but have not ended yet
   */
  get abandonedCount(): number {
    return this.abandoned.size;
  }

  isInFlight(itemId: string): boolean {
    return this.inFlight.has(itemId);
  }

  isPending(itemId: string): boolean {
    return this.pending.some((entry) => entry.itemId === itemId);
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Collect finished and timed-out lookups without waiting. Items whose
   * result is still missing or being written stay in flight.
   */
  pollAll(): Map<string, EnrichmentCompletion<TCategory, TDetail>> {
    const completed = new Map<string, EnrichmentCompletion<TCategory, TDetail>>();
    if (this.inFlight.size === 0) return completed;

    const now = this.now();

    for (const [itemId, entry] of this.inFlight) {
      const elapsedMs = now - entry.startedAt;

      if (elapsedMs > this.timeoutMs) {
        this.logger.warn(`Detail loading timed out for ${itemId} after ${elapsedMs}ms`);
        this.abandon(entry);
        this.inFlight.delete(itemId);
        completed.set(itemId, {
          itemId,
          category: entry.category,
          outcome: { status: "timedOut", elapsedMs },
        });
        continue;
      }

      const read = entry.cell.tryTake();
      if (read.status !== "ready") continue;

      this.inFlight.delete(itemId);
      completed.set(itemId, { itemId, category: entry.category, outcome: read.value });
    }

    return completed;
  }

  private abandon(entry: InFlightEntry<TCategory, TDetail>): void {
    entry.abandoned = true;
    if (!entry.settled) this.abandoned.add(entry);
    if (this.abandonPolicy === "abort") {
      entry.controller.abort();
    }
  }
}

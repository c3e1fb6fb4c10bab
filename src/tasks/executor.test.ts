/**
 * Tests for Executor
 */

import { describe, it, expect, vi } from "vitest";
import { Executor } from "./executor.js";
import { ExecutorError, TimeoutError } from "../utils/errors.js";
import { deferred } from "../utils/async.js";
import { createSilentLogger } from "../../test/mocks/logger.js";

function createExecutor(maxActive?: number): Executor {
  return new Executor({ maxActive, logger: createSilentLogger() });
}

describe("Executor.spawn", () => {
  it("should not run work synchronously inside the caller", async () => {
    const executor = createExecutor();
    const work = vi.fn().mockResolvedValue(undefined);

    executor.spawn("job", work);

    expect(work).not.toHaveBeenCalled();
    expect(executor.activeCount).toBe(1);

    await executor.idle();

    expect(work).toHaveBeenCalledTimes(1);
    expect(executor.activeCount).toBe(0);
    expect(executor.spawnedCount).toBe(1);
  });

  it("should contain a failing job", async () => {
    const logger = createSilentLogger();
    const errorSpy = vi.spyOn(logger, "error");
    const executor = new Executor({ logger });

    executor.spawn("broken", () => Promise.reject(new Error("boom")));
    await executor.idle();

    expect(errorSpy).toHaveBeenCalledWith('Background job "broken" failed: boom');
    expect(executor.activeCount).toBe(0);
  });

  it("should throw ExecutorError when saturated", () => {
    const executor = createExecutor(2);
    const gate = deferred<void>();

    executor.spawn("a", () => gate.promise);
    executor.spawn("b", () => gate.promise);

    expect(() => executor.spawn("c", () => gate.promise)).toThrow(ExecutorError);
    expect(() => executor.spawn("c", () => gate.promise)).toThrow(
      'Cannot start "c": 2 background jobs are already running',
    );
    gate.resolve();
  });

  it("should throw ExecutorError after shutdown", async () => {
    const executor = createExecutor();
    await executor.shutdown();

    expect(executor.isShutdown).toBe(true);
    expect(() => executor.spawn("late", async () => undefined)).toThrow(
      'Cannot start "late": the executor is shut down',
    );
  });

  it("should wait for running jobs on shutdown", async () => {
    const executor = createExecutor();
    const gate = deferred<void>();
    let finished = false;

    executor.spawn("slow", async () => {
      await gate.promise;
      finished = true;
    });

    const stopping = executor.shutdown();
    gate.resolve();
    await stopping;

    expect(finished).toBe(true);
  });
});

describe("Executor.runBlocking", () => {
  it("should return the work's value", async () => {
    const executor = createExecutor();

    await expect(executor.runBlocking("preview", async () => 3)).resolves.toBe(3);
  });

  it("should propagate the work's error", async () => {
    const executor = createExecutor();

    await expect(
      executor.runBlocking("preview", () => Promise.reject(new Error("no brew"))),
    ).rejects.toThrow("no brew");
  });

  it("should reject with TimeoutError when the work is too slow", async () => {
    vi.useFakeTimers();
    try {
      const executor = createExecutor();
      const never = new Promise<number>(() => undefined);

      const running = executor.runBlocking("preview", () => never, { timeoutMs: 50 });
      const assertion = expect(running).rejects.toThrow("preview timed out after 50ms");
      await vi.advanceTimersByTimeAsync(51);
      await assertion;
      await expect(running).rejects.toBeInstanceOf(TimeoutError);
    } finally {
      vi.useRealTimers();
    }
  });

  it("should refuse work after shutdown", async () => {
    const executor = createExecutor();
    await executor.shutdown();

    await expect(executor.runBlocking("preview", async () => 1)).rejects.toThrow(
      'Cannot run "preview": the executor is shut down',
    );
  });
});

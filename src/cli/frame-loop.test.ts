/**
 * Tests for the frame loop
 */

import { describe, it, expect, beforeAll, afterEach } from "vitest";
import chalk from "chalk";
import { createPackage } from "../domain/package.js";
import { TaskCoordinator } from "../tasks/coordinator.js";
import type { TaskResult } from "../tasks/result.js";
import {
  FakePackageProvider,
  createRecordingOutput,
  createSilentLogger,
} from "../../test/mocks/index.js";
import { formatStatusLine, runFrameLoop } from "./frame-loop.js";

beforeAll(() => {
  chalk.level = 0;
});

describe("formatStatusLine", () => {
  let coordinator: TaskCoordinator;

  afterEach(async () => {
    await coordinator.shutdown();
  });

  it("should show only the label when idle", () => {
    coordinator = new TaskCoordinator({
      provider: new FakePackageProvider(),
      logger: createSilentLogger(),
    });

    expect(formatStatusLine(coordinator, "Loading", 0)).toBe("⠋ Loading");
  });

  it("should list outstanding kinds and detail counts", () => {
    const provider = new FakePackageProvider();
    provider.installed.respond(() => []);
    provider.info.respond((name, type) => createPackage(name, type, { version: "1.0" }));
    coordinator = new TaskCoordinator({
      provider,
      maxConcurrentDetails: 1,
      logger: createSilentLogger(),
    });

    coordinator.submit({ kind: "loadInstalled" });
    coordinator.submit({ kind: "loadPackageDetail", name: "wget", packageType: "formula" });
    coordinator.submit({ kind: "loadPackageDetail", name: "curl", packageType: "formula" });

    expect(formatStatusLine(coordinator, "Loading", 1)).toBe(
      "⠙ Loading  loadInstalled  details: 1 loading, 1 queued",
    );

  });
});

describe("runFrameLoop", () => {
  let coordinator: TaskCoordinator;

  afterEach(async () => {
    await coordinator.shutdown();
  });

  it("should stop on the first frame when nothing is outstanding", async () => {
    coordinator = new TaskCoordinator({
      provider: new FakePackageProvider(),
      logger: createSilentLogger(),
    });
    const recorder = createRecordingOutput();

    const summary = await runFrameLoop({
      coordinator,
      intervalMs: 5,
      label: "Idle",
      output: recorder.output,
    });

    expect(summary.frames).toBe(1);
    expect(recorder.rendered).toEqual(["✔ Idle"]);
    expect(recorder.doneCount()).toBe(1);
  });

  it("should hand results to the callback until the work is done", async () => {
    const provider = new FakePackageProvider();
    provider.installed.respond((type) =>
      type === "formula" ? [createPackage("wget", "formula", { version: "1.21.4" })] : [],
    );
    coordinator = new TaskCoordinator({ provider, logger: createSilentLogger() });
    const recorder = createRecordingOutput();
    const results: TaskResult[] = [];

    coordinator.submit({ kind: "loadInstalled" });
    await runFrameLoop({
      coordinator,
      intervalMs: 5,
      label: "Loading installed packages",
      onResult: (result) => results.push(result),
      output: recorder.output,
    });

    expect(results).toHaveLength(1);
    expect(results[0]?.installedPackages?.map((p) => p.name)).toEqual(["wget"]);
    expect(recorder.rendered.at(-1)).toBe("✔ Loading installed packages");
    expect(coordinator.isBusy()).toBe(false);
  });

  it("should print drained log lines", async () => {
    coordinator = new TaskCoordinator({
      provider: new FakePackageProvider(),
      logger: createSilentLogger(),
    });
    const recorder = createRecordingOutput();
    const pending = [["[INFO] Loaded 3 services"]];

    await runFrameLoop({
      coordinator,
      intervalMs: 5,
      label: "Idle",
      drainLogs: () => pending.shift() ?? [],
      output: recorder.output,
    });

    expect(recorder.printed).toEqual([["[INFO] Loaded 3 services"]]);
  });

  it("should reject and stop when the callback throws", async () => {
    const provider = new FakePackageProvider();
    provider.services.respond(() => []);
    coordinator = new TaskCoordinator({ provider, logger: createSilentLogger() });
    const recorder = createRecordingOutput();

    coordinator.submit({ kind: "loadServices" });
    await expect(
      runFrameLoop({
        coordinator,
        intervalMs: 5,
        label: "Loading services",
        onResult: () => {
          throw new Error("render failed");
        },
        output: recorder.output,
      }),
    ).rejects.toThrow("render failed");
    expect(recorder.doneCount()).toBe(1);
  });
});

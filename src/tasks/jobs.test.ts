/**
 * Tests for singleton jobs
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createSingletonJob, type JobContext, type SingletonJob } from "./jobs.js";
import type { ResultCell } from "./result-cell.js";
import type { ListOutcome, OperationOutcome, ServicesOutcome } from "./types.js";
import { createPackage, type PackageType } from "../domain/package.js";
import { ProviderError } from "../utils/errors.js";
import { FakePackageProvider } from "../../test/mocks/fake-provider.js";
import { createSilentLogger } from "../../test/mocks/logger.js";

function take<T>(cell: ResultCell<T>): T {
  const read = cell.tryTake();
  if (read.status !== "ready") throw new Error(`cell is ${read.status}`);
  return read.value;
}

function listOutcome(job: SingletonJob): ListOutcome {
  const { task } = job;
  if (task.kind === "loadInstalled" || task.kind === "loadOutdated" || task.kind === "search") {
    return take(task.cell);
  }
  throw new Error(`not a list task: ${task.kind}`);
}

function operationOutcome(job: SingletonJob): OperationOutcome {
  const { task } = job;
  if (
    task.kind === "mutatePackage" ||
    task.kind === "updateAll" ||
    task.kind === "maintenance" ||
    task.kind === "serviceAction"
  ) {
    return take(task.cell);
  }
  throw new Error(`not an operation task: ${task.kind}`);
}

function servicesOutcome(job: SingletonJob): ServicesOutcome {
  const { task } = job;
  if (task.kind === "loadServices") return take(task.cell);
  throw new Error(`not a services task: ${task.kind}`);
}

describe("createSingletonJob", () => {
  let provider: FakePackageProvider;
  let ctx: JobContext;

  const wget = createPackage("wget", "formula", { version: "1.24.5", installed: true });
  const firefox = createPackage("firefox", "cask", { version: "128.0", installed: true });

  beforeEach(() => {
    provider = new FakePackageProvider();
    ctx = { provider, logger: createSilentLogger(), now: () => 1234 };
  });

  describe("loadInstalled", () => {
    it("should load formulae then casks", async () => {
      const order: PackageType[] = [];
      provider.installed.respond((type) => {
        order.push(type);
        return type === "formula" ? [wget] : [firefox];
      });

      const job = createSingletonJob({ kind: "loadInstalled" }, ctx);
      expect(job.task.submittedAt).toBe(1234);
      await job.work();

      expect(order).toEqual(["formula", "cask"]);
      expect(listOutcome(job)).toEqual({
        packages: [wget, firefox],
        logs: ["Loaded 1 installed formulae", "Loaded 1 installed casks"],
      });
    });

    it("should keep the formulae when casks fail", async () => {
      provider.installed.respond((type) =>
        type === "cask" ? Promise.reject(new Error("boom")) : [wget],
      );

      const job = createSingletonJob({ kind: "loadInstalled" }, ctx);
      await job.work();

      expect(listOutcome(job)).toEqual({
        packages: [wget],
        logs: ["Loaded 1 installed formulae", "Error loading installed casks: boom"],
      });
    });
  });

  describe("loadOutdated", () => {
    it("should report outdated packages of both types", async () => {
      const outdated = createPackage("node", "formula", {
        version: "20.1.0",
        availableVersion: "22.4.0",
        installed: true,
        outdated: true,
      });
      provider.outdated.respond((type) => (type === "formula" ? [outdated] : []));

      const job = createSingletonJob({ kind: "loadOutdated" }, ctx);
      await job.work();

      expect(listOutcome(job)).toEqual({
        packages: [outdated],
        logs: ["Loaded 1 outdated formulae", "Loaded 0 outdated casks"],
      });
    });
  });

  describe("search", () => {
    it("should merge hits and report per-type failures", async () => {
      const node = createPackage("node", "formula");
      provider.search.respond((_query, type) =>
        type === "formula"
          ? [node]
          : Promise.reject(
              new ProviderError("brew search --cask node failed", {
                command: "brew search --cask node",
                stderr: "Error: No casks found for \"node\".",
              }),
            ),
      );

      const job = createSingletonJob({ kind: "search", query: "node" }, ctx);
      await job.work();

      expect(listOutcome(job)).toEqual({
        packages: [node],
        logs: [
          "Found 1 formulae matching 'node'",
          'Error searching casks: Error: No casks found for "node".',
        ],
      });
    });

    it("should label each result with the type it searched", async () => {
      const firefox = createPackage("firefox", "cask");
      provider.search.respond((_query, type) =>
        type === "cask" ? [firefox] : Promise.reject(new Error("formula index missing")),
      );

      const job = createSingletonJob({ kind: "search", query: "fire" }, ctx);
      await job.work();

      expect(listOutcome(job)).toEqual({
        packages: [firefox],
        logs: ["Error searching formulae: formula index missing", "Found 1 casks matching 'fire'"],
      });
    });

    it("should still write its cell when the provider throws synchronously", async () => {
      class ThrowingProvider extends FakePackageProvider {
        override searchPackages(): never {
          throw new Error("not ready");
        }
      }
      const job = createSingletonJob(
        { kind: "search", query: "x" },
        { ...ctx, provider: new ThrowingProvider() },
      );
      await job.work();

      expect(listOutcome(job)).toEqual({ packages: [], logs: ["Unexpected error: not ready"] });
    });
  });

  describe("mutatePackage", () => {
    it("should report a successful install", async () => {
      provider.packageAction.respond(() => undefined);

      const job = createSingletonJob({ kind: "mutatePackage", action: "install", package: wget }, ctx);
      await job.work();

      expect(operationOutcome(job)).toEqual({
        success: true,
        message: "wget installed successfully",
        logs: ["Installing package: wget (formula)", "Successfully installed wget"],
      });
      expect(job.task).toMatchObject({ kind: "mutatePackage", action: "install", packageName: "wget" });
    });

    it("should report a failed uninstall with the provider's message", async () => {
      provider.packageAction.respond(() =>
        Promise.reject(new Error("Error: No such keg: /opt/homebrew/Cellar/wget")),
      );

      const job = createSingletonJob(
        { kind: "mutatePackage", action: "uninstall", package: wget },
        ctx,
      );
      await job.work();

      expect(operationOutcome(job)).toEqual({
        success: false,
        message: "Error: No such keg: /opt/homebrew/Cellar/wget",
        logs: [
          "Uninstalling package: wget (formula)",
          "Error uninstalling wget: Error: No such keg: /opt/homebrew/Cellar/wget",
        ],
      });
    });

    it("should pass the package to the provider", async () => {
      provider.packageAction.respond(() => undefined);

      await createSingletonJob({ kind: "mutatePackage", action: "pin", package: wget }, ctx).work();

      expect(provider.packageAction.callCount).toBe(1);
    });
  });

  describe("updateAll", () => {
    it("should report success", async () => {
      provider.upgradeAll.respond(() => undefined);

      const job = createSingletonJob({ kind: "updateAll" }, ctx);
      await job.work();

      expect(operationOutcome(job)).toEqual({
        success: true,
        message: "All packages updated successfully",
        logs: ["Updating all packages", "Successfully updated all packages"],
      });
    });
  });

  describe("maintenance", () => {
    it("should clean the cache", async () => {
      provider.maintenance.respond(() => undefined);

      const job = createSingletonJob({ kind: "maintenance", op: "cleanCache" }, ctx);
      await job.work();

      expect(operationOutcome(job)).toEqual({
        success: true,
        message: "Cache cleaned successfully",
        logs: ["Cleaning cache", "Successfully cleaned cache"],
      });
    });

    it("should report a failed old-version cleanup", async () => {
      provider.maintenance.respond(() => Promise.reject(new Error("permission denied")));

      const job = createSingletonJob({ kind: "maintenance", op: "cleanupOldVersions" }, ctx);
      await job.work();

      expect(operationOutcome(job)).toEqual({
        success: false,
        message: "permission denied",
        logs: ["Cleaning up old versions", "Error cleaning up old versions: permission denied"],
      });
    });
  });

  describe("services", () => {
    it("should load services", async () => {
      provider.services.respond(() => [
        { name: "postgresql@16", status: "started", user: "dev" },
        { name: "redis", status: "stopped" },
      ]);

      const job = createSingletonJob({ kind: "loadServices" }, ctx);
      await job.work();

      expect(servicesOutcome(job)).toEqual({
        services: [
          { name: "postgresql@16", status: "started", user: "dev" },
          { name: "redis", status: "stopped" },
        ],
        logs: ["Loaded 2 services"],
      });
    });

    it("should report a failed service listing", async () => {
      provider.services.respond(() => Promise.reject(new Error("launchctl not found")));

      const job = createSingletonJob({ kind: "loadServices" }, ctx);
      await job.work();

      expect(servicesOutcome(job)).toEqual({
        services: [],
        logs: ["Error loading services: launchctl not found"],
      });
    });

    it("should restart a service", async () => {
      provider.serviceAction.respond(() => undefined);

      const job = createSingletonJob({ kind: "serviceAction", action: "restart", name: "redis" }, ctx);
      await job.work();

      expect(operationOutcome(job)).toEqual({
        success: true,
        message: "redis restarted successfully",
        logs: ["Restarting service: redis", "Successfully restarted redis"],
      });
      expect(job.task).toMatchObject({ kind: "serviceAction", action: "restart", serviceName: "redis" });
    });
  });
});

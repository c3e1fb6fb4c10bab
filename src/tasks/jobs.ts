/**
 * Background jobs for singleton requests
 *
 * Turns a request into the task record the task set keeps plus the work the
 * executor runs. Every job writes its cell exactly once, whether the provider
 * call succeeds, fails, or the job itself throws.
 */

import type { ILogObj, Logger } from "tslog";
import type { Package, PackageType } from "../domain/package.js";
import { PACKAGE_TYPES } from "../domain/package.js";
import type {
  MaintenanceOp,
  PackageAction,
  PackageProvider,
  ServiceAction,
} from "../provider/types.js";
import { errorMessage } from "../utils/errors.js";
import type { BackgroundWork } from "./executor.js";
import { ResultCell } from "./result-cell.js";
import type {
  ListOutcome,
  OperationOutcome,
  ServicesOutcome,
  SingletonRequest,
  SingletonTask,
} from "./types.js";

export interface JobContext {
  provider: PackageProvider;
  logger: Logger<ILogObj>;
  now: () => number;
}

export interface SingletonJob {
  task: SingletonTask;
  work: BackgroundWork;
}

const TYPE_PLURALS: Record<PackageType, string> = {
  formula: "formulae",
  cask: "casks",
};

const PACKAGE_ACTION_VERBS: Record<PackageAction, { progressive: string; past: string }> = {
  install: { progressive: "Installing", past: "installed" },
  uninstall: { progressive: "Uninstalling", past: "uninstalled" },
  update: { progressive: "Updating", past: "updated" },
  pin: { progressive: "Pinning", past: "pinned" },
  unpin: { progressive: "Unpinning", past: "unpinned" },
};

const SERVICE_ACTION_VERBS: Record<ServiceAction, { progressive: string; past: string }> = {
  start: { progressive: "Starting", past: "started" },
  stop: { progressive: "Stopping", past: "stopped" },
  restart: { progressive: "Restarting", past: "restarted" },
};

const MAINTENANCE_MESSAGES: Record<
  MaintenanceOp,
  { start: string; done: string; success: string; failure: string }
> = {
  cleanCache: {
    start: "Cleaning cache",
    done: "Successfully cleaned cache",
    success: "Cache cleaned successfully",
    failure: "Error cleaning cache",
  },
  cleanupOldVersions: {
    start: "Cleaning up old versions",
    done: "Successfully cleaned up old versions",
    success: "Old versions cleaned up successfully",
    failure: "Error cleaning up old versions",
  },
};

/**
 * Build the task record and background work for a singleton request
 */
export function createSingletonJob(request: SingletonRequest, ctx: JobContext): SingletonJob {
  const submittedAt = ctx.now();

  switch (request.kind) {
    case "loadInstalled": {
      const cell = new ResultCell<ListOutcome>("installed");
      return {
        task: { kind: "loadInstalled", cell, submittedAt },
        work: completeWith(cell, () => loadLists(ctx, "installed"), listFailure),
      };
    }
    case "loadOutdated": {
      const cell = new ResultCell<ListOutcome>("outdated");
      return {
        task: { kind: "loadOutdated", cell, submittedAt },
        work: completeWith(cell, () => loadLists(ctx, "outdated"), listFailure),
      };
    }
    case "search": {
      const cell = new ResultCell<ListOutcome>("search");
      const { query } = request;
      return {
        task: { kind: "search", query, cell, submittedAt },
        work: completeWith(cell, () => search(ctx, query), listFailure),
      };
    }
    case "mutatePackage": {
      const cell = new ResultCell<OperationOutcome>(`${request.action}:${request.package.name}`);
      const { action } = request;
      const pkg = request.package;
      const verbs = PACKAGE_ACTION_VERBS[action];
      return {
        task: { kind: "mutatePackage", action, packageName: pkg.name, cell, submittedAt },
        work: completeWith(
          cell,
          () =>
            runOperation(ctx, {
              start: `${verbs.progressive} package: ${pkg.name} (${pkg.packageType})`,
              done: `Successfully ${verbs.past} ${pkg.name}`,
              success: `${pkg.name} ${verbs.past} successfully`,
              failure: `Error ${verbs.progressive.toLowerCase()} ${pkg.name}`,
              run: () => ctx.provider.runPackageAction(action, pkg),
            }),
          operationFailure,
        ),
      };
    }
    case "updateAll": {
      const cell = new ResultCell<OperationOutcome>("updateAll");
      return {
        task: { kind: "updateAll", cell, submittedAt },
        work: completeWith(
          cell,
          () =>
            runOperation(ctx, {
              start: "Updating all packages",
              done: "Successfully updated all packages",
              success: "All packages updated successfully",
              failure: "Error updating all packages",
              run: () => ctx.provider.updateAll(),
            }),
          operationFailure,
        ),
      };
    }
    case "maintenance": {
      const cell = new ResultCell<OperationOutcome>(request.op);
      const { op } = request;
      return {
        task: { kind: "maintenance", op, cell, submittedAt },
        work: completeWith(
          cell,
          () =>
            runOperation(ctx, {
              ...MAINTENANCE_MESSAGES[op],
              run: () => ctx.provider.runMaintenance(op),
            }),
          operationFailure,
        ),
      };
    }
    case "loadServices": {
      const cell = new ResultCell<ServicesOutcome>("services");
      return {
        task: { kind: "loadServices", cell, submittedAt },
        work: completeWith(cell, () => loadServices(ctx), (error) => ({
          services: [],
          logs: [`Unexpected error: ${errorMessage(error)}`],
        })),
      };
    }
    case "serviceAction": {
      const cell = new ResultCell<OperationOutcome>(`${request.action}:${request.name}`);
      const { action, name } = request;
      const verbs = SERVICE_ACTION_VERBS[action];
      return {
        task: { kind: "serviceAction", action, serviceName: name, cell, submittedAt },
        work: completeWith(
          cell,
          () =>
            runOperation(ctx, {
              start: `${verbs.progressive} service: ${name}`,
              done: `Successfully ${verbs.past} ${name}`,
              success: `${name} ${verbs.past} successfully`,
              failure: `Error ${verbs.progressive.toLowerCase()} ${name}`,
              run: () => ctx.provider.runServiceAction(action, name),
            }),
          operationFailure,
        ),
      };
    }
  }
}

/**
 * Run `produce` and write its value, or the fallback built from the thrown
 * error, into the cell
 */
function completeWith<T>(
  cell: ResultCell<T>,
  produce: () => Promise<T>,
  fallback: (error: unknown) => T,
): BackgroundWork {
  return async () => {
    let outcome: T;
    try {
      outcome = await produce();
    } catch (error) {
      outcome = fallback(error);
    }
    cell.write(outcome);
  };
}

function listFailure(error: unknown): ListOutcome {
  return { packages: [], logs: [`Unexpected error: ${errorMessage(error)}`] };
}

function operationFailure(error: unknown): OperationOutcome {
  const message = errorMessage(error);
  return { success: false, message, logs: [`Unexpected error: ${message}`] };
}

async function loadLists(ctx: JobContext, which: "installed" | "outdated"): Promise<ListOutcome> {
  const packages: Package[] = [];
  const logs: string[] = [];

  for (const packageType of PACKAGE_TYPES) {
    const label = TYPE_PLURALS[packageType];
    try {
      const loaded =
        which === "installed"
          ? await ctx.provider.getInstalledPackages(packageType)
          : await ctx.provider.getOutdatedPackages(packageType);
      const msg = `Loaded ${loaded.length} ${which} ${label}`;
      logs.push(msg);
      ctx.logger.info(msg);
      packages.push(...loaded);
    } catch (error) {
      const msg = `Error loading ${which} ${label}: ${errorMessage(error)}`;
      logs.push(msg);
      ctx.logger.error(msg);
    }
  }

  return { packages, logs };
}

/** One package type's search, kept apart so a failing type does not hide the other */
type SearchOutcome =
  | { packageType: PackageType; found: Package[] }
  | { packageType: PackageType; error: unknown };

async function search(ctx: JobContext, query: string): Promise<ListOutcome> {
  const searches = await Promise.all(
    PACKAGE_TYPES.map((packageType) =>
      ctx.provider.searchPackages(query, packageType).then(
        (found): SearchOutcome => ({ packageType, found }),
        (error: unknown): SearchOutcome => ({ packageType, error }),
      ),
    ),
  );

  const packages: Package[] = [];
  const logs: string[] = [];

  for (const outcome of searches) {
    const label = TYPE_PLURALS[outcome.packageType];
    if ("found" in outcome) {
      const msg = `Found ${outcome.found.length} ${label} matching '${query}'`;
      logs.push(msg);
      ctx.logger.info(msg);
      packages.push(...outcome.found);
    } else {
      const msg = `Error searching ${label}: ${errorMessage(outcome.error)}`;
      logs.push(msg);
      ctx.logger.error(msg);
    }
  }

  return { packages, logs };
}

async function loadServices(ctx: JobContext): Promise<ServicesOutcome> {
  try {
    const services = await ctx.provider.listServices();
    const msg = `Loaded ${services.length} services`;
    ctx.logger.info(msg);
    return { services, logs: [msg] };
  } catch (error) {
    const msg = `Error loading services: ${errorMessage(error)}`;
    ctx.logger.error(msg);
    return { services: [], logs: [msg] };
  }
}

interface OperationSpec {
  start: string;
  done: string;
  success: string;
  failure: string;
  run: () => Promise<void>;
}

async function runOperation(ctx: JobContext, spec: OperationSpec): Promise<OperationOutcome> {
  const logs = [spec.start];
  ctx.logger.info(spec.start);

  try {
    await spec.run();
    logs.push(spec.done);
    ctx.logger.info(spec.done);
    return { success: true, message: spec.success, logs };
  } catch (error) {
    const message = errorMessage(error);
    const msg = `${spec.failure}: ${message}`;
    logs.push(msg);
    ctx.logger.error(msg);
    return { success: false, message, logs };
  }
}

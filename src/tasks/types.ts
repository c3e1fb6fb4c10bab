/**
 * Task Types
 *
 * Requests describe what the caller wants done; tasks are the records the
 * coordinator keeps while the work is outstanding. Each singleton task kind
 * has its own record shape so a missing cell or field is a compile error.
 */

import type { Package, PackageType } from "../domain/package.js";
import type { Service } from "../domain/service.js";
import type {
  MaintenanceOp,
  PackageAction,
  ServiceAction,
} from "../provider/types.js";
import type { ResultCell } from "./result-cell.js";

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export type TaskRequest =
  | { kind: "loadInstalled" }
  | { kind: "loadOutdated" }
  | { kind: "search"; query: string }
  | { kind: "mutatePackage"; action: PackageAction; package: Package }
  | { kind: "updateAll" }
  | { kind: "maintenance"; op: MaintenanceOp }
  | { kind: "loadServices" }
  | { kind: "serviceAction"; action: ServiceAction; name: string }
  | { kind: "loadPackageDetail"; name: string; packageType: PackageType };

export type SingletonRequest = Exclude<TaskRequest, { kind: "loadPackageDetail" }>;

export type DetailRequest = Extract<TaskRequest, { kind: "loadPackageDetail" }>;

// ---------------------------------------------------------------------------
// Outcomes written by background jobs
// ---------------------------------------------------------------------------

export interface ListOutcome {
  packages: Package[];
  logs: string[];
}

export interface ServicesOutcome {
  services: Service[];
  logs: string[];
}

export interface OperationOutcome {
  success: boolean;
  message: string;
  logs: string[];
}

// ---------------------------------------------------------------------------
// Singleton tasks
// ---------------------------------------------------------------------------

interface TaskBase {
  /** Epoch ms at submission */
  submittedAt: number;
}

export interface LoadInstalledTask extends TaskBase {
  kind: "loadInstalled";
  cell: ResultCell<ListOutcome>;
}

export interface LoadOutdatedTask extends TaskBase {
  kind: "loadOutdated";
  cell: ResultCell<ListOutcome>;
}

export interface SearchTask extends TaskBase {
  kind: "search";
  query: string;
  cell: ResultCell<ListOutcome>;
}

export interface MutatePackageTask extends TaskBase {
  kind: "mutatePackage";
  action: PackageAction;
  packageName: string;
  cell: ResultCell<OperationOutcome>;
}

export interface UpdateAllTask extends TaskBase {
  kind: "updateAll";
  cell: ResultCell<OperationOutcome>;
}

export interface MaintenanceTask extends TaskBase {
  kind: "maintenance";
  op: MaintenanceOp;
  cell: ResultCell<OperationOutcome>;
}

export interface LoadServicesTask extends TaskBase {
  kind: "loadServices";
  cell: ResultCell<ServicesOutcome>;
}

export interface ServiceActionTask extends TaskBase {
  kind: "serviceAction";
  action: ServiceAction;
  serviceName: string;
  cell: ResultCell<OperationOutcome>;
}

export type SingletonTask =
  | LoadInstalledTask
  | LoadOutdatedTask
  | SearchTask
  | MutatePackageTask
  | UpdateAllTask
  | MaintenanceTask
  | LoadServicesTask
  | ServiceActionTask;

export type SingletonKind = SingletonTask["kind"];

/**
 * Dedup key of a singleton task: its kind, refined by the action or
 * operation for the parameterised kinds
 */
export function singletonKey(task: SingletonTask): string {
  switch (task.kind) {
    case "mutatePackage":
    case "serviceAction":
      return `${task.kind}:${task.action}`;
    case "maintenance":
      return `${task.kind}:${task.op}`;
    default:
      return task.kind;
  }
}

/**
 * Short human-readable description for log lines
 */
export function describeTask(task: SingletonTask): string {
  switch (task.kind) {
    case "loadInstalled":
      return "Load installed packages";
    case "loadOutdated":
      return "Load outdated packages";
    case "search":
      return `Search '${task.query}'`;
    case "mutatePackage":
      return `${task.action} ${task.packageName}`;
    case "updateAll":
      return "Update all packages";
    case "maintenance":
      return task.op === "cleanCache" ? "Clean cache" : "Clean up old versions";
    case "loadServices":
      return "Load services";
    case "serviceAction":
      return `${task.action} service ${task.serviceName}`;
  }
}

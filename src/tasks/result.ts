/**
 * Per-frame task results
 */

import type { Package } from "../domain/package.js";
import type { Service } from "../domain/service.js";
import type { MaintenanceOp, PackageAction, ServiceAction } from "../provider/types.js";

/**
 * Result of one package detail lookup. `timedOut` is kept apart from
 * `failed` so the UI can show a lookup that never answered differently from
 * one that answered with an error.
 */
export type DetailResult =
  | { status: "loaded"; package: Package }
  | { status: "failed"; package: Package; message: string }
  | { status: "timedOut"; package: Package; message: string };

/**
 * Completion marker of a mutating operation
 */
export type OperationCompletion =
  | {
      kind: "mutatePackage";
      action: PackageAction;
      packageName: string;
      success: boolean;
      message: string;
    }
  | { kind: "updateAll"; success: boolean; message: string }
  | { kind: "maintenance"; op: MaintenanceOp; success: boolean; message: string }
  | {
      kind: "serviceAction";
      action: ServiceAction;
      serviceName: string;
      success: boolean;
      message: string;
    };

export type PackageListField = "installedPackages" | "outdatedPackages" | "searchResults";

/**
 * What a single finished singleton task contributes to a frame's result
 */
export type TaskFragment =
  | { type: "packages"; field: PackageListField; packages: Package[]; logs: string[] }
  | { type: "services"; services: Service[]; logs: string[] }
  | { type: "completion"; completion: OperationCompletion; logs: string[] };

/**
 * Everything that finished since the previous poll. Built fresh on every
 * poll and meant to be consumed right away.
 */
export interface TaskResult {
  installedPackages?: Package[];
  outdatedPackages?: Package[];
  searchResults?: Package[];
  services?: Service[];
  /** Detail lookups that finished or timed out, by package name */
  packageDetails: Map<string, DetailResult>;
  /** Names whose detail lookups left the in-flight set this frame */
  completedDetailLoads: string[];
  completions: OperationCompletion[];
  logs: string[];
}

export function createTaskResult(): TaskResult {
  return {
    packageDetails: new Map(),
    completedDetailLoads: [],
    completions: [],
    logs: [],
  };
}

export function isEmptyTaskResult(result: TaskResult): boolean {
  return (
    result.installedPackages === undefined &&
    result.outdatedPackages === undefined &&
    result.searchResults === undefined &&
    result.services === undefined &&
    result.packageDetails.size === 0 &&
    result.completedDetailLoads.length === 0 &&
    result.completions.length === 0 &&
    result.logs.length === 0
  );
}

/**
 * Fold a finished task's fragment into the frame result
 */
export function mergeFragment(result: TaskResult, fragment: TaskFragment): void {
  switch (fragment.type) {
    case "packages":
      result[fragment.field] = fragment.packages;
      break;
    case "services":
      result.services = fragment.services;
      break;
    case "completion":
      result.completions.push(fragment.completion);
      break;
  }
  result.logs.push(...fragment.logs);
}

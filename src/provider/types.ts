/**
 * Package provider contract
 *
 * Everything the task coordinator needs from the package manager. Every call is
 * treated as opaque, long-running and fallible; failures reject with an Error
 * whose message is shown to the user verbatim.
 */

import type { CleanupPreview, Package, PackageType } from "../domain/package.js";
import type { Service } from "../domain/service.js";

export type PackageAction = "install" | "uninstall" | "update" | "pin" | "unpin";

export type MaintenanceOp = "cleanCache" | "cleanupOldVersions";

export type ServiceAction = "start" | "stop" | "restart";

/**
 * Per-call options
 */
export interface ProviderCallOptions {
  /** Aborting kills the underlying command */
  signal?: AbortSignal;
}

export interface PackageProvider {
  getInstalledPackages(packageType: PackageType): Promise<Package[]>;
  getOutdatedPackages(packageType: PackageType): Promise<Package[]>;
  searchPackages(query: string, packageType: PackageType): Promise<Package[]>;
  getPackageInfo(
    name: string,
    packageType: PackageType,
    options?: ProviderCallOptions,
  ): Promise<Package>;

  runPackageAction(action: PackageAction, pkg: Package): Promise<void>;
  updateAll(): Promise<void>;

  runMaintenance(op: MaintenanceOp): Promise<void>;
  getCleanupPreview(op: MaintenanceOp): Promise<CleanupPreview>;

  listServices(): Promise<Service[]>;
  runServiceAction(action: ServiceAction, name: string): Promise<void>;
}

/**
 * Package domain types
 */

/**
 * Homebrew distinguishes command-line formulae from application casks
 */
export type PackageType = "formula" | "cask";

export const PACKAGE_TYPES: readonly PackageType[] = ["formula", "cask"];

export interface Package {
  name: string;
  packageType: PackageType;
  /** Installed version, or the latest known version for packages not installed */
  version?: string;
  /** Newer version available upstream (outdated packages only) */
  availableVersion?: string;
  description?: string;
  installed: boolean;
  outdated: boolean;
  pinned: boolean;
  /** Set when the detail lookup failed or timed out */
  versionLoadFailed: boolean;
}

/**
 * Create a package record with every flag cleared
 */
export function createPackage(
  name: string,
  packageType: PackageType,
  fields: Partial<Omit<Package, "name" | "packageType">> = {},
): Package {
  return {
    name,
    packageType,
    installed: false,
    outdated: false,
    pinned: false,
    versionLoadFailed: false,
    ...fields,
  };
}

/**
 * Whether a detail lookup should still be requested for this package
 */
export function needsDetail(pkg: Package): boolean {
  return pkg.version === undefined && !pkg.versionLoadFailed;
}

export interface CleanupItem {
  path: string;
  /** Size in bytes, 0 when unknown */
  size: number;
}

export interface CleanupPreview {
  items: CleanupItem[];
  totalSize: number;
}

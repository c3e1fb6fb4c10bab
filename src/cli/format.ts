/**
 * Plain-text rendering of packages, services and sizes
 */

import chalk from "chalk";
import type { Package } from "../domain/package.js";
import type { Service, ServiceStatus } from "../domain/service.js";
import type { DetailResult } from "../tasks/result.js";

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Human-readable size, 1024-based
 */
export function formatSize(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  const suffix = SIZE_UNITS[unit] ?? "B";
  return unit === 0 ? `${value} ${suffix}` : `${value.toFixed(1)} ${suffix}`;
}

export function formatPackageLine(pkg: Package): string {
  const version = pkg.version ?? (pkg.versionLoadFailed ? chalk.red("?") : chalk.dim("..."));
  let line = `${chalk.bold(pkg.name)} ${version}`;

  if (pkg.availableVersion) line += ` -> ${chalk.green(pkg.availableVersion)}`;
  if (pkg.packageType === "cask") line += chalk.dim(" (cask)");
  if (pkg.pinned) line += chalk.yellow(" [pinned]");
  if (pkg.description) line += chalk.dim(` - ${pkg.description}`);

  return line;
}

const STATUS_COLORS: Record<ServiceStatus, (text: string) => string> = {
  started: chalk.green,
  stopped: chalk.dim,
  error: chalk.red,
  unknown: chalk.yellow,
};

export function formatServiceLine(service: Service): string {
  const status = STATUS_COLORS[service.status](service.status);
  return service.user
    ? `${chalk.bold(service.name)} ${status} ${chalk.dim(service.user)}`
    : `${chalk.bold(service.name)} ${status}`;
}

export function formatDetailResult(name: string, detail: DetailResult): string {
  switch (detail.status) {
    case "loaded":
      return formatPackageLine(detail.package);
    case "failed":
    case "timedOut":
      return `${chalk.bold(name)} ${chalk.red(detail.message)}`;
  }
}

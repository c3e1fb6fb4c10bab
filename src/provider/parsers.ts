/**
 * Parsers for Homebrew command output
 */

import { z } from "zod";
import { createPackage, type CleanupPreview, type Package, type PackageType } from "../domain/package.js";
import { parseServiceStatus, type Service } from "../domain/service.js";

/**
 * `brew outdated --json=v2`
 */
const OutdatedItemSchema = z.object({
  name: z.string(),
  installed_versions: z.array(z.string()).default([]),
  current_version: z.string().nullish(),
  pinned: z.boolean().optional(),
});

const OutdatedReportSchema = z.object({
  formulae: z.array(OutdatedItemSchema).default([]),
  casks: z.array(OutdatedItemSchema).default([]),
});

/**
 * `brew info --json=v2`; formulae carry `versions.stable`, casks a `version`
 */
const InfoItemSchema = z.object({
  name: z.string().optional(),
  token: z.string().optional(),
  desc: z.string().nullish(),
  version: z.string().nullish(),
  versions: z.object({ stable: z.string().nullish() }).optional(),
});

const InfoReportSchema = z.object({
  formulae: z.array(InfoItemSchema).default([]),
  casks: z.array(InfoItemSchema).default([]),
});

const SIZE_UNITS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4,
};

function nonEmptyLines(output: string): string[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function reportKey(packageType: PackageType): "formulae" | "casks" {
  return packageType === "formula" ? "formulae" : "casks";
}

/**
 * `brew list --versions`: one `name version [version...]` per line
 */
export function parseVersionsList(
  output: string,
  packageType: PackageType,
  pinned: ReadonlySet<string> = new Set(),
): Package[] {
  const packages: Package[] = [];
  for (const line of nonEmptyLines(output)) {
    const [name, version] = line.split(/\s+/);
    if (!name || !version) continue;
    packages.push(
      createPackage(name, packageType, {
        version,
        installed: true,
        pinned: pinned.has(name),
      }),
    );
  }
  return packages;
}

/**
 * `brew list --pinned`: one name per line
 */
export function parseNameList(output: string): string[] {
  return nonEmptyLines(output).filter((line) => !line.startsWith("==>"));
}

/**
 * `brew search`: names only, headings and hints skipped
 */
export function parseSearchOutput(output: string, packageType: PackageType): Package[] {
  return parseNameList(output)
    .filter((line) => !line.includes(" "))
    .map((name) => createPackage(name, packageType));
}

export function parseOutdatedJson(json: string, packageType: PackageType): Package[] {
  const report = OutdatedReportSchema.parse(JSON.parse(json));
  return report[reportKey(packageType)].map((item) =>
    createPackage(item.name, packageType, {
      version: item.installed_versions[0],
      availableVersion: item.current_version ?? undefined,
      installed: true,
      outdated: true,
      pinned: item.pinned ?? false,
    }),
  );
}

/**
 * First entry of a `brew info --json=v2` report, or undefined when brew
 * reported nothing of the requested type
 */
export function parseInfoJson(
  json: string,
  name: string,
  packageType: PackageType,
): Package | undefined {
  const report = InfoReportSchema.parse(JSON.parse(json));
  const item = report[reportKey(packageType)][0];
  if (!item) return undefined;

  const version = item.version ?? item.versions?.stable ?? undefined;
  return createPackage(name, packageType, {
    version,
    description: item.desc ?? undefined,
  });
}

/**
 * Parse `12.3MB` style sizes into bytes
 */
export function parseSize(raw: string): number {
  const [, amount, unitName] = /([\d.]+)\s*([KMGT]?B)/i.exec(raw) ?? [];
  if (!amount || !unitName) return 0;
  const unit = SIZE_UNITS[unitName.toUpperCase()] ?? 1;
  return Math.round(Number.parseFloat(amount) * unit);
}

/**
 * `brew cleanup --dry-run`: `Would remove: <path> (<size>)` lines
 */
export function parseCleanupOutput(output: string): CleanupPreview {
  const items: CleanupPreview["items"] = [];

  for (const line of nonEmptyLines(output)) {
    const [, path, size] = /^Would remove: (.+?)(?: \(([^)]*)\))?$/.exec(line) ?? [];
    if (!path) continue;
    items.push({ path, size: size ? parseSize(size) : 0 });
  }

  return { items, totalSize: items.reduce((sum, item) => sum + item.size, 0) };
}

/**
 * `brew services list`: header line, then `name status [user] [file]`
 */
export function parseServicesList(output: string): Service[] {
  const services: Service[] = [];
  const lines = output.split("\n").slice(1);

  for (const line of lines) {
    const [name, status, user, file] = line.trim().split(/\s+/);
    if (!name || !status) continue;
    services.push({ name, status: parseServiceStatus(status), user, file });
  }

  return services;
}

/**
 * Package commands: list, outdated, search, info
 */

import { Command } from "commander";
import { createPackage, type Package, type PackageType } from "../../domain/package.js";
import type { DetailResult } from "../../tasks/result.js";
import { formatDetailResult, formatPackageLine } from "../format.js";
import { withSession, type Session } from "../session.js";

export type ListKind = "installed" | "outdated";

/**
 * Load the installed or outdated packages and print them
 */
export async function runList(session: Session, which: ListKind): Promise<Package[]> {
  const packages: Package[] = [];

  session.coordinator.submit({ kind: which === "installed" ? "loadInstalled" : "loadOutdated" });
  await session.run(
    which === "installed" ? "Loading installed packages" : "Checking for outdated packages",
    (result) => {
      const loaded = which === "installed" ? result.installedPackages : result.outdatedPackages;
      if (loaded) packages.push(...loaded);
    },
  );

  session.output.print(packages.map(formatPackageLine));
  return packages;
}

/**
 * Search formulae and casks. With `brew.autoLoadDetails` set, versions and
 * descriptions of the hits are loaded in the background before printing.
 */
export async function runSearch(session: Session, query: string): Promise<Package[]> {
  const found = new Map<string, Package>();

  session.coordinator.submit({ kind: "search", query });
  await session.run(`Searching for '${query}'`, (result) => {
    if (result.searchResults) {
      for (const pkg of result.searchResults) found.set(pkg.name, pkg);
      if (session.config.brew.autoLoadDetails) {
        session.coordinator.requestDetailsFor(result.searchResults);
      }
    }

    for (const [name, detail] of result.packageDetails) {
      const current = found.get(name);
      if (!current) continue;
      found.set(
        name,
        detail.status === "loaded"
          ? { ...current, ...detail.package }
          : { ...current, versionLoadFailed: true },
      );
    }
  });

  const packages = Array.from(found.values());
  session.output.print(packages.map(formatPackageLine));
  return packages;
}

/**
 * Load details for the named packages
 */
export async function runInfo(
  session: Session,
  names: string[],
  packageType: PackageType,
): Promise<Map<string, DetailResult>> {
  const details = new Map<string, DetailResult>();

  for (const name of names) {
    session.coordinator.submit({ kind: "loadPackageDetail", name, packageType });
  }
  await session.run(`Loading details for ${names.length} packages`, (result) => {
    for (const [name, detail] of result.packageDetails) details.set(name, detail);
  });

  session.output.print(
    names.map((name) =>
      formatDetailResult(
        name,
        details.get(name) ?? {
          status: "failed",
          package: createPackage(name, packageType, { versionLoadFailed: true }),
          message: "no result",
        },
      ),
    ),
  );
  return details;
}

export function registerPackageCommands(program: Command, open: () => Promise<Session>): void {
  program
    .command("list")
    .description("List installed formulae and casks")
    .action(async () => {
      await withSession(open, (session) => runList(session, "installed"));
    });

  program
    .command("outdated")
    .description("List packages with a newer version available")
    .action(async () => {
      await withSession(open, (session) => runList(session, "outdated"));
    });

  program
    .command("search <query>")
    .description("Search formulae and casks")
    .action(async (query: string) => {
      await withSession(open, (session) => runSearch(session, query));
    });

  program
    .command("info <names...>")
    .description("Show version and description of packages")
    .option("--cask", "Treat the names as casks")
    .action(async (names: string[], options: { cask?: boolean }) => {
      await withSession(open, async (session) => {
        const details = await runInfo(session, names, options.cask ? "cask" : "formula");
        if (Array.from(details.values()).some((detail) => detail.status !== "loaded")) {
          process.exitCode = 1;
        }
      });
    });
}

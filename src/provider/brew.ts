/**
 * Homebrew provider
 * Runs the `brew` executable and parses its output
 */

import { execa } from "execa";
import type { ILogObj, Logger } from "tslog";
import type { CleanupPreview, Package, PackageType } from "../domain/package.js";
import type { Service } from "../domain/service.js";
import { ProviderError } from "../utils/errors.js";
import { createChildLogger, getLogger } from "../utils/logger.js";
import {
  parseCleanupOutput,
  parseInfoJson,
  parseNameList,
  parseOutdatedJson,
  parseSearchOutput,
  parseServicesList,
  parseVersionsList,
} from "./parsers.js";
import type {
  MaintenanceOp,
  PackageAction,
  PackageProvider,
  ProviderCallOptions,
  ServiceAction,
} from "./types.js";

/**
 * Default timeout for a brew command (10 minutes; upgrades can be slow)
 */
const DEFAULT_COMMAND_TIMEOUT_MS = 600_000;

const ACTION_COMMANDS: Record<PackageAction, string> = {
  install: "install",
  uninstall: "uninstall",
  update: "upgrade",
  pin: "pin",
  unpin: "unpin",
};

const MAINTENANCE_ARGS: Record<MaintenanceOp, string[]> = {
  cleanCache: ["cleanup", "-s"],
  cleanupOldVersions: ["cleanup", "--prune=all"],
};

export interface BrewProviderOptions {
  /** Path or name of the brew executable (default: "brew") */
  executable?: string;
  commandTimeoutMs?: number;
  logger?: Logger<ILogObj>;
}

export class BrewProvider implements PackageProvider {
  private readonly executable: string;
  private readonly commandTimeoutMs: number;
  private readonly logger: Logger<ILogObj>;

  constructor(options: BrewProviderOptions = {}) {
    this.executable = options.executable ?? "brew";
    this.commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.logger = options.logger ?? createChildLogger(getLogger(), "brew");
  }

  async getInstalledPackages(packageType: PackageType): Promise<Package[]> {
    const output = await this.run(["list", "--versions", typeFlag(packageType)]);
    const pinned = packageType === "formula" ? await this.getPinnedNames() : new Set<string>();
    const packages = parseVersionsList(output, packageType, pinned);
    this.logger.debug(`Parsed ${packages.length} installed ${packageType} entries`);
    return packages;
  }

  async getOutdatedPackages(packageType: PackageType): Promise<Package[]> {
    const output = await this.run(["outdated", typeFlag(packageType), "--json=v2"]);
    return parseOutdatedJson(output, packageType);
  }

  async searchPackages(query: string, packageType: PackageType): Promise<Package[]> {
    const output = await this.run(["search", typeFlag(packageType), query]);
    return parseSearchOutput(output, packageType);
  }

  async getPackageInfo(
    name: string,
    packageType: PackageType,
    options: ProviderCallOptions = {},
  ): Promise<Package> {
    const args = ["info", "--json=v2", typeFlag(packageType), name];
    const output = await this.run(args, options);
    this.logger.debug(`brew info for ${name} returned ${output.length} bytes`);

    const pkg = parseInfoJson(output, name, packageType);
    if (!pkg) {
      throw new ProviderError(`Package info not found for ${name}`, {
        command: this.describe(args),
      });
    }
    return pkg;
  }

  async runPackageAction(action: PackageAction, pkg: Package): Promise<void> {
    const args =
      action === "pin" || action === "unpin"
        ? [ACTION_COMMANDS[action], pkg.name]
        : [ACTION_COMMANDS[action], typeFlag(pkg.packageType), pkg.name];
    await this.run(args);
  }

  async updateAll(): Promise<void> {
    await this.run(["upgrade"]);
  }

  async runMaintenance(op: MaintenanceOp): Promise<void> {
    await this.run(MAINTENANCE_ARGS[op]);
  }

  async getCleanupPreview(op: MaintenanceOp): Promise<CleanupPreview> {
    const output = await this.run([...MAINTENANCE_ARGS[op], "--dry-run"]);
    return parseCleanupOutput(output);
  }

  async listServices(): Promise<Service[]> {
    const output = await this.run(["services", "list"]);
    return parseServicesList(output);
  }

  async runServiceAction(action: ServiceAction, name: string): Promise<void> {
    await this.run(["services", action, name]);
  }

  private async getPinnedNames(): Promise<Set<string>> {
    try {
      return new Set(parseNameList(await this.run(["list", "--pinned"])));
    } catch (error) {
      this.logger.warn(`Could not list pinned packages: ${String(error)}`);
      return new Set();
    }
  }

  /**
   * Run brew and return stdout; any failure becomes a ProviderError carrying stderr
   */
  private async run(args: string[], options: ProviderCallOptions = {}): Promise<string> {
    const command = this.describe(args);
    this.logger.debug(`Running: ${command}`);

    try {
      const result = await execa(this.executable, args, {
        timeout: this.commandTimeoutMs,
        cancelSignal: options.signal,
      });
      return result.stdout;
    } catch (error) {
      const failure = readCommandFailure(error);
      const reason = failure.isCanceled
        ? "cancelled"
        : failure.stderr || failure.message || "unknown error";
      this.logger.error(`${command} failed: ${reason}`);
      throw new ProviderError(`${command} failed: ${reason}`, {
        command,
        exitCode: failure.exitCode,
        stderr: failure.stderr || undefined,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private describe(args: string[]): string {
    return [this.executable, ...args].join(" ");
  }
}

function typeFlag(packageType: PackageType): string {
  return packageType === "formula" ? "--formula" : "--cask";
}

interface CommandFailure {
  message: string;
  stderr: string;
  exitCode?: number;
  isCanceled: boolean;
}

/**
 * Pull the useful fields out of whatever execa threw
 */
function readCommandFailure(error: unknown): CommandFailure {
  const failure: CommandFailure = {
    message: error instanceof Error ? error.message : String(error),
    stderr: "",
    isCanceled: false,
  };
  if (typeof error !== "object" || error === null) return failure;

  if ("shortMessage" in error && typeof error.shortMessage === "string") {
    failure.message = error.shortMessage;
  }
  if ("stderr" in error && typeof error.stderr === "string") {
    failure.stderr = error.stderr.trim();
  }
  if ("exitCode" in error && typeof error.exitCode === "number") {
    failure.exitCode = error.exitCode;
  }
  if ("isCanceled" in error && error.isCanceled === true) {
    failure.isCanceled = true;
  }
  return failure;
}

/**
 * Cleanup command - clear the download cache or remove old versions
 */

import { Command } from "commander";
import chalk from "chalk";
import type { CleanupPreview } from "../../domain/package.js";
import type { MaintenanceOp } from "../../provider/types.js";
import type { OperationCompletion } from "../../tasks/result.js";
import { formatSize } from "../format.js";
import { withSession, type Session } from "../session.js";

export interface CleanupOptions {
  oldVersions?: boolean;
  dryRun?: boolean;
}

export function cleanupOp(options: CleanupOptions): MaintenanceOp {
  return options.oldVersions ? "cleanupOldVersions" : "cleanCache";
}

/**
 * Show what a cleanup would remove without removing anything
 */
export async function runCleanupPreview(session: Session, op: MaintenanceOp): Promise<CleanupPreview> {
  const preview = await session.coordinator.previewCleanup(op);

  if (preview.items.length === 0) {
    session.output.print(["Nothing to clean up"]);
    return preview;
  }

  session.output.print([
    ...preview.items.map((item) => `${item.path} ${chalk.dim(`(${formatSize(item.size)})`)}`),
    `Would free ${formatSize(preview.totalSize)}`,
  ]);
  return preview;
}

/**
 * Run a cleanup in the background and report its completion
 */
export async function runCleanup(
  session: Session,
  op: MaintenanceOp,
): Promise<OperationCompletion | undefined> {
  const completions: OperationCompletion[] = [];

  session.coordinator.submit({ kind: "maintenance", op });
  await session.run(op === "cleanCache" ? "Cleaning cache" : "Cleaning up old versions", (result) => {
    completions.push(...result.completions);
  });

  const completion = completions.find((c) => c.kind === "maintenance");

  if (completion) {
    session.output.print([
      completion.success
        ? `${chalk.green("✔")} ${completion.message}`
        : `${chalk.red("✖")} ${completion.message}`,
    ]);
  }
  return completion;
}

export function registerCleanupCommand(program: Command, open: () => Promise<Session>): void {
  program
    .command("cleanup")
    .description("Clear the download cache")
    .option("--old-versions", "Remove old versions of installed packages instead")
    .option("--dry-run", "Show what would be removed")
    .action(async (options: CleanupOptions) => {
      await withSession(open, async (session) => {
        const op = cleanupOp(options);
        if (options.dryRun) {
          await runCleanupPreview(session, op);
          return;
        }
        const completion = await runCleanup(session, op);
        if (!completion?.success) {
          process.exitCode = 1;
        }
      });
    });
}

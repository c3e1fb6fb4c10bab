#!/usr/bin/env node

/**
 * tapdeck CLI Entry Point
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { registerPackageCommands } from "./commands/packages.js";
import { registerCleanupCommand } from "./commands/cleanup.js";
import { registerServicesCommand } from "./commands/services.js";
import { openSession } from "./session.js";
import { formatError } from "../utils/errors.js";

const program = new Command();

program
  .name("tapdeck")
  .description("Homebrew front end that keeps the screen responsive while brew works")
  .version(VERSION, "-v, --version", "Output the current version")
  .option("-c, --config <path>", "Project config file (default: ./.tapdeck/config.json)");

const open = () => openSession(program.opts<{ config?: string }>().config);

registerPackageCommands(program, open);
registerCleanupCommand(program, open);
registerServicesCommand(program, open);

async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});

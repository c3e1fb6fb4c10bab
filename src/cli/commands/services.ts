/**
 * Services command - list background services or start/stop/restart one
 */

import { Command } from "commander";
import chalk from "chalk";
import type { Service } from "../../domain/service.js";
import type { ServiceAction } from "../../provider/types.js";
import type { OperationCompletion } from "../../tasks/result.js";
import { formatServiceLine } from "../format.js";
import { withSession, type Session } from "../session.js";

const SERVICE_ACTIONS: readonly ServiceAction[] = ["start", "stop", "restart"];

export function isServiceAction(value: string): value is ServiceAction {
  return SERVICE_ACTIONS.some((action) => action === value);
}

export async function runServices(session: Session): Promise<Service[]> {
  let services: Service[] = [];

  session.coordinator.submit({ kind: "loadServices" });
  await session.run("Loading services", (result) => {
    if (result.services) services = result.services;
  });

  session.output.print(
    services.length > 0 ? services.map(formatServiceLine) : ["No services found"],
  );
  return services;
}

export async function runServiceAction(
  session: Session,
  action: ServiceAction,
  name: string,
): Promise<OperationCompletion | undefined> {
  const completions: OperationCompletion[] = [];

  session.coordinator.submit({ kind: "serviceAction", action, name });
  await session.run(`${action} ${name}`, (result) => {
    completions.push(...result.completions);
  });

  const completion = completions.find((c) => c.kind === "serviceAction");

  if (completion) {
    session.output.print([
      completion.success
        ? `${chalk.green("✔")} ${completion.message}`
        : `${chalk.red("✖")} ${completion.message}`,
    ]);
  }
  return completion;
}

export function registerServicesCommand(program: Command, open: () => Promise<Session>): void {
  program
    .command("services [action] [name]")
    .description("List services, or start, stop or restart one")
    .action(async (action: string | undefined, name: string | undefined) => {
      if (action === undefined) {
        await withSession(open, runServices);
        return;
      }
      if (!isServiceAction(action) || !name) {
        console.error(chalk.red(`Usage: tapdeck services <${SERVICE_ACTIONS.join("|")}> <name>`));
        process.exitCode = 1;
        return;
      }
      await withSession(open, async (session) => {
        const completion = await runServiceAction(session, action, name);
        if (!completion?.success) {
          process.exitCode = 1;
        }
      });
    });
}

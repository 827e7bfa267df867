/**
 * Status command - Show the active workstream and its progress
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { getProjectContext, type ProjectContext } from "../../config/context.js";
import { formatError } from "../../utils/errors.js";
import { getWorkstreamStatus, type WorkstreamStatus } from "../../workstream/lifecycle.js";

/**
 * Options for status command
 */
export interface StatusOptions {
  json?: boolean;
}

/**
 * Register status command
 */
export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show progress through lifecycle steps")
    .option("--json", "Output as JSON")
    .action(async (options: StatusOptions) => {
      try {
        await runStatus(await getProjectContext(), options);
      } catch (error) {
        p.log.error(formatError(error));
        process.exit(1);
      }
    });
}

/**
 * Run status command programmatically
 */
export async function runStatus(
  ctx: ProjectContext,
  options: StatusOptions = {},
): Promise<WorkstreamStatus> {
  const status = await getWorkstreamStatus(ctx);

  if (options.json) {
    console.log(JSON.stringify(status, null, 2));
    return status;
  }

  switch (status.state) {
    case "none":
      if (status.lockStatus === "corrupted") {
        p.log.warning("Lock file was corrupted and has been ignored.");
      }
      p.log.info(`No active workstream. Create one with ${chalk.cyan("stepflow new <title>")}.`);
      break;

    case "unknown-step":
      p.log.warning(`${chalk.bold(status.slug)} @ ${status.current} (step not in config)`);
      break;

    case "in-progress":
    case "complete":
      p.log.info(`${chalk.bold(status.slug)} @ ${status.current}`);
      p.log.info(status.bar);
      if (status.state === "complete") {
        p.log.success(`All steps complete. Run ${chalk.cyan("stepflow done")} to archive.`);
      }
      break;
  }

  return status;
}

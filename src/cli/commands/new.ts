/**
 * New command - Start a workstream from an idea title
 */

import path from "node:path";
import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { getProjectContext, type ProjectContext } from "../../config/context.js";
import { formatError } from "../../utils/errors.js";
import { createWorkstream, type CreateResult } from "../../workstream/lifecycle.js";
import { renderCompactStatus } from "../status-bar.js";

/**
 * Register new command
 */
export function registerNewCommand(program: Command): void {
  program
    .command("new")
    .description("Start a new workstream from an idea title")
    .argument("<title...>", "The title of your idea (can be multiple words)")
    .action(async (title: string[]) => {
      try {
        const ctx = await getProjectContext();
        await runNew(ctx, title);
        await renderCompactStatus(ctx);
      } catch (error) {
        p.log.error(formatError(error));
        process.exit(1);
      }
    });
}

/**
 * Run new command programmatically
 */
export async function runNew(ctx: ProjectContext, title: string[]): Promise<CreateResult> {
  const result = await createWorkstream(ctx, title);

  p.log.success(`Created ${chalk.cyan(path.relative(ctx.root, result.firstFile))}`);
  p.log.info(`Fill it out, then run ${chalk.cyan("stepflow next")}.`);

  return result;
}

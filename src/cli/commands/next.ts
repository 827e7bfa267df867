/**
 * Next command - Generate the next step's prompt and advance when its file exists
 */

import path from "node:path";
import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { getProjectContext, type ProjectContext } from "../../config/context.js";
import { formatError } from "../../utils/errors.js";
import { advanceWorkstream, type AdvanceResult } from "../../workstream/lifecycle.js";
import { renderCompactStatus } from "../status-bar.js";

/**
 * Register next command
 */
export function registerNextCommand(program: Command): void {
  program
    .command("next")
    .description("Generate the prompt for the next step, or advance once its file exists")
    .action(async () => {
      try {
        const ctx = await getProjectContext();
        await runNext(ctx);
        await renderCompactStatus(ctx);
      } catch (error) {
        p.log.error(formatError(error));
        process.exit(1);
      }
    });
}

/**
 * Run next command programmatically
 */
export async function runNext(ctx: ProjectContext): Promise<AdvanceResult> {
  const result = await advanceWorkstream(ctx);
  const rel = (file: string): string => path.relative(ctx.root, file);

  switch (result.status) {
    case "complete":
      p.log.success(`All steps complete. Run ${chalk.cyan("stepflow done")} to archive.`);
      break;

    case "waiting":
      p.log.info(`Generated prompt: ${chalk.cyan(rel(result.promptFile))}`);
      p.log.step(
        `Use it with your AI tool of choice, then save the response to: ${chalk.cyan(rel(result.nextFile))}`,
      );
      p.log.info(`Run ${chalk.cyan("stepflow next")} again once the file is saved.`);
      break;

    case "advanced":
      p.log.info(`Found ${chalk.cyan(rel(result.nextFile))}`);
      p.log.success(`Advanced to step: ${result.current}`);
      break;
  }

  return result;
}

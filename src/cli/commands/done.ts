/**
 * Done command - Archive a finished workstream
 */

import path from "node:path";
import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { getProjectContext, type ProjectContext } from "../../config/context.js";
import { formatError } from "../../utils/errors.js";
import { archiveWorkstream, type ArchiveResult } from "../../workstream/lifecycle.js";
import { renderCompactStatus } from "../status-bar.js";

/**
 * Register done command
 */
export function registerDoneCommand(program: Command): void {
  program
    .command("done")
    .description("Validate that all steps are complete and archive the workstream")
    .action(async () => {
      try {
        const ctx = await getProjectContext();
        await runDone(ctx);
        await renderCompactStatus(ctx);
      } catch (error) {
        p.log.error(formatError(error));
        process.exit(1);
      }
    });
}

/**
 * Run done command programmatically
 */
export async function runDone(ctx: ProjectContext): Promise<ArchiveResult> {
  const result = await archiveWorkstream(ctx);

  if (result.leftoverPrompts.length > 0) {
    p.log.warning(`Archived with unused prompt files: ${result.leftoverPrompts.join(", ")}`);
  }
  p.log.success(`Archived to ${chalk.cyan(path.relative(ctx.root, result.to))}`);

  return result;
}

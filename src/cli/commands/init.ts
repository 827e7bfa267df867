/**
 * Init command - Scaffold a stepflow project in the current directory
 */

import { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { resetProjectContext } from "../../config/context.js";
import { formatError } from "../../utils/errors.js";
import { scaffoldProject, type ScaffoldOptions, type ScaffoldReport } from "../../scaffold/scaffold.js";

/**
 * Register init command
 */
export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Scaffold config, prompt templates, work directories and lock file")
    .action(async () => {
      try {
        await runInit(process.cwd());
      } catch (error) {
        p.log.error(formatError(error));
        process.exit(1);
      }
    });
}

/**
 * Run init command programmatically
 */
export async function runInit(
  cwd: string,
  options: ScaffoldOptions = {},
): Promise<ScaffoldReport> {
  p.intro(chalk.cyan("Initializing stepflow project..."));

  const report = await scaffoldProject(cwd, options);
  // The project root may have just come into existence
  resetProjectContext();

  for (const created of report.created) {
    p.log.step(`Created ${created}`);
  }
  for (const skipped of report.skipped) {
    p.log.info(`Kept existing ${skipped}`);
  }

  p.outro(chalk.green("Project initialized successfully!"));

  console.log("\nNext steps:");
  console.log(
    chalk.dim("  1. ") +
      chalk.cyan('stepflow new "Your idea"') +
      chalk.dim(" - Start a workstream and fill in its first file"),
  );
  console.log(
    chalk.dim("  2. ") +
      chalk.cyan("stepflow next") +
      chalk.dim(" - Generate the prompt for the next step, save the answer, run it again"),
  );
  console.log(
    chalk.dim("  3. ") + chalk.cyan("stepflow status") + chalk.dim(" - Check current progress"),
  );
  console.log(
    chalk.dim("  4. ") + chalk.cyan("stepflow done") + chalk.dim(" - Archive the finished workstream"),
  );

  return report;
}

/**
 * CLI program definition
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { initializeLogging } from "../utils/logger.js";
import { registerInitCommand } from "./commands/init.js";
import { registerNewCommand } from "./commands/new.js";
import { registerNextCommand } from "./commands/next.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerDoneCommand } from "./commands/done.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("stepflow")
    .description("Walk an idea through an ordered sequence of lifecycle steps")
    .version(VERSION, "-v, --version", "Output the current version")
    .option("--verbose", "Show debug logging")
    .hook("preAction", (thisCommand) => {
      initializeLogging({ verbose: thisCommand.opts<{ verbose?: boolean }>().verbose });
    });

  registerInitCommand(program);
  registerNewCommand(program);
  registerNextCommand(program);
  registerStatusCommand(program);
  registerDoneCommand(program);

  return program;
}

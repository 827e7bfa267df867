#!/usr/bin/env node

/**
 * stepflow CLI entry point
 */

import { createProgram } from "./program.js";
import { formatError } from "../utils/errors.js";

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});

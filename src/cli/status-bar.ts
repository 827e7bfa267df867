/**
 * Compact status footer printed after state-changing commands
 *
 *   ---
 *   Current: my-idea @ 1.prd
 *      [x]idea > [x]prd > [ ]prd-plus
 *   ---
 */

import type { ProjectContext } from "../config/context.js";
import { ConfigError, formatError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";
import { getWorkstreamStatus, type WorkstreamStatus } from "../workstream/lifecycle.js";

/**
 * Format the footer, or null when there is no active workstream
 */
export function formatCompactStatus(status: WorkstreamStatus): string | null {
  switch (status.state) {
    case "none":
      return null;
    case "unknown-step":
      return `Current: ${status.slug} @ ${status.current} (step not in config)`;
    case "in-progress":
    case "complete":
      return `Current: ${status.slug} @ ${status.current}\n   ${status.bar}`;
  }
}

/**
 * Print the footer. Never fails the command that called it.
 */
export async function renderCompactStatus(ctx: ProjectContext): Promise<void> {
  let status: WorkstreamStatus;
  try {
    status = await getWorkstreamStatus(ctx);
  } catch (error) {
    if (error instanceof ConfigError) {
      getLogger().debug(`Skipping status footer: ${error.message}`);
    } else {
      getLogger().warn(`Unable to display status: ${formatError(error)}`);
    }
    return;
  }

  const line = formatCompactStatus(status);
  if (line) {
    console.log(`\n---\n${line}\n---`);
  }
}

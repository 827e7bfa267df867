/**
 * File naming conventions inside a project
 */

import path from "node:path";
import type { ProjectContext } from "../config/context.js";
import type { StepflowConfig } from "../config/schema.js";
import { PROMPT_OUTPUT_PREFIX, TEMPLATE_SUFFIX } from "../config/paths.js";

/** `<step>-<slug>.md` */
export function stepFileName(step: string, slug: string): string {
  return `${step}-${slug}.md`;
}

/** `_prompt-<step>.md` */
export function promptOutputFileName(step: string): string {
  return `${PROMPT_OUTPUT_PREFIX}${step}.md`;
}

/** `<step>.instructions.md` */
export function templateFileName(step: string): string {
  return `${step}${TEMPLATE_SUFFIX}`;
}

/**
 * Absolute locations for one workstream
 */
export interface WorkstreamPaths {
  dir: string;
  archiveDir: string;
  stepFile(step: string): string;
  promptOutputFile(step: string): string;
  templateFile(step: string): string;
}

export function workstreamPaths(
  ctx: ProjectContext,
  config: StepflowConfig,
  slug: string,
): WorkstreamPaths {
  const dir = path.join(ctx.root, config.active_dir, slug);
  const promptDir = path.join(ctx.root, config.prompt_dir);

  return {
    dir,
    archiveDir: path.join(ctx.root, config.done_dir, slug),
    stepFile: (step) => path.join(dir, stepFileName(step, slug)),
    promptOutputFile: (step) => path.join(dir, promptOutputFileName(step)),
    templateFile: (step) => path.join(promptDir, templateFileName(step)),
  };
}

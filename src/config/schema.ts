/**
 * Configuration schema for stepflow
 */

import { z } from "zod";
import { DEFAULT_DIRS } from "./paths.js";

/**
 * `<ordinal>.<name>`: the name part ends up in file names, so no path separators
 */
const STEP_PATTERN = /^[^./\\\s]+\.[^/\\\s]+$/;

export const StepSchema = z
  .string()
  .regex(STEP_PATTERN, "Step must look like '<ordinal>.<name>', e.g. '0.idea'");

export const StepsSchema = z
  .array(StepSchema)
  .min(1, "At least one step is required")
  .superRefine((steps, ctx) => {
    const seen = new Set<string>();
    steps.forEach((step, index) => {
      if (seen.has(step)) {
        ctx.addIssue({
          code: "custom",
          message: `Duplicate step '${step}'`,
          path: [index],
        });
      }
      seen.add(step);
    });
  });

const DirSchema = z.string().min(1, "Directory name must not be empty");

/**
 * Project config. Unknown keys (e.g. `version`) are kept as-is.
 */
export const StepflowConfigSchema = z.looseObject({
  steps: StepsSchema,
  active_dir: DirSchema,
  done_dir: DirSchema,
  prompt_dir: DirSchema,
});

export type StepflowConfig = z.infer<typeof StepflowConfigSchema>;

/**
 * Built-in lifecycle, written by `init`
 */
export const DEFAULT_STEPS = [
  "0.idea",
  "1.prd",
  "2.prd-plus",
  "3.architecture",
  "4.system-patterns",
  "5.tasks",
  "6.tasks-plus",
  "7.tests",
] as const;

export function createDefaultConfig(version: string = "0.1.0"): StepflowConfig {
  return {
    version,
    steps: [...DEFAULT_STEPS],
    active_dir: DEFAULT_DIRS.active,
    done_dir: DEFAULT_DIRS.done,
    prompt_dir: DEFAULT_DIRS.prompts,
  };
}

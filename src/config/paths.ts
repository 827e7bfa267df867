/**
 * Centralized file names and defaults
 *
 * All stepflow state lives at the project root:
 * the config file, the lock file, and the three work directories.
 */

/** Config file at the project root (JSON5) */
export const CONFIG_FILE = ".stepflow";

/** Lock file at the project root (JSON) */
export const LOCK_FILE = ".stepflow.lock";

/**
 * Default directory names, written by `init`
 */
export const DEFAULT_DIRS = {
  /** Workstreams in progress */
  active: "doing",

  /** Archived workstreams */
  done: "done",

  /** Prompt templates, one per step after the first */
  prompts: "prompts",
} as const;

/** Token in a prompt template replaced by the previous step's content */
export const PREV_STEP_PLACEHOLDER = "<prev_step></prev_step>";

/** Suffix of prompt template files */
export const TEMPLATE_SUFFIX = ".instructions.md";

/** Prefix of the transient merged-prompt file inside a workstream */
export const PROMPT_OUTPUT_PREFIX = "_prompt-";

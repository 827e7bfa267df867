/**
 * stepflow: walk a unit of work through an ordered sequence of lifecycle
 * steps, one markdown file per step.
 *
 * @packageDocumentation
 */

export { VERSION } from "./version.js";

// Configuration
export {
  createProjectContext,
  findProjectRoot,
  getProjectContext,
  resetProjectContext,
  type ProjectContext,
} from "./config/context.js";
export { loadConfig, saveConfig, configExists } from "./config/loader.js";
export { createDefaultConfig, DEFAULT_STEPS, type StepflowConfig } from "./config/schema.js";

// Lock
export { readLock, readLockState, writeLock } from "./state/lock-store.js";
export {
  isActiveLock,
  type ActiveLock,
  type LockRecord,
  type LockReadResult,
} from "./state/types.js";

// Workstreams
export {
  createWorkstream,
  advanceWorkstream,
  archiveWorkstream,
  getWorkstreamStatus,
  mergePrompt,
  resolveState,
  type AdvanceResult,
  type ArchiveResult,
  type CreateResult,
  type WorkstreamState,
  type WorkstreamStatus,
} from "./workstream/lifecycle.js";
export { renderStepBar, stepDisplayName } from "./workstream/progress.js";
export { scaffoldProject, type ScaffoldReport } from "./scaffold/scaffold.js";

// Utilities
export { slugify } from "./utils/strings.js";
export * from "./utils/errors.js";

/**
 * Workstream lifecycle
 *
 * A workstream moves through the configured steps one at a time:
 *
 *   none --create--> in-progress(0) --advance--> ... --advance--> complete --archive--> none
 *
 * The lock records the step completed through. `advance` only moves the lock
 * once the next step's file exists and has content, so it can be called any
 * number of times while waiting for that file.
 */

import type { ProjectContext } from "../config/context.js";
import { loadConfig } from "../config/loader.js";
import { PREV_STEP_PLACEHOLDER, PROMPT_OUTPUT_PREFIX } from "../config/paths.js";
import type { StepflowConfig } from "../config/schema.js";
import { readLock, readLockState, unwrapLockState, writeLock } from "../state/lock-store.js";
import { isActiveLock, type ActiveLock, type LockReadResult } from "../state/types.js";
import {
  ConfigInvalidError,
  EmptyStepFileError,
  FileWriteError,
  MissingFileError,
  MissingStepFilesError,
  NoActiveWorkstreamError,
  UnknownStepError,
  WorkstreamExistsError,
  WorkstreamNotFinishedError,
} from "../utils/errors.js";
import {
  ensureDir,
  fileExists,
  listFiles,
  moveDirectory,
  readTextFile,
  removeFile,
  writeTextFile,
} from "../utils/files.js";
import { getLogger } from "../utils/logger.js";
import { slugify } from "../utils/strings.js";
import { workstreamPaths } from "./paths.js";
import { renderStepBar } from "./progress.js";

const PROMPT_FILE_PATTERN = new RegExp(`^${PROMPT_OUTPUT_PREFIX}.*\\.md$`);

export type WorkstreamState =
  | { kind: "none" }
  | { kind: "in-progress"; stepIndex: number }
  | { kind: "complete"; stepIndex: number }
  | { kind: "unknown-step" };

export interface CreateResult {
  slug: string;
  title: string;
  dir: string;
  firstFile: string;
  lock: ActiveLock;
}

export type AdvanceResult =
  | { status: "complete"; slug: string; current: string }
  | {
      status: "waiting";
      slug: string;
      current: string;
      nextStep: string;
      promptFile: string;
      nextFile: string;
    }
  | {
      status: "advanced";
      slug: string;
      previousStep: string;
      current: string;
      nextFile: string;
    };

export interface ArchiveResult {
  slug: string;
  from: string;
  to: string;
  /** Merged prompt files that were still in the workstream when it was archived */
  leftoverPrompts: string[];
}

export type WorkstreamStatus =
  | { state: "none"; steps: string[]; lockStatus: LockReadResult["status"] }
  | {
      state: "in-progress" | "complete";
      steps: string[];
      lockStatus: "ok";
      slug: string;
      current: string;
      stepIndex: number;
      bar: string;
    }
  | { state: "unknown-step"; steps: string[]; lockStatus: "ok"; slug: string; current: string };

/**
 * Heading and empty sections of the first step's file
 */
export function ideaSkeleton(title: string): string {
  return `# ${title}\n\n## Problem\n\n## Solution\n\n## Rabbit Holes\n`;
}

/**
 * Replace every placeholder in a template with the previous step, verbatim
 */
export function mergePrompt(template: string, previous: string): string {
  return template.replaceAll(PREV_STEP_PLACEHOLDER, () => previous);
}

/**
 * Derive the state from a step list and the step completed through
 */
export function resolveState(steps: readonly string[], current: string | undefined): WorkstreamState {
  if (current === undefined) return { kind: "none" };
  const stepIndex = steps.indexOf(current);
  if (stepIndex === -1) return { kind: "unknown-step" };
  return stepIndex === steps.length - 1
    ? { kind: "complete", stepIndex }
    : { kind: "in-progress", stepIndex };
}

function stepBounds(ctx: ProjectContext, config: StepflowConfig): { first: string; last: string } {
  const first = config.steps[0];
  const last = config.steps[config.steps.length - 1];
  if (first === undefined || last === undefined) {
    throw new ConfigInvalidError(ctx.configPath, [
      { path: "steps", message: "At least one step is required" },
    ]);
  }
  return { first, last };
}

async function requireActiveLock(ctx: ProjectContext): Promise<ActiveLock> {
  const lock = await readLock(ctx);
  if (!isActiveLock(lock)) {
    throw new NoActiveWorkstreamError();
  }
  return lock;
}

/**
 * Start a workstream from an idea title
 */
export async function createWorkstream(
  ctx: ProjectContext,
  title: string | readonly string[],
  options: { now?: () => Date } = {},
): Promise<CreateResult> {
  const config = await loadConfig(ctx);
  const { first } = stepBounds(ctx, config);

  const text = (typeof title === "string" ? title : title.join(" ")).trim();
  const slug = slugify(text);
  const paths = workstreamPaths(ctx, config, slug);

  if (await fileExists(paths.dir)) {
    throw new WorkstreamExistsError(slug, paths.dir);
  }

  await ensureDir(paths.dir);
  const firstFile = paths.stepFile(first);
  await writeTextFile(firstFile, ideaSkeleton(text), { ensureDir: false });

  const lock: ActiveLock = {
    slug,
    current: first,
    created: (options.now?.() ?? new Date()).toISOString(),
  };
  await writeLock(ctx, lock);

  getLogger().debug(`Created workstream ${slug} at ${paths.dir}`);
  return { slug, title: text, dir: paths.dir, firstFile, lock };
}

/**
 * Generate the prompt for the next step, and advance when its file exists
 */
export async function advanceWorkstream(ctx: ProjectContext): Promise<AdvanceResult> {
  const config = await loadConfig(ctx);
  const lock = await requireActiveLock(ctx);
  const { slug, current } = lock;

  const index = config.steps.indexOf(current);
  if (index === -1) {
    throw new UnknownStepError(slug, current);
  }

  const nextStep = config.steps[index + 1];
  if (nextStep === undefined) {
    return { status: "complete", slug, current };
  }

  const paths = workstreamPaths(ctx, config, slug);
  const prevFile = paths.stepFile(current);
  const templateFile = paths.templateFile(nextStep);
  const promptFile = paths.promptOutputFile(nextStep);
  const nextFile = paths.stepFile(nextStep);

  if (!(await fileExists(prevFile))) {
    throw new MissingFileError(
      prevFile,
      `This file is required to generate the '${nextStep}' step. ` +
        "Restore it from version control or recreate the previous step.",
    );
  }
  if (!(await fileExists(templateFile))) {
    throw new MissingFileError(
      templateFile,
      `This prompt template is required for the '${nextStep}' step. ` +
        `Add it to '${config.prompt_dir}/' or run 'stepflow init'.`,
    );
  }

  const previous = await readTextFile(prevFile);
  const template = await readTextFile(templateFile);
  await writeTextFile(promptFile, mergePrompt(template, previous), { ensureDir: false });
  getLogger().debug(`Wrote merged prompt ${promptFile}`);

  if (!(await fileExists(nextFile))) {
    return { status: "waiting", slug, current, nextStep, promptFile, nextFile };
  }

  const content = await readTextFile(nextFile);
  if (content.trim().length === 0) {
    throw new EmptyStepFileError(nextFile);
  }

  await writeLock(ctx, { ...lock, current: nextStep });
  await removeFile(promptFile);
  getLogger().debug(`Advanced ${slug} from ${current} to ${nextStep}`);

  return { status: "advanced", slug, previousStep: current, current: nextStep, nextFile };
}

/**
 * Move a finished workstream to the archive and clear the lock
 */
export async function archiveWorkstream(ctx: ProjectContext): Promise<ArchiveResult> {
  const config = await loadConfig(ctx);
  const lock = await requireActiveLock(ctx);
  const { last } = stepBounds(ctx, config);

  if (!config.steps.includes(lock.current)) {
    throw new UnknownStepError(lock.slug, lock.current);
  }
  if (lock.current !== last) {
    throw new WorkstreamNotFinishedError(lock.slug, lock.current, last);
  }

  const paths = workstreamPaths(ctx, config, lock.slug);
  const missing: string[] = [];
  for (const step of config.steps) {
    if (!(await fileExists(paths.stepFile(step)))) {
      missing.push(step);
    }
  }
  if (missing.length > 0) {
    throw new MissingStepFilesError(paths.dir, missing);
  }

  const leftoverPrompts = await listFiles(paths.dir, PROMPT_FILE_PATTERN);
  if (leftoverPrompts.length > 0) {
    getLogger().warn(`Archiving ${lock.slug} with unused prompt files: ${leftoverPrompts.join(", ")}`);
  }

  await moveDirectory(paths.dir, paths.archiveDir);
  try {
    await writeLock(ctx, {});
  } catch (error) {
    // The lock still names the workstream, so put its directory back
    getLogger().debug(`Lock update failed, restoring ${paths.dir}`);
    try {
      await moveDirectory(paths.archiveDir, paths.dir);
    } catch (restoreError) {
      throw new FileWriteError(
        ctx.lockPath,
        `archived ${lock.slug} to ${paths.archiveDir} but could not clear the lock or restore ${paths.dir}`,
        {
          cause: restoreError instanceof Error ? restoreError : undefined,
          suggestion: `Move ${paths.archiveDir} back to ${paths.dir}, or write {} to the lock file.`,
        },
      );
    }
    throw error;
  }

  getLogger().debug(`Archived ${lock.slug} to ${paths.archiveDir}`);
  return { slug: lock.slug, from: paths.dir, to: paths.archiveDir, leftoverPrompts };
}

/**
 * Current workstream and progress. Lock corruption reads as no workstream.
 */
export async function getWorkstreamStatus(ctx: ProjectContext): Promise<WorkstreamStatus> {
  const config = await loadConfig(ctx);
  const lockState = await readLockState(ctx);
  const lock = unwrapLockState(ctx, lockState);
  const steps = [...config.steps];

  if (!isActiveLock(lock)) {
    return { state: "none", steps, lockStatus: lockState.status };
  }

  const state = resolveState(steps, lock.current);
  if (state.kind === "in-progress" || state.kind === "complete") {
    return {
      state: state.kind,
      steps,
      lockStatus: "ok",
      slug: lock.slug,
      current: lock.current,
      stepIndex: state.stepIndex,
      bar: renderStepBar(steps, state.stepIndex),
    };
  }

  return { state: "unknown-step", steps, lockStatus: "ok", slug: lock.slug, current: lock.current };
}

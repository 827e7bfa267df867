/**
 * Project context
 *
 * Resolves where the config and lock files live. Every core operation takes
 * the context explicitly; the CLI obtains it once per process through
 * getProjectContext().
 */

import path from "node:path";
import { CONFIG_FILE, LOCK_FILE } from "./paths.js";
import { fileExists } from "../utils/files.js";

export interface ProjectContext {
  /** Directory holding the config file */
  readonly root: string;
  readonly configPath: string;
  readonly lockPath: string;
}

export function createProjectContext(root: string): ProjectContext {
  const resolved = path.resolve(root);
  return {
    root: resolved,
    configPath: path.join(resolved, CONFIG_FILE),
    lockPath: path.join(resolved, LOCK_FILE),
  };
}

/**
 * Walk upward from `cwd` to the first directory containing the config file.
 * Falls back to `cwd` itself when none is found.
 */
export async function findProjectRoot(cwd: string): Promise<string> {
  const start = path.resolve(cwd);
  let dir = start;

  for (;;) {
    if (await fileExists(path.join(dir, CONFIG_FILE))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return start;
    }
    dir = parent;
  }
}

let cachedContext: ProjectContext | null = null;

/**
 * Resolve the project context once per process
 */
export async function getProjectContext(cwd: string = process.cwd()): Promise<ProjectContext> {
  if (!cachedContext) {
    cachedContext = createProjectContext(await findProjectRoot(cwd));
  }
  return cachedContext;
}

/**
 * Clear the cached context, or pin it to a given one. Test setup only.
 */
export function resetProjectContext(context: ProjectContext | null = null): void {
  cachedContext = context;
}

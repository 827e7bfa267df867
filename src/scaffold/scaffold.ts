/**
 * Project scaffolding for `stepflow init`
 *
 * Writes the default config, the bundled prompt templates, the work
 * directories and an empty lock. Existing config and templates are kept.
 */

import path from "node:path";
import { createProjectContext } from "../config/context.js";
import { configExists, saveConfig } from "../config/loader.js";
import { DEFAULT_DIRS, TEMPLATE_SUFFIX } from "../config/paths.js";
import { createDefaultConfig } from "../config/schema.js";
import { writeLock } from "../state/lock-store.js";
import { ScaffoldError } from "../utils/errors.js";
import { ensureDir, fileExists, listFiles, readTextFile, writeTextFile } from "../utils/files.js";
import { getLogger } from "../utils/logger.js";
import { PACKAGE_ROOT, VERSION } from "../version.js";

export interface ScaffoldOptions {
  /** Directory holding `*.instructions.md` templates; defaults to the bundled ones */
  templatesDir?: string;
}

export interface ScaffoldReport {
  root: string;
  /** Paths created, relative to the root */
  created: string[];
  /** Paths left untouched because they already existed */
  skipped: string[];
}

export function bundledTemplatesDir(): string {
  if (!PACKAGE_ROOT) {
    throw new ScaffoldError("could not locate the stepflow package directory");
  }
  return path.join(PACKAGE_ROOT, "templates", "prompts");
}

async function discoverTemplates(dir: string): Promise<string[]> {
  try {
    return await listFiles(dir, new RegExp(`${TEMPLATE_SUFFIX.replace(/\./g, "\\.")}$`));
  } catch (error) {
    throw new ScaffoldError(`cannot read ${dir}`, error instanceof Error ? error : undefined);
  }
}

/**
 * Scaffold a project in `rootDir`
 */
export async function scaffoldProject(
  rootDir: string,
  options: ScaffoldOptions = {},
): Promise<ScaffoldReport> {
  const ctx = createProjectContext(rootDir);
  const templatesDir = options.templatesDir ?? bundledTemplatesDir();
  const templates = await discoverTemplates(templatesDir);
  if (templates.length === 0) {
    getLogger().warn(`No prompt templates found in ${templatesDir}`);
  }

  const report: ScaffoldReport = { root: ctx.root, created: [], skipped: [] };
  const record = (target: string, created: boolean): void => {
    (created ? report.created : report.skipped).push(path.relative(ctx.root, target));
  };

  for (const dir of [DEFAULT_DIRS.prompts, DEFAULT_DIRS.active, DEFAULT_DIRS.done]) {
    const target = path.join(ctx.root, dir);
    const existed = await fileExists(target);
    await ensureDir(target);
    record(target, !existed);
  }

  if (await configExists(ctx)) {
    record(ctx.configPath, false);
  } else {
    await saveConfig(ctx, createDefaultConfig(VERSION));
    record(ctx.configPath, true);
  }

  for (const name of templates) {
    const target = path.join(ctx.root, DEFAULT_DIRS.prompts, name);
    if (await fileExists(target)) {
      record(target, false);
      continue;
    }
    await writeTextFile(target, await readTextFile(path.join(templatesDir, name)));
    record(target, true);
  }

  // An existing lock may point at an active workstream
  if (await fileExists(ctx.lockPath)) {
    record(ctx.lockPath, false);
  } else {
    await writeLock(ctx, {});
    record(ctx.lockPath, true);
  }

  return report;
}

/**
 * Temporary stepflow projects for tests
 */

import { mkdtemp, mkdir, readFile, rm, writeFile, access } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { createProjectContext, type ProjectContext } from "../../src/config/context.js";

export const TEST_STEPS = ["0.idea", "1.prd", "2.prd-plus"];

export const TEST_CONFIG = {
  version: "0.1.0",
  steps: TEST_STEPS,
  active_dir: "doing",
  done_dir: "done",
  prompt_dir: "prompts",
};

export interface TestProject {
  root: string;
  ctx: ProjectContext;
  /** Write a file relative to the root, creating parent directories */
  write(relPath: string, content: string): Promise<void>;
  read(relPath: string): Promise<string>;
  exists(relPath: string): Promise<boolean>;
  /** Parsed content of the lock file */
  readLockFile(): Promise<unknown>;
  cleanup(): Promise<void>;
}

export interface TestProjectOptions {
  /** Config object or raw text; null writes no config */
  config?: Record<string, unknown> | string | null;
  /** Prompt templates for every step after the first */
  templates?: boolean;
}

export function templateFor(step: string): string {
  return `Prompt for ${step}\n\n<prev_step></prev_step>\n`;
}

export async function createTestProject(options: TestProjectOptions = {}): Promise<TestProject> {
  const root = await mkdtemp(join(tmpdir(), "stepflow-test-"));
  const ctx = createProjectContext(root);

  const write = async (relPath: string, content: string): Promise<void> => {
    const target = join(root, relPath);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, "utf-8");
  };

  const config = options.config === undefined ? TEST_CONFIG : options.config;
  if (config !== null) {
    await write(".stepflow", typeof config === "string" ? config : JSON.stringify(config, null, 2));
  }

  if (options.templates ?? true) {
    for (const step of TEST_STEPS.slice(1)) {
      await write(`prompts/${step}.instructions.md`, templateFor(step));
    }
  }

  return {
    root,
    ctx,
    write,
    read: (relPath) => readFile(join(root, relPath), "utf-8"),
    exists: async (relPath) => {
      try {
        await access(join(root, relPath));
        return true;
      } catch {
        return false;
      }
    },
    readLockFile: async () => JSON.parse(await readFile(join(root, ".stepflow.lock"), "utf-8")),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

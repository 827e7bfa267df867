/**
 * Configuration loader for stepflow
 *
 * The config is read fresh on every command from `<root>/.stepflow`.
 * The file is JSON5, so plain JSON works too.
 */

import fs from "node:fs/promises";
import JSON5 from "json5";
import type { ZodError } from "zod";
import { StepflowConfigSchema, type StepflowConfig } from "./schema.js";
import type { ProjectContext } from "./context.js";
import {
  ConfigCorruptedError,
  ConfigInvalidError,
  ConfigNotFoundError,
  FileSystemError,
  errnoCode,
  type ConfigIssue,
} from "../utils/errors.js";
import { writeTextFile } from "../utils/files.js";

function toIssues(error: ZodError): ConfigIssue[] {
  return error.issues.map((i) => ({
    path: i.path.length > 0 ? i.path.map(String).join(".") : "(root)",
    message: i.message,
  }));
}

/**
 * Load and validate the project config
 */
export async function loadConfig(ctx: ProjectContext): Promise<StepflowConfig> {
  const { configPath } = ctx;

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      throw new ConfigNotFoundError(configPath);
    }
    throw new FileSystemError(`Failed to read config file: ${configPath}`, {
      path: configPath,
      operation: "read",
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new ConfigCorruptedError(configPath, details, error instanceof Error ? error : undefined);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigInvalidError(configPath, [
      { path: "(root)", message: "Expected an object with steps, active_dir, done_dir, prompt_dir" },
    ]);
  }

  const result = StepflowConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigInvalidError(configPath, toIssues(result.error));
  }

  return result.data;
}

/**
 * Validate and write a config file
 */
export async function saveConfig(ctx: ProjectContext, config: StepflowConfig): Promise<void> {
  const result = StepflowConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigInvalidError(ctx.configPath, toIssues(result.error));
  }

  await writeTextFile(ctx.configPath, JSON.stringify(result.data, null, 2) + "\n");
}

/**
 * Check whether the project has a config file
 */
export async function configExists(ctx: ProjectContext): Promise<boolean> {
  try {
    await fs.access(ctx.configPath);
    return true;
  } catch {
    return false;
  }
}

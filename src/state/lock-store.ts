/**
 * Lock store
 *
 * Persists the single mutable record of the project: which workstream is
 * active and which step it has completed through. A missing or unreadable
 * lock file means "no active workstream" and is never fatal.
 */

import fs from "node:fs/promises";
import { ActiveLockSchema, type LockReadResult, type LockRecord } from "./types.js";
import type { ProjectContext } from "../config/context.js";
import { errnoCode, FileSystemError } from "../utils/errors.js";
import { atomicWriteFile } from "../utils/files.js";
import { getLogger } from "../utils/logger.js";

/**
 * Read the lock file into an explicit result
 */
export async function readLockState(ctx: ProjectContext): Promise<LockReadResult> {
  let content: string;
  try {
    content = await fs.readFile(ctx.lockPath, "utf-8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return { status: "missing", record: {} };
    }
    throw new FileSystemError(`Failed to read lock file: ${ctx.lockPath}`, {
      path: ctx.lockPath,
      operation: "read",
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { status: "corrupted", record: {}, reason: `not valid JSON (${reason})` };
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return { status: "corrupted", record: {}, reason: "expected a JSON object" };
  }

  if (Object.keys(parsed).length === 0) {
    return { status: "ok", record: {} };
  }

  const result = ActiveLockSchema.safeParse(parsed);
  if (!result.success) {
    const fields = result.error.issues.map((i) => i.path.map(String).join(".")).join(", ");
    return { status: "corrupted", record: {}, reason: `unexpected shape (${fields})` };
  }

  return { status: "ok", record: result.data };
}

/**
 * Read the lock record. Corruption is logged and read as an empty record.
 */
export async function readLock(ctx: ProjectContext): Promise<LockRecord> {
  return unwrapLockState(ctx, await readLockState(ctx));
}

/**
 * Record of a read result, warning when it was corrupted
 */
export function unwrapLockState(ctx: ProjectContext, state: LockReadResult): LockRecord {
  if (state.status === "corrupted") {
    getLogger().warn(`Lock file ${ctx.lockPath} is corrupted: ${state.reason}. Treating as empty.`);
  }
  return state.record;
}

/**
 * Replace the lock record
 */
export async function writeLock(ctx: ProjectContext, record: LockRecord): Promise<void> {
  getLogger().debug(`Writing lock ${ctx.lockPath}`, record);
  await atomicWriteFile(ctx.lockPath, JSON.stringify(record, null, 2) + "\n");
}

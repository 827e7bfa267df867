/**
 * File utilities for stepflow
 */

import fs from "node:fs/promises";
import path from "node:path";
import { FileSystemError, FileWriteError, errnoCode } from "./errors.js";

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    throw new FileWriteError(dirPath, `failed to create directory (${describe(error)})`, {
      cause: asError(error),
    });
  }
}

/**
 * Check if a file or directory exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a file as text, with optional fallback when it does not exist
 */
export async function readTextFile(filePath: string, fallback?: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (fallback !== undefined && errnoCode(error) === "ENOENT") {
      return fallback;
    }
    throw new FileSystemError(`Failed to read file: ${filePath}`, {
      path: filePath,
      operation: "read",
      cause: asError(error),
    });
  }
}

/**
 * Write text to a file, replacing any previous content
 */
export async function writeTextFile(
  filePath: string,
  content: string,
  options: { ensureDir?: boolean } = {},
): Promise<void> {
  const { ensureDir: shouldEnsureDir = true } = options;

  if (shouldEnsureDir) {
    await ensureDir(path.dirname(filePath));
  }

  try {
    await fs.writeFile(filePath, content, "utf-8");
  } catch (error) {
    throw new FileWriteError(filePath, describe(error), { cause: asError(error) });
  }
}

/**
 * Atomic write (write to temp then rename)
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await fs.writeFile(tempPath, content, "utf-8");
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new FileWriteError(filePath, describe(error), { cause: asError(error) });
  }
}

/**
 * Remove a file or directory. Missing paths are ignored.
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.rm(filePath, { recursive: true });
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return;
    }
    throw new FileSystemError(`Failed to remove: ${filePath}`, {
      path: filePath,
      operation: "delete",
      cause: asError(error),
    });
  }
}

/**
 * List files (not directories) in a directory, optionally filtered by name
 */
export async function listFiles(dirPath: string, pattern?: RegExp): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && (!pattern || pattern.test(entry.name)))
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    throw new FileSystemError(`Failed to list files in: ${dirPath}`, {
      path: dirPath,
      operation: "read",
      cause: asError(error),
    });
  }
}

/**
 * Move a directory to a destination that must not exist yet.
 *
 * Uses rename; across devices (EXDEV) falls back to a recursive copy followed
 * by removal of the source. If the copy fails the partial destination is
 * removed and the source is left in place.
 */
export async function moveDirectory(source: string, destination: string): Promise<void> {
  if (await fileExists(destination)) {
    throw new FileWriteError(destination, "destination already exists", {
      suggestion: "Remove or rename the existing directory first.",
    });
  }

  await ensureDir(path.dirname(destination));

  try {
    await fs.rename(source, destination);
    return;
  } catch (error) {
    if (errnoCode(error) !== "EXDEV") {
      throw new FileWriteError(destination, describe(error), { cause: asError(error) });
    }
  }

  try {
    await fs.cp(source, destination, { recursive: true, errorOnExist: true, force: false });
  } catch (error) {
    await fs.rm(destination, { recursive: true, force: true });
    throw new FileWriteError(destination, describe(error), { cause: asError(error) });
  }
  await removeFile(source);
}

/**
 * Lock record types
 */

import { z } from "zod";

/**
 * Lock of an active workstream. `current` is the step completed through.
 * `created` is optional on read so that hand-written locks still load.
 */
export const ActiveLockSchema = z.object({
  // Same alphabet slugify produces; the slug becomes a directory name
  slug: z.string().regex(/^[a-z0-9-]+$/),
  current: z.string().min(1),
  created: z.string().optional(),
});

export type ActiveLock = z.infer<typeof ActiveLockSchema>;

export type EmptyLock = Record<string, never>;

export type LockRecord = ActiveLock | EmptyLock;

/**
 * Outcome of reading the lock file
 *
 * - `missing`: no lock file; record is empty
 * - `ok`: parsed and well-formed
 * - `corrupted`: unreadable JSON or unexpected shape; record is empty
 */
export type LockReadResult =
  | { status: "missing"; record: EmptyLock }
  | { status: "ok"; record: LockRecord }
  | { status: "corrupted"; record: EmptyLock; reason: string };

export function isActiveLock(record: LockRecord): record is ActiveLock {
  return "slug" in record && typeof record.slug === "string";
}

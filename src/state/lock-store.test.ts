/**
 * Lock store tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { readdir } from "node:fs/promises";
import { readLock, readLockState, writeLock } from "./lock-store.js";
import { isActiveLock, type LockRecord } from "./types.js";
import { createLogger, setLogger } from "../utils/logger.js";
import { createTestProject, type TestProject } from "../../test/helpers/project.js";

describe("lock store", () => {
  let project: TestProject;

  beforeEach(async () => {
    project = await createTestProject();
  });

  afterEach(async () => {
    setLogger(createLogger());
    await project.cleanup();
  });

  describe("readLockState", () => {
    it("should report a missing lock file", async () => {
      expect(await readLockState(project.ctx)).toEqual({ status: "missing", record: {} });
    });

    it("should read an empty record", async () => {
      await project.write(".stepflow.lock", "{}");

      expect(await readLockState(project.ctx)).toEqual({ status: "ok", record: {} });
    });

    it("should read an active record", async () => {
      await project.write(
        ".stepflow.lock",
        JSON.stringify({ slug: "my-idea", current: "1.prd", created: "2026-01-02T03:04:05.000Z" }),
      );

      expect(await readLockState(project.ctx)).toEqual({
        status: "ok",
        record: { slug: "my-idea", current: "1.prd", created: "2026-01-02T03:04:05.000Z" },
      });
    });

    it("should accept a record without created", async () => {
      await project.write(".stepflow.lock", JSON.stringify({ slug: "my-idea", current: "1.prd" }));

      const state = await readLockState(project.ctx);

      expect(state).toEqual({ status: "ok", record: { slug: "my-idea", current: "1.prd" } });
    });

    it("should flag non-JSON content as corrupted", async () => {
      await project.write(".stepflow.lock", "not json {");

      const state = await readLockState(project.ctx);

      expect(state.status).toBe("corrupted");
      expect(state.record).toEqual({});
    });

    it("should flag unexpected shapes as corrupted", async () => {
      for (const content of ["[]", "null", '"text"', '{"slug": 3}', '{"current": "1.prd"}']) {
        await project.write(".stepflow.lock", content);

        const state = await readLockState(project.ctx);

        expect(state).toMatchObject({ status: "corrupted", record: {} });
      }
    });

    it("should flag slugs that are not directory-safe as corrupted", async () => {
      for (const slug of ["../x", "a/b", "My Idea", ""]) {
        await project.write(".stepflow.lock", JSON.stringify({ slug, current: "1.prd" }));

        expect(await readLockState(project.ctx)).toEqual({
          status: "corrupted",
          record: {},
          reason: "unexpected shape (slug)",
        });
      }
    });
  });

  describe("readLock", () => {
    it("should return an empty record and warn on corruption", async () => {
      const logger = createLogger();
      const warn = vi.spyOn(logger, "warn").mockReturnValue(undefined);
      setLogger(logger);
      await project.write(".stepflow.lock", "not json {");

      expect(await readLock(project.ctx)).toEqual({});
      expect(warn).toHaveBeenCalledTimes(1);
      expect(String(warn.mock.calls[0]?.[0])).toContain("is corrupted");
    });

    it("should not warn for a missing file", async () => {
      const logger = createLogger();
      const warn = vi.spyOn(logger, "warn").mockReturnValue(undefined);
      setLogger(logger);

      expect(await readLock(project.ctx)).toEqual({});
      expect(warn).not.toHaveBeenCalled();
    });
  });

  describe("writeLock", () => {
    it("should round-trip well-formed records", async () => {
      const records: LockRecord[] = [
        {},
        { slug: "my-idea", current: "0.idea", created: "2026-03-04T05:06:07.000Z" },
        { slug: "other", current: "2.prd-plus" },
      ];

      for (const record of records) {
        await writeLock(project.ctx, record);
        expect(await readLock(project.ctx)).toEqual(record);
      }
    });

    it("should replace rather than merge", async () => {
      await writeLock(project.ctx, { slug: "my-idea", current: "1.prd", created: "x" });
      await writeLock(project.ctx, {});

      expect(await project.readLockFile()).toEqual({});
      expect(await project.read(".stepflow.lock")).toBe("{}\n");
    });

    it("should leave no temporary files behind", async () => {
      await writeLock(project.ctx, { slug: "my-idea", current: "1.prd" });

      const names = await readdir(project.root);
      expect(names.filter((n) => n.endsWith(".tmp"))).toEqual([]);
    });
  });

  describe("isActiveLock", () => {
    it("should distinguish active and empty records", () => {
      expect(isActiveLock({ slug: "a", current: "0.idea" })).toBe(true);
      expect(isActiveLock({})).toBe(false);
    });
  });
});

/**
 * Tests for the compact status footer
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { formatCompactStatus, renderCompactStatus } from "./status-bar.js";
import { createLogger, setLogger } from "../utils/logger.js";
import { createTestProject, type TestProject } from "../../test/helpers/project.js";

describe("formatCompactStatus", () => {
  const steps = ["0.idea", "1.prd"];

  it("should return null without a workstream", () => {
    expect(formatCompactStatus({ state: "none", steps, lockStatus: "missing" })).toBeNull();
  });

  it("should show the slug, step and bar", () => {
    expect(
      formatCompactStatus({
        state: "in-progress",
        steps,
        lockStatus: "ok",
        slug: "my-idea",
        current: "0.idea",
        stepIndex: 0,
        bar: "[x]idea > [ ]prd",
      }),
    ).toBe("Current: my-idea @ 0.idea\n   [x]idea > [ ]prd");
  });

  it("should mark a step that is not configured", () => {
    expect(
      formatCompactStatus({
        state: "unknown-step",
        steps,
        lockStatus: "ok",
        slug: "my-idea",
        current: "5.x",
      }),
    ).toBe("Current: my-idea @ 5.x (step not in config)");
  });
});

describe("renderCompactStatus", () => {
  let project: TestProject;
  let log: MockInstance<typeof console.log>;

  beforeEach(async () => {
    setLogger(createLogger({ level: "fatal" }));
    log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    project = await createTestProject();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    setLogger(createLogger());
    await project.cleanup();
  });

  it("should print the footer between rules", async () => {
    await project.write(".stepflow.lock", JSON.stringify({ slug: "my-idea", current: "1.prd" }));

    await renderCompactStatus(project.ctx);

    expect(log).toHaveBeenCalledWith(
      "\n---\nCurrent: my-idea @ 1.prd\n   [x]idea > [x]prd > [ ]prd-plus\n---",
    );
  });

  it("should print nothing without a workstream", async () => {
    await renderCompactStatus(project.ctx);

    expect(log).not.toHaveBeenCalled();
  });

  it("should swallow a broken config", async () => {
    await project.write(".stepflow", "{ steps: [");

    await expect(renderCompactStatus(project.ctx)).resolves.toBeUndefined();
    expect(log).not.toHaveBeenCalled();
  });
});

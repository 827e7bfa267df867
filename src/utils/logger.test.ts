/**
 * Tests for logger utilities
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  createLogger,
  getLogger,
  initializeLogging,
  isLogLevel,
  levelFromEnv,
  setLogger,
} from "./logger.js";

describe("createLogger", () => {
  it("should default to warn level", () => {
    const logger = createLogger();

    expect(logger.settings.name).toBe("stepflow");
    expect(logger.settings.minLevel).toBe(4);
  });

  it("should map custom levels", () => {
    const logger = createLogger({ name: "custom", level: "debug", prettyPrint: false });

    expect(logger.settings.name).toBe("custom");
    expect(logger.settings.minLevel).toBe(2);
    expect(logger.settings.type).toBe("json");
  });
});

describe("log output", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write log lines to stderr and leave stdout alone", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const stdout = vi.spyOn(console, "log").mockImplementation(() => undefined);

    createLogger({ prettyPrint: false }).warn("json warning");
    createLogger({ prettyPrint: true }).warn("pretty warning");

    const lines = stderr.mock.calls.map((call) => String(call[0]));
    expect(stdout).not.toHaveBeenCalled();
    expect(lines.filter((line) => line.includes("json warning"))).toHaveLength(1);
    expect(lines.filter((line) => line.includes("pretty warning"))).toHaveLength(1);
  });

  it("should write JSON lines in json mode", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    createLogger({ name: "json-test", prettyPrint: false }).error("broken");

    const line = stderr.mock.calls.map((call) => String(call[0])).find((l) => l.includes("broken"));
    expect(line?.endsWith("\n")).toBe(true);
    expect(JSON.parse(line ?? "")).toMatchObject({ "0": "broken" });
  });
});

describe("levelFromEnv", () => {
  it("should read STEPFLOW_LOG_LEVEL case-insensitively", () => {
    expect(levelFromEnv({ STEPFLOW_LOG_LEVEL: "DEBUG" })).toBe("debug");
    expect(levelFromEnv({ STEPFLOW_LOG_LEVEL: " info " })).toBe("info");
  });

  it("should ignore unknown or missing values", () => {
    expect(levelFromEnv({ STEPFLOW_LOG_LEVEL: "loud" })).toBeUndefined();
    expect(levelFromEnv({})).toBeUndefined();
  });

  it("should recognize log levels", () => {
    expect(isLogLevel("fatal")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});

describe("global logger", () => {
  const originalLevel = process.env["STEPFLOW_LOG_LEVEL"];

  beforeEach(() => {
    delete process.env["STEPFLOW_LOG_LEVEL"];
  });

  afterEach(() => {
    if (originalLevel === undefined) {
      delete process.env["STEPFLOW_LOG_LEVEL"];
    } else {
      process.env["STEPFLOW_LOG_LEVEL"] = originalLevel;
    }
    setLogger(createLogger());
  });

  it("should keep the instance passed to setLogger", () => {
    const custom = createLogger({ name: "custom" });
    setLogger(custom);

    expect(getLogger()).toBe(custom);
    expect(getLogger()).toBe(getLogger());
  });

  it("should use debug level when verbose", () => {
    const logger = initializeLogging({ verbose: true });

    expect(getLogger()).toBe(logger);
    expect(logger.settings.minLevel).toBe(2);
  });

  it("should use the environment level otherwise", () => {
    process.env["STEPFLOW_LOG_LEVEL"] = "error";

    const logger = initializeLogging();

    expect(logger.settings.minLevel).toBe(5);
  });
});

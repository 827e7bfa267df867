/**
 * Error handling for stepflow
 * Custom error types with context and recovery information
 */

/**
 * Base error class for stepflow
 */
export class StepflowError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;
  readonly recoverable: boolean;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: {
      code: string;
      context?: Record<string, unknown>;
      recoverable?: boolean;
      suggestion?: string;
      cause?: Error;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "StepflowError";
    this.code = options.code;
    this.context = options.context ?? {};
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;

    Error.captureStackTrace(this, StepflowError);
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Configuration error
 */
export class ConfigError extends StepflowError {
  readonly issues: ConfigIssue[];

  constructor(
    message: string,
    options: {
      code?: string;
      issues?: ConfigIssue[];
      configPath?: string;
      suggestion?: string;
      cause?: Error;
    } = {},
  ) {
    super(message, {
      code: options.code ?? "CONFIG_ERROR",
      context: { configPath: options.configPath, issues: options.issues },
      recoverable: false,
      suggestion: options.suggestion ?? "Check your .stepflow config file for errors",
      cause: options.cause,
    });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }

  /**
   * Format issues as a readable string
   */
  formatIssues(): string {
    if (this.issues.length === 0) return "";
    return this.issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(configPath: string) {
    super(`Config file not found: ${configPath}`, {
      code: "CONFIG_NOT_FOUND",
      configPath,
      suggestion: "Ensure you are in a stepflow project directory, or run 'stepflow init'.",
    });
    this.name = "ConfigNotFoundError";
  }
}

export class ConfigCorruptedError extends ConfigError {
  constructor(configPath: string, details: string, cause?: Error) {
    super(`Config file is corrupted: ${details}`, {
      code: "CONFIG_CORRUPTED",
      configPath,
      suggestion: "Fix the syntax of the config file, or run 'stepflow init' in a new directory.",
      cause,
    });
    this.name = "ConfigCorruptedError";
  }
}

export class ConfigInvalidError extends ConfigError {
  constructor(configPath: string, issues: ConfigIssue[]) {
    super(`Invalid configuration (${issues.length} issue${issues.length === 1 ? "" : "s"})`, {
      code: "CONFIG_INVALID",
      configPath,
      issues,
      suggestion: "Fix the listed keys in the config file.",
    });
    this.name = "ConfigInvalidError";
  }
}

// ---------------------------------------------------------------------------
// Workstream lifecycle
// ---------------------------------------------------------------------------

/**
 * Lifecycle precondition violation
 */
export class WorkstreamError extends StepflowError {
  constructor(
    message: string,
    options: {
      code: string;
      slug?: string;
      suggestion?: string;
      context?: Record<string, unknown>;
    },
  ) {
    super(message, {
      code: options.code,
      context: { slug: options.slug, ...options.context },
      recoverable: false,
      suggestion: options.suggestion,
    });
    this.name = "WorkstreamError";
  }
}

export class NoActiveWorkstreamError extends WorkstreamError {
  constructor() {
    super("No active workstream.", {
      code: "NO_ACTIVE_WORKSTREAM",
      suggestion: "Run 'stepflow new <title>' first.",
    });
    this.name = "NoActiveWorkstreamError";
  }
}

export class WorkstreamExistsError extends WorkstreamError {
  readonly slug: string;

  constructor(slug: string, dir: string) {
    super(`Workstream '${slug}' already exists.`, {
      code: "WORKSTREAM_EXISTS",
      slug,
      context: { dir },
      suggestion: `Pick a different title, or remove ${dir}.`,
    });
    this.name = "WorkstreamExistsError";
    this.slug = slug;
  }
}

export class WorkstreamNotFinishedError extends WorkstreamError {
  constructor(slug: string, current: string, lastStep: string) {
    super(`Workstream '${slug}' is at '${current}', not '${lastStep}'.`, {
      code: "WORKSTREAM_NOT_FINISHED",
      slug,
      context: { current, lastStep },
      suggestion: "Complete all steps with 'stepflow next' before archiving.",
    });
    this.name = "WorkstreamNotFinishedError";
  }
}

export class UnknownStepError extends WorkstreamError {
  readonly step: string;

  constructor(slug: string, step: string) {
    super(`Step '${step}' recorded for '${slug}' is not in the configured steps.`, {
      code: "UNKNOWN_STEP",
      slug,
      context: { step },
      suggestion: "Restore the step in the config file, or fix 'current' in the lock file.",
    });
    this.name = "UnknownStepError";
    this.step = step;
  }
}

// ---------------------------------------------------------------------------
// File system
// ---------------------------------------------------------------------------

/**
 * File system error
 */
export class FileSystemError extends StepflowError {
  readonly path: string;

  constructor(
    message: string,
    options: {
      path: string;
      operation: "read" | "write" | "delete" | "exists";
      code?: string;
      suggestion?: string;
      context?: Record<string, unknown>;
      cause?: Error;
    },
  ) {
    super(message, {
      code: options.code ?? "FILESYSTEM_ERROR",
      context: { path: options.path, operation: options.operation, ...options.context },
      recoverable: false,
      suggestion:
        options.suggestion ??
        `Check that the path exists and you have permissions: ${options.path}`,
      cause: options.cause,
    });
    this.name = "FileSystemError";
    this.path = options.path;
  }
}

export class FileWriteError extends FileSystemError {
  constructor(path: string, details: string, options: { cause?: Error; suggestion?: string } = {}) {
    super(`Cannot write '${path}': ${details}`, {
      path,
      operation: "write",
      code: "FILE_WRITE_ERROR",
      suggestion: options.suggestion,
      cause: options.cause,
    });
    this.name = "FileWriteError";
  }
}

export class MissingFileError extends FileSystemError {
  constructor(path: string, hint?: string) {
    super(`Required file is missing: ${path}`, {
      path,
      operation: "exists",
      code: "MISSING_FILE",
      suggestion: hint,
    });
    this.name = "MissingFileError";
  }
}

export class MissingStepFilesError extends FileSystemError {
  readonly missing: string[];

  constructor(dir: string, missing: string[]) {
    super(`Missing step files: ${missing.join(", ")}`, {
      path: dir,
      operation: "exists",
      code: "MISSING_STEP_FILES",
      context: { missing },
      suggestion: "Create the listed step files, or run 'stepflow next' until they exist.",
    });
    this.name = "MissingStepFilesError";
    this.missing = missing;
  }
}

export class EmptyStepFileError extends FileSystemError {
  constructor(path: string) {
    super(`Step file is empty: ${path}`, {
      path,
      operation: "read",
      code: "EMPTY_STEP_FILE",
      suggestion: "Save the generated content into the file, then run 'stepflow next' again.",
    });
    this.name = "EmptyStepFileError";
  }
}

// ---------------------------------------------------------------------------
// Scaffolding
// ---------------------------------------------------------------------------

export class ScaffoldError extends StepflowError {
  constructor(details: string, cause?: Error) {
    super(`Failed to load scaffold templates: ${details}`, {
      code: "SCAFFOLD_ERROR",
      recoverable: false,
      suggestion: "The installation may be broken. Try reinstalling stepflow.",
      cause,
    });
    this.name = "ScaffoldError";
  }
}

/**
 * Check if error is a stepflow error
 */
export function isStepflowError(error: unknown): error is StepflowError {
  return error instanceof StepflowError;
}

/**
 * Default suggestions for error codes without a specific one
 */
export const ERROR_SUGGESTIONS: Record<string, string> = {
  CONFIG_ERROR: "Check your .stepflow file or run 'stepflow init'.",
  FILESYSTEM_ERROR: "Check that the path exists and you have read/write permissions.",
  UNEXPECTED_ERROR: "An unexpected error occurred. Re-run with --verbose for details.",
};

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (isStepflowError(error)) {
    let message = `[${error.code}] ${error.message}`;
    if (error instanceof ConfigError && error.issues.length > 0) {
      message += `\n${error.formatIssues()}`;
    }
    const suggestion = error.suggestion ?? ERROR_SUGGESTIONS[error.code];
    if (suggestion) {
      message += `\n  Suggestion: ${suggestion}`;
    }
    return message;
  }

  if (error instanceof Error) {
    return `${error.message}\n  Suggestion: ${ERROR_SUGGESTIONS["UNEXPECTED_ERROR"]}`;
  }

  return String(error);
}

/**
 * Node errno code of an error, if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

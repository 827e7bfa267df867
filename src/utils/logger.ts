/**
 * Logging system for stepflow
 * Based on tslog with structured output
 */

import { formatWithOptions } from "node:util";
import { Logger, type ILogObj } from "tslog";

/**
 * Log levels
 */
export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/**
 * Logger configuration
 */
export interface LoggerConfig {
  name: string;
  level: LogLevel;
  prettyPrint: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  name: "stepflow",
  level: "warn",
  prettyPrint: true,
};

const LEVELS: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Create a logger instance
 */
export function createLogger(config: Partial<LoggerConfig> = {}): Logger<ILogObj> {
  const finalConfig = { ...DEFAULT_CONFIG, ...config };

  return new Logger<ILogObj>({
    name: finalConfig.name,
    minLevel: LEVELS[finalConfig.level],
    type: finalConfig.prettyPrint ? "pretty" : "json",
    prettyLogTemplate: "{{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
    prettyLogTimeZone: "local",
    stylePrettyLogs: finalConfig.prettyPrint,
    // Command output and `--json` own stdout
    overwrite: {
      transportFormatted: (logMetaMarkup: string, logArgs: unknown[], logErrors: string[]) => {
        const errors = (logErrors.length > 0 && logArgs.length > 0 ? "\n" : "") + logErrors.join("\n");
        const body = formatWithOptions({ colors: finalConfig.prettyPrint }, ...logArgs);
        process.stderr.write(`${logMetaMarkup}${body}${errors}\n`);
      },
      transportJSON: (json: unknown) => {
        process.stderr.write(`${JSON.stringify(json)}\n`);
      },
    },
  });
}

let globalLogger: Logger<ILogObj> | null = null;

/**
 * Get the global logger instance
 */
export function getLogger(): Logger<ILogObj> {
  if (!globalLogger) {
    globalLogger = createLogger({ level: levelFromEnv() ?? DEFAULT_CONFIG.level });
  }
  return globalLogger;
}

/**
 * Set the global logger instance
 */
export function setLogger(logger: Logger<ILogObj>): void {
  globalLogger = logger;
}

/**
 * Read STEPFLOW_LOG_LEVEL, ignoring unknown values
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const raw = env["STEPFLOW_LOG_LEVEL"]?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : undefined;
}

/**
 * Initialize logging for a CLI run
 */
export function initializeLogging(options: { verbose?: boolean } = {}): Logger<ILogObj> {
  const level: LogLevel = options.verbose ? "debug" : (levelFromEnv() ?? DEFAULT_CONFIG.level);

  const logger = createLogger({
    level,
    prettyPrint: process.stderr.isTTY ?? false,
  });

  setLogger(logger);
  return logger;
}

/**
 * Logging system for keel
 * Based on tslog with structured output
 */

import { Logger, type ILogObj } from "tslog";
import fs from "node:fs";
import path from "node:path";
import { getProjectDir } from "../config/paths.js";

/**
 * Log levels
 */
export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  name: string;
  level: LogLevel;
  prettyPrint: boolean;
  logToFile: boolean;
  logDir?: string;
}

const DEFAULT_CONFIG: LoggerConfig = {
  name: "keel",
  level: "warn",
  prettyPrint: true,
  logToFile: false,
};

/**
 * Map log level string to tslog minLevel number
 */
function levelToNumber(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * Create a logger instance
 */
export function createLogger(config: Partial<LoggerConfig> = {}): Logger<ILogObj> {
  const finalConfig = { ...DEFAULT_CONFIG, ...config };

  const logger = new Logger<ILogObj>({
    name: finalConfig.name,
    minLevel: levelToNumber(finalConfig.level),
    prettyLogTemplate: finalConfig.prettyPrint
      ? "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] "
      : undefined,
    prettyLogTimeZone: "local",
    stylePrettyLogs: finalConfig.prettyPrint,
  });

  if (finalConfig.logToFile && finalConfig.logDir) {
    setupFileLogging(logger, finalConfig.logDir, finalConfig.name);
  }

  return logger;
}

/**
 * Mirror every log object to <logDir>/<name>.log as JSON lines
 */
function setupFileLogging(logger: Logger<ILogObj>, logDir: string, name: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const logFile = path.join(logDir, `${name}.log`);

  logger.attachTransport((logObj) => {
    const line = JSON.stringify(logObj) + "\n";
    fs.appendFileSync(logFile, line);
  });
}

/**
 * Create a child logger with a specific name
 */
export function createChildLogger(parent: Logger<ILogObj>, name: string): Logger<ILogObj> {
  return parent.getSubLogger({ name });
}

let globalLogger: Logger<ILogObj> | null = null;

/**
 * Get the global logger instance
 */
export function getLogger(): Logger<ILogObj> {
  if (!globalLogger) {
    globalLogger = createLogger();
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
 * Initialize logging for a project run
 */
export function initializeLogging(
  projectPath: string,
  options: { level?: LogLevel; logToFile?: boolean } = {},
): Logger<ILogObj> {
  const logDir = path.join(getProjectDir(projectPath), "logs");

  const logger = createLogger({
    name: "keel",
    level: options.level ?? "warn",
    prettyPrint: process.stdout.isTTY ?? false,
    logToFile: options.logToFile ?? false,
    logDir,
  });

  setLogger(logger);
  return logger;
}

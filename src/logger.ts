// CHANGE: Structured logger with INFO/DEBUG/ERROR levels.
// WHY: Summaries go to INFO, per-file decisions to DEBUG, unreadable files to ERROR.

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  error: 2
};

/**
 * Resolve a log level name, falling back to `info` for missing or unknown values.
 */
export function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === "debug" || raw === "info" || raw === "error") {
    return raw;
  }
  return "info";
}

let activeLevel: LogLevel = parseLogLevel(process.env.CRLF_LOG_LEVEL);

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[activeLevel];
}

/**
 * Set log level for runtime diagnostics.
 *
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: LogLevel): void {
  if (levelWeight[level] === undefined) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = level;
}

/**
 * Emit information-level log entry.
 *
 * Info entries go to stderr so stdout carries only report lines.
 */
export function info(message: string): void {
  if (shouldLog("info")) {
    console.error(formatters.info(message));
  }
}

export function debug(message: string): void {
  if (shouldLog("debug")) {
    console.error(formatters.debug(message));
  }
}

export function error(message: string): void {
  if (shouldLog("error")) {
    console.error(formatters.error(message));
  }
}

// CHANGE: Level-filtered console logger for audit progress and failures.
// WHY: Summaries go to stdout at INFO, HTTP paging details at DEBUG, failures to stderr.

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  error: 2
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelWeight, value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.AUDIT_LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : "info";
}

let activeLevel: LogLevel = initialLevel();

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

function emit(level: LogLevel, message: string): void {
  if (levelWeight[level] < levelWeight[activeLevel]) {
    return;
  }
  const line = formatters[level](message);
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Switch the threshold used by every later call, e.g. from `--log-level`.
 *
 * @throws Error for names other than debug, info and error.
 */
export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

/**
 * Progress and summary lines: fetched counts, coverage, report paths.
 */
export function info(message: string): void {
  emit("info", message);
}

// Per-page and per-request detail.
export function debug(message: string): void {
  emit("debug", message);
}

/**
 * Fatal audit failures and skipped reports, written to stderr.
 */
export function error(message: string): void {
  emit("error", message);
}

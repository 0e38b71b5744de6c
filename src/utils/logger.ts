/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: Logging utilities with color-coded output for pagepulse.
 */
import { type DebugCategoryName, initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";
import { format } from "node:util";
import { writeLogEntry } from "./fileLogger.js";

/* Terminal color codes for log output formatting. Warnings appear in yellow, errors in red, and debug output in cyan.
 */

const ANSI_COLORS = {

  cyan: "\x1b[36m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
  yellow: "\x1b[33m"
};

/* The logger operates in one of two modes: console mode (stdout/stderr with colors, timestamps added by console-stamp) or file mode (the log file in the data
 * directory). File mode is the default because pagepulse normally runs unattended from a scheduler. Console mode is enabled with the --console CLI flag.
 */

// Flag indicating whether to use console logging instead of file logging.
let useConsoleLogging = false;

/**
 * Sets the logging mode. When true, logs go to console with colors. When false, logs go to the file logger.
 * @param enabled - True to enable console logging, false for file logging.
 */
export function setConsoleLogging(enabled: boolean): void {

  useConsoleLogging = enabled;
}

/**
 * Returns whether console logging is currently enabled.
 * @returns True if using console logging, false if using file logging.
 */
export function isConsoleLogging(): boolean {

  return useConsoleLogging;
}

/**
 * Enables or disables debug logging. When called with true, initializes the debug filter with wildcard (*) to enable all categories.
 * @param enabled - True to enable all debug logging, false to disable.
 */
export function setDebugLogging(enabled: boolean): void {

  initDebugFilter(enabled ? "*" : "");
}

type LogLevel = "debug" | "error" | "info" | "warn";

/**
 * Core logging implementation shared by all log levels.
 * @param level - The log level.
 * @param color - ANSI color code for output (empty string for no color).
 * @param message - The format string.
 * @param args - Format arguments.
 * @param categoryTag - Debug category, for debug messages only.
 */
function logWithLevel(level: LogLevel, color: string, message: string, args: unknown[], categoryTag?: string): void {

  const formatted = args.length > 0 ? format(message, ...args) : message;

  if(!useConsoleLogging) {

    writeLogEntry(level, formatted, color || undefined, categoryTag);

    return;
  }

  /* eslint-disable no-console */
  const consoleMethod = (level === "error") ? console.error : ((level === "warn") ? console.warn : console.log);
  /* eslint-enable no-console */

  if(color) {

    consoleMethod("%s%s%s", color, formatted, ANSI_COLORS.reset);
  } else {

    consoleMethod(formatted);
  }
}

/* The LOG object provides a centralized logging interface with printf-style format strings. All methods accept a format string followed by optional arguments,
 * using Node's util.format() for interpolation (%s, %d, %j, %o).
 */
export const LOG = {

  /**
   * Logs a debug message in cyan, filtered by category. Debug messages are only output when the category is enabled via the PAGEPULSE_DEBUG environment variable
   * or the --debug CLI flag.
   * @param category - The debug category (e.g., "browser", "notify").
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  debug: function(category: DebugCategoryName, message: string, ...args: unknown[]): void {

    if(!isAnyDebugEnabled() || !isCategoryEnabled(category)) {

      return;
    }

    logWithLevel("debug", ANSI_COLORS.cyan, message, args, category);
  },

  /**
   * Logs an error message in red. Use this for failures the operator must act on: an exhausted run, a failed alert, an unusable configuration.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  error: function(message: string, ...args: unknown[]): void {

    logWithLevel("error", ANSI_COLORS.red, message, args);
  },

  /**
   * Logs an informational message in the default terminal color.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  info: function(message: string, ...args: unknown[]): void {

    logWithLevel("info", "", message, args);
  },

  /**
   * Logs a warning message in yellow. Use this for failed attempts that will be retried and for recoverable oddities.
   * @param message - The format string.
   * @param args - Values to interpolate into the format string.
   */
  warn: function(message: string, ...args: unknown[]): void {

    logWithLevel("warn", ANSI_COLORS.yellow, message, args);
  }
};

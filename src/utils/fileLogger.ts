/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: File-based logging with size-based trimming for pagepulse.
 */
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/* Every run appends to the same log file, so a scheduler invoking pagepulse every few minutes builds up a long history. The size limit is enforced when the
 * logger starts, before the run writes anything, and again every SIZE_CHECK_FREQUENCY entries within a run. An oversized file is cut down to the most recent
 * half, at a line boundary, through a temp file and rename. Entries are buffered and appended on a timer, and a one-shot run ends with shutdownFileLogger(),
 * which flushes synchronously.
 */

interface FileLoggerState {

  buffer: string[];
  flushTimer: Nullable<ReturnType<typeof setInterval>>;
  logFilePath: string;
  maxSize: number;
  writesSinceCheck: number;
}

// Null until initializeFileLogger() succeeds. writeLogEntry() is a no-op while null, which keeps tests and console mode quiet.
let state: Nullable<FileLoggerState> = null;

// Interval in milliseconds between buffer flushes.
const FLUSH_INTERVAL_MS = 1000;

// Number of writes between file size checks.
const SIZE_CHECK_FREQUENCY = 100;

const ANSI_RESET = "\x1b[0m";

/**
 * Initializes the file logger, creating the log file and its parent directory if needed. Failure is reported on the console and leaves file logging disabled.
 * @param logPath - Absolute path to the log file, resolved by the caller via getLogFilePath().
 * @param maxSize - Maximum log file size in bytes from CONFIG.logging.maxSize.
 */
export async function initializeFileLogger(logPath: string, maxSize: number): Promise<void> {

  try {

    await fsPromises.mkdir(path.dirname(logPath), { recursive: true });

    // Append mode creates the file when missing and leaves existing content alone.
    await fsPromises.appendFile(logPath, "", "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to initialize file logger: %s. File logging disabled.", (error instanceof Error) ? error.message : String(error));

    return;
  }

  // Earlier runs may have left the file over the limit. A single run rarely writes enough entries to reach the in-run check.
  await trimLogFile(logPath, maxSize);

  const flushTimer = setInterval((): void => {

    void flushLogBuffer();
  }, FLUSH_INTERVAL_MS);

  // The flush timer alone must never keep a finished run alive.
  flushTimer.unref();

  state = { buffer: [], flushTimer, logFilePath: logPath, maxSize, writesSinceCheck: 0 };
}

/**
 * Returns whether the file logger is accepting entries.
 * @returns True once initializeFileLogger() has succeeded and until shutdownFileLogger() runs.
 */
export function isFileLoggerActive(): boolean {

  return state !== null;
}

/**
 * Formats a log line the way it appears in the file: "[yyyy/mm/dd HH:MM:ss.l] [LEVEL] message". Info lines omit the level tag.
 * @param level - Log level ("info", "warn", "error", "debug").
 * @param message - The formatted log message.
 * @param date - The entry timestamp.
 * @param color - Optional ANSI color code wrapping the level tag and message.
 * @param categoryTag - Optional debug category, rendered as [DEBUG:category].
 * @returns The complete line including the trailing newline.
 */
export function formatLogLine(level: string, message: string, date: Date, color?: string, categoryTag?: string): string {

  const levelTag = categoryTag ? [ level.toUpperCase(), ":", categoryTag ].join("") : level.toUpperCase();
  const levelPrefix = (level === "info") ? "" : [ "[", levelTag, "] " ].join("");

  return [ "[", df(date, "yyyy/mm/dd HH:MM:ss.l"), "] ", color ?? "", levelPrefix, message, color ? ANSI_RESET : "", "\n" ].join("");
}

/**
 * Queues a log entry for the next flush.
 * @param level - Log level ("info", "warn", "error", "debug").
 * @param message - The formatted log message.
 * @param color - Optional ANSI color code to apply to the level prefix and message.
 * @param categoryTag - Optional debug category tag.
 */
export function writeLogEntry(level: string, message: string, color?: string, categoryTag?: string): void {

  if(!state) {

    return;
  }

  state.buffer.push(formatLogLine(level, message, new Date(), color, categoryTag));

  if(++state.writesSinceCheck >= SIZE_CHECK_FREQUENCY) {

    state.writesSinceCheck = 0;

    void trimLogFile(state.logFilePath, state.maxSize);
  }
}

/**
 * Appends the buffered entries to the log file. Called by the flush timer.
 */
export async function flushLogBuffer(): Promise<void> {

  if(!state || (state.buffer.length === 0)) {

    return;
  }

  const content = state.buffer.join("");

  state.buffer = [];

  try {

    await fsPromises.appendFile(state.logFilePath, content, "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to write to log file: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Appends the buffered entries synchronously. Used on exit paths where the event loop will not run again.
 */
export function flushLogBufferSync(): void {

  if(!state || (state.buffer.length === 0)) {

    return;
  }

  const content = state.buffer.join("");

  state.buffer = [];

  try {

    fs.appendFileSync(state.logFilePath, content, "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to write final log entries: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Returns the tail of the content that fits in targetSize characters, starting at a line boundary. Content already within the target is returned unchanged.
 * @param content - The full log file content.
 * @param targetSize - The size to trim down to.
 * @returns The retained tail of the content.
 */
export function trimToRecentLines(content: string, targetSize: number): string {

  const cutPosition = content.length - targetSize;

  if(cutPosition <= 0) {

    return content;
  }

  const nextNewline = content.indexOf("\n", cutPosition);

  return content.substring((nextNewline === -1) ? cutPosition : (nextNewline + 1));
}

/**
 * Checks the real file size and trims the file to half the maximum when it is over the limit.
 * @param logFilePath - The log file.
 * @param maxSize - Maximum log file size in bytes.
 */
async function trimLogFile(logFilePath: string, maxSize: number): Promise<void> {

  try {

    const stats = await fsPromises.stat(logFilePath);

    if(stats.size <= maxSize) {

      return;
    }

    const content = await fsPromises.readFile(logFilePath, "utf-8");
    const tempPath = logFilePath + ".tmp";

    await fsPromises.writeFile(tempPath, trimToRecentLines(content, Math.floor(maxSize / 2)), "utf-8");
    await fsPromises.rename(tempPath, logFilePath);
  } catch(error) {

    // eslint-disable-next-line no-console
    console.warn("Error trimming log file: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Stops the flush timer and writes out any remaining entries synchronously.
 */
export function shutdownFileLogger(): void {

  if(!state) {

    return;
  }

  if(state.flushTimer) {

    clearInterval(state.flushTimer);
  }

  flushLogBufferSync();

  state = null;
}

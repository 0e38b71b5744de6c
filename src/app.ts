/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.ts: Single-run orchestration for pagepulse.
 */
import type { AlertNotifier, BrowserConfig, Config, Nullable, PageRenderer, RunOutcome } from "./types/index.js";
import { LOG, formatError, getPackageVersion, isConsoleLogging, setConsoleLogging } from "./utils/index.js";
import { displayConfiguration, initializeConfiguration } from "./config/index.js";
import { getConfigFilePath, getLogFilePath, initializeDataDir } from "./config/paths.js";
import { initializeFileLogger, shutdownFileLogger } from "./utils/fileLogger.js";
import consoleStamp from "console-stamp";
import { createBrowserRenderer } from "./browser/index.js";
import { createEmailNotifier } from "./notify/index.js";
import { createInterface } from "node:readline/promises";
import { runCheck } from "./monitor/runner.js";

/*
 * LOGGING MODE
 *
 * The logging mode is set at startup based on the --console CLI flag. When console logging is enabled, timestamps are added via console-stamp and output goes to
 * stdout/stderr. When file logging is used (the default), output goes to pagepulse.log in the data directory. The file logger needs the configuration to know its
 * location and size limit, so anything that goes wrong before the configuration is loaded is also echoed to stderr.
 */

/**
 * Result of parsing command-line arguments. CLI flags have the highest priority in the configuration merge order.
 */
export interface ParsedArgs {

  configFile?: string;
  consoleLogging: boolean;
  dataDir?: string;
  debugLogging: boolean;
  logFile?: string;
}

/**
 * Collaborators of a run that can be replaced, mainly by tests. Both default to the production implementations.
 */
export interface MonitorDeps {

  createRenderer?: (config: BrowserConfig) => PageRenderer;
  notifier?: AlertNotifier;
}

/**
 * Process exit codes. A scheduler can tell a healthy target (0) from a down one (2) without parsing the log.
 */
export const EXIT_CODES = {

  alive: 0,
  cancelled: 130,
  exhausted: 2,
  failure: 1
} as const;

/**
 * Maps the outcome of a run to the process exit code.
 * @param outcome - The run outcome.
 * @returns The exit code.
 */
export function exitCodeFor(outcome: RunOutcome): number {

  switch(outcome.status) {

    case "succeeded": {

      return EXIT_CODES.alive;
    }

    case "exhausted": {

      return EXIT_CODES.exhausted;
    }

    case "cancelled": {

      return EXIT_CODES.cancelled;
    }
  }
}

/**
 * Reports a problem that stops the run before it starts. In file mode the message is also written to stderr, because the file logger may not be running yet.
 * @param message - The message to report.
 */
function reportStartupFailure(message: string): void {

  LOG.error(message);

  if(!isConsoleLogging()) {

    // eslint-disable-next-line no-console
    console.error(message);
  }
}

/**
 * Keeps the window of a packaged binary open until the user presses ENTER, so that a double-clicked executable does not vanish before its message can be read.
 */
async function waitForEnterIfPackaged(): Promise<void> {

  if(!process.pkg || !process.stdin.isTTY) {

    return;
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {

    await rl.question("Press ENTER to exit.");
  } finally {

    rl.close();
  }
}

/**
 * Resolves the data directory and loads the configuration. Returns null when the run cannot proceed; the reason has been reported.
 * @param args - The parsed command-line arguments.
 * @returns The configuration, or null.
 */
async function loadConfiguration(args: ParsedArgs): Promise<Nullable<Config>> {

  try {

    initializeDataDir(args.dataDir, args.configFile);

    const result = await initializeConfiguration(getConfigFilePath());

    if(result.status === "ready") {

      return result.config;
    }

    if(result.created) {

      reportStartupFailure([ "A template configuration file was created at ", result.configPath, ". Edit it and run pagepulse again." ].join(""));
    } else {

      reportStartupFailure([ "No configuration file found at ", result.configPath, " and the template could not be created." ].join(""));
    }

    await waitForEnterIfPackaged();
  } catch(error) {

    reportStartupFailure(formatError(error));
  }

  return null;
}

/**
 * Runs one complete check: configure logging, load and validate the configuration, run the check with retries, send the alert if needed, and shut the logger
 * down. SIGINT and SIGTERM cancel the run between steps.
 * @param args - The parsed command-line arguments.
 * @param deps - Optional replacements for the renderer and notifier.
 * @returns The process exit code.
 */
export async function runMonitor(args: ParsedArgs, deps: MonitorDeps = {}): Promise<number> {

  // Set logging mode early before any log calls.
  setConsoleLogging(args.consoleLogging);

  // Apply console-stamp for timestamps only when using console logging.
  if(args.consoleLogging) {

    consoleStamp.default(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });
  }

  const config = await loadConfiguration(args);

  if(!config) {

    return EXIT_CODES.failure;
  }

  if(!args.consoleLogging) {

    await initializeFileLogger(args.logFile ?? getLogFilePath(config), config.logging.maxSize);
  }

  LOG.info("pagepulse v%s.", getPackageVersion());

  displayConfiguration(config);

  const controller = new AbortController();

  const onSignal = (signal: NodeJS.Signals): void => {

    LOG.warn("Received %s. Stopping the check.", signal);

    controller.abort();
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {

    const outcome = await runCheck(config.check, {

      notifier: deps.notifier ?? createEmailNotifier(),
      renderer: (deps.createRenderer ?? createBrowserRenderer)(config.browser),
      signal: controller.signal
    });

    return exitCodeFor(outcome);
  } finally {

    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);

    shutdownFileLogger();
  }
}

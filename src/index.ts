#!/usr/bin/env node
/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for pagepulse.
 */
import { CONFIG_METADATA, DEFAULTS, getNestedValue } from "./config/userConfig.js";
import { DEBUG_CATEGORIES, LOG, formatError, getPackageVersion, initDebugFilter, setDebugLogging } from "./utils/index.js";
import { type ParsedArgs, runMonitor } from "./app.js";
import { flushLogBufferSync } from "./utils/fileLogger.js";
import path from "node:path";

/* A check is a single run, so these handlers only make sure a stray rejection or exception reaches the log before the process ends. The run itself reports
 * every expected failure through its exit code.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));

  process.exit(1);
});

/**
 * Prints usage information to the console.
 */
function printUsage(): void {

  /* eslint-disable no-console */
  console.log("Usage: pagepulse [options]");
  console.log("");
  console.log("Loads a web page in headless Chrome, checks that it shows the expected text, retries on failure, and sends an email alert when every attempt");
  console.log("fails.");
  console.log("");
  console.log("Options:");
  console.log("  -c, --console                   Log to console instead of file");
  console.log("  -d, --debug                     Enable debug logging (verbose output for troubleshooting)");
  console.log("  -h, --help                      Show this help message");
  console.log("  -v, --version                   Show version number");
  console.log("  --config <path>                 Use this configuration file (default: <data-dir>/config.json)");
  console.log("  --data-dir <path>               Set data directory (default: ~/.pagepulse)");
  console.log("  --list-env                      List all environment variables");
  console.log("  --log-file <path>               Set log file path (default: <data-dir>/pagepulse.log)");
  console.log("");
  console.log("Exit codes:");
  console.log("  0                               The page shows the expected text");
  console.log("  1                               Configuration missing or invalid, or a fatal error");
  console.log("  2                               Every attempt failed (alert sent, disabled, or failed)");
  console.log("  130                             Interrupted");
  console.log("");
  console.log("  Run 'pagepulse --list-env' for a complete list of all environment variables.");
  /* eslint-enable no-console */
}

/**
 * Prints a complete listing of all environment variables organized by category. Generated from CONFIG_METADATA so it always matches what the configuration loader
 * reads.
 */
function printEnvironmentVariables(): void {

  /* eslint-disable no-console */

  const categoryOrder: { displayName: string; key: string }[] = [
    { displayName: "Check", key: "check" },
    { displayName: "Browser", key: "browser" },
    { displayName: "Email", key: "email" },
    { displayName: "Logging", key: "logging" }
  ];

  // Defaults for nullable settings that resolve at runtime rather than from DEFAULTS.
  const dynamicDefaults: Record<string, string> = {

    "browser.executablePath": "autodetect",
    "paths.logFile": "<data-dir>/pagepulse.log"
  };

  console.log("pagepulse Environment Variables");
  console.log("");
  console.log("Every setting can also be written in config.json.");
  console.log("Priority: CLI flags > environment variables > config.json > defaults.");

  for(const category of categoryOrder) {

    const settings = CONFIG_METADATA[category.key];

    console.log("");
    console.log(category.displayName + ":");

    let first = true;

    for(const setting of settings) {

      const envVar = setting.envVar;

      if(!envVar) {

        continue;
      }

      if(!first) {

        console.log("");
      }

      first = false;

      console.log("  " + envVar);
      console.log("    " + setting.description);

      const dynamicDefault = dynamicDefaults[setting.path];
      let defaultStr: string;

      if(dynamicDefault) {

        defaultStr = dynamicDefault;
      } else {

        const defaultValue = getNestedValue(DEFAULTS, setting.path);

        if(Array.isArray(defaultValue)) {

          defaultStr = (defaultValue.length > 0) ? defaultValue.join(",") : "(none)";
        } else if(defaultValue === "") {

          defaultStr = "(none)";
        } else {

          defaultStr = String(defaultValue);
        }

        if((typeof defaultValue === "number") && setting.unit) {

          defaultStr = defaultStr + " (" + setting.unit + ")";
        }
      }

      console.log("    Default: " + defaultStr);

      if((setting.min !== undefined) && (setting.max !== undefined)) {

        console.log("    Range: " + String(setting.min) + " to " + String(setting.max));
      }

      if(setting.secret) {

        console.log("    Never shown in the log.");
      }
    }
  }

  // PAGEPULSE_DATA_DIR is resolved before config.json is loaded, since it decides where config.json lives. PAGEPULSE_DEBUG is parsed here in the entry point.
  console.log("");
  console.log("Special:");
  console.log("  PAGEPULSE_DATA_DIR");
  console.log("    Data directory path. Must be an absolute path.");
  console.log("    Default: ~/.pagepulse");
  console.log("");
  console.log("  PAGEPULSE_DEBUG");
  console.log("    Debug categories, read left to right (e.g., 'browser', 'check,notify', '*,-config').");
  console.log("    Default: (disabled)");
  console.log("    Categories:");

  for(const entry of DEBUG_CATEGORIES) {

    console.log("      " + entry.category.padEnd(10) + entry.description);
  }

  /* eslint-enable no-console */
}

/**
 * Validates that a path argument is absolute. Prints an error and exits if relative.
 * @param flag - The CLI flag name for the error message.
 * @param value - The path value to validate.
 */
function requireAbsolutePath(flag: string, value: string | undefined): string {

  // Missing when the flag is the last argument.
  if(!value) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires a path argument.");

    process.exit(1);
  }

  if(!path.isAbsolute(value)) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires an absolute path, got: " + value);

    process.exit(1);
  }

  return value;
}

/**
 * Parses command-line arguments into a structured result. Path flags are validated here; everything else is applied by runMonitor().
 * @returns Parsed argument flags and values.
 */
function parseArgs(): ParsedArgs {

  const args = process.argv.slice(2);
  let configFile: string | undefined;
  let consoleLogging = false;
  let dataDir: string | undefined;
  let debugLogging = false;
  let logFile: string | undefined;

  for(let i = 0; i < args.length; i++) {

    const arg = args[i];

    switch(arg) {

      case "-c":
      case "--console": {

        consoleLogging = true;

        break;
      }

      case "-d":
      case "--debug": {

        debugLogging = true;

        break;
      }

      case "-h":
      case "--help": {

        printUsage();

        process.exit(0);
      }

      case "-v":
      case "--version": {

        // eslint-disable-next-line no-console
        console.log("pagepulse v" + getPackageVersion());

        process.exit(0);
      }

      case "--config": {

        configFile = requireAbsolutePath("--config", args[++i]);

        break;
      }

      case "--data-dir": {

        dataDir = requireAbsolutePath("--data-dir", args[++i]);

        break;
      }

      case "--log-file": {

        logFile = requireAbsolutePath("--log-file", args[++i]);

        break;
      }

      default: {

        // eslint-disable-next-line no-console
        console.error("Error: unknown option " + arg + ". Run 'pagepulse --help' for usage.");

        process.exit(1);
      }
    }
  }

  return { configFile, consoleLogging, dataDir, debugLogging, logFile };
}

if(process.argv.slice(2).includes("--list-env")) {

  printEnvironmentVariables();

  process.exit(0);
}

const parsedArgs = parseArgs();

// The PAGEPULSE_DEBUG environment variable takes precedence over the --debug CLI flag, allowing fine-grained category selection.
const debugEnv = process.env.PAGEPULSE_DEBUG;

if(debugEnv) {

  const unknownCategories = initDebugFilter(debugEnv);

  if(unknownCategories.length > 0) {

    // eslint-disable-next-line no-console
    console.error("Ignoring unknown debug categories in PAGEPULSE_DEBUG: %s. Known categories: %s.", unknownCategories.join(", "),
      DEBUG_CATEGORIES.map((entry) => entry.category).join(", "));
  }
} else if(parsedArgs.debugLogging) {

  setDebugLogging(true);
}

// The 'exit' event runs synchronously. Any entries still in the file logger's buffer, such as those from a fatal error, are written out here.
process.on("exit", (): void => {

  flushLogBufferSync();
});

runMonitor(parsedArgs).then((exitCode) => {

  process.exit(exitCode);
}).catch((error: unknown): void => {

  LOG.error("Fatal error: %s.", formatError(error));

  process.exit(1);
});

/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * paths.ts: Centralized filesystem path resolution for pagepulse.
 */
import type { Config } from "../types/index.js";
import { ConfigError } from "../utils/errors.js";
import os from "node:os";
import path from "node:path";

/* This module is the single source of truth for the filesystem paths pagepulse uses. The data directory is resolved once at startup via initializeDataDir(),
 * before config.json is loaded, because the data directory determines where config.json lives.
 *
 * Resolution priority for the data directory (highest to lowest):
 *   1. CLI flag (--data-dir)
 *   2. Environment variable (PAGEPULSE_DATA_DIR)
 *   3. The directory holding the executable, when running as a packaged binary. The binary and its config.json travel together.
 *   4. Default (~/.pagepulse)
 *
 * The config file path can be pointed elsewhere entirely with --config. The log file path is stored in Config and resolved after config loading.
 */

// The resolved data directory, initialized once at startup. All path getters depend on this value.
let resolvedDataDir: string | undefined;

// An explicit config file path from --config, if given.
let resolvedConfigFile: string | undefined;

/**
 * Initializes the data directory from the CLI flag, environment variable, executable location, or default. Must be called at startup before any config loading
 * or path resolution.
 * @param cliDataDir - Optional data directory from the --data-dir CLI flag.
 * @param cliConfigFile - Optional config file path from the --config CLI flag.
 * @throws ConfigError if PAGEPULSE_DATA_DIR is set to a relative path.
 */
export function initializeDataDir(cliDataDir?: string, cliConfigFile?: string): void {

  const envDataDir = process.env.PAGEPULSE_DATA_DIR;

  resolvedConfigFile = cliConfigFile;

  if(cliDataDir) {

    // CLI flag is already validated by requireAbsolutePath() in index.ts.
    resolvedDataDir = cliDataDir;
  } else if(envDataDir) {

    if(!path.isAbsolute(envDataDir)) {

      throw new ConfigError("PAGEPULSE_DATA_DIR must be an absolute path, got: " + envDataDir);
    }

    resolvedDataDir = envDataDir;
  } else if(process.pkg) {

    resolvedDataDir = path.dirname(process.execPath);
  } else {

    resolvedDataDir = path.join(os.homedir(), ".pagepulse");
  }
}

/**
 * Returns the resolved data directory. Throws if called before initializeDataDir().
 * @returns The absolute path to the data directory.
 */
export function getDataDir(): string {

  if(!resolvedDataDir) {

    throw new Error("Data directory not initialized. Call initializeDataDir() first.");
  }

  return resolvedDataDir;
}

/**
 * Returns the path to the user configuration file.
 * @returns The --config path when given, otherwise config.json inside the data directory.
 */
export function getConfigFilePath(): string {

  return resolvedConfigFile ?? path.join(getDataDir(), "config.json");
}

/**
 * Returns the log file path. When config.paths.logFile is set, that absolute path is used directly. Otherwise, the default location inside the data directory is used.
 * @param config - The application configuration.
 * @returns The absolute path to the log file.
 */
export function getLogFilePath(config: Config): string {

  return config.paths.logFile ?? path.join(getDataDir(), "pagepulse.log");
}

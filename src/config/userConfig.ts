/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.ts: User configuration file management for pagepulse.
 */
import type { Config, Nullable } from "../types/index.js";
import { ConfigError, LOG, formatError } from "../utils/index.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/*
 * USER CONFIGURATION FILE
 *
 * pagepulse reads its settings from a JSON file, config.json in the data directory unless --config points elsewhere. The configuration system uses a layered
 * approach:
 *
 * 1. Hard-coded defaults (defined in DEFAULTS)
 * 2. User config file
 * 3. Environment variables (highest priority)
 *
 * The file uses snake_case keys and groups the email settings under "email". Internally, settings live in the camelCase Config structure. CONFIG_METADATA maps
 * one onto the other, so each setting is described exactly once.
 */

/*
 * SETTING METADATA
 */

/**
 * Metadata describing a single configuration setting.
 */
export interface SettingMetadata {

  // Human-readable description shown by --list-env.
  description: string;

  // Environment variable that can override this setting, or null if not overridable.
  envVar: string | null;

  // Dot-separated path to the setting in config.json (e.g., "email.smtp_host").
  key: string;

  // Maximum allowed value for integer settings.
  max?: number;

  // Minimum allowed value for integer settings.
  min?: number;

  // Dot-separated path to the setting in Config (e.g., "check.notification.smtp.host").
  path: string;

  // Secrets are never echoed back in startup output.
  secret?: boolean;

  // Data type for parsing environment values and checking file values. "list" is an array of strings, written in environment variables as a comma-separated
  // string. "path" is a nullable string where an empty value means "use the default location".
  type: "boolean" | "integer" | "list" | "path" | "string" | "url";

  // Unit of measurement shown by --list-env (e.g., "ms", "seconds").
  unit?: string;
}

/**
 * Metadata for all configurable settings, organized by category.
 */
export const CONFIG_METADATA: Record<string, SettingMetadata[]> = {

  browser: [
    {

      description: "Path to the Chrome executable. Leave empty to autodetect.",
      envVar: "CHROME_BIN",
      key: "browser.executable_path",
      path: "browser.executablePath",
      type: "path"
    },
    {

      description: "Run Chrome without a window. Turn off only to watch a check while debugging it.",
      envVar: "BROWSER_HEADLESS",
      key: "browser.headless",
      path: "browser.headless",
      type: "boolean"
    },
    {

      description: "Timeout for loading the target page. Increase for slow networks or heavy pages.",
      envVar: "NAV_TIMEOUT",
      key: "browser.navigation_timeout",
      max: 600000,
      min: 1000,
      path: "browser.navigationTimeout",
      type: "integer",
      unit: "ms"
    }
  ],

  check: [
    {

      description: "Address of the page to check. Must be an http or https URL.",
      envVar: "CHECK_URL",
      key: "url",
      path: "check.url",
      type: "url"
    },
    {

      description: "Text that must appear in the rendered page for the target to count as alive. Matched exactly, including case.",
      envVar: "EXPECTED_TEXT",
      key: "expected_text",
      path: "check.expectedText",
      type: "string"
    },
    {

      description: "Pause between a failed attempt and the next one.",
      envVar: "RETRY_DELAY_SECONDS",
      key: "retry_delay_seconds",
      max: 86400,
      min: 0,
      path: "check.retryDelaySeconds",
      type: "integer",
      unit: "seconds"
    },
    {

      description: "Number of attempts before giving up and sending the alert. Zero sends the alert without checking.",
      envVar: "MAX_ATTEMPTS",
      key: "max_attempts",
      max: 100,
      min: 0,
      path: "check.maxAttempts",
      type: "integer"
    }
  ],

  email: [
    {

      description: "Send an email alert when every attempt fails.",
      envVar: "EMAIL_ENABLED",
      key: "email.enabled",
      path: "check.notification.enabled",
      type: "boolean"
    },
    {

      description: "SMTP server hostname.",
      envVar: "SMTP_HOST",
      key: "email.smtp_host",
      path: "check.notification.smtp.host",
      type: "string"
    },
    {

      description: "SMTP server port. 587 for STARTTLS, 465 for implicit TLS.",
      envVar: "SMTP_PORT",
      key: "email.smtp_port",
      max: 65535,
      min: 1,
      path: "check.notification.smtp.port",
      type: "integer"
    },
    {

      description: "Use implicit TLS from the start of the connection. When off, the server must support STARTTLS.",
      envVar: "SMTP_SECURE",
      key: "email.smtp_secure",
      path: "check.notification.smtp.secure",
      type: "boolean"
    },
    {

      description: "SMTP username. Leave empty for servers that do not require authentication.",
      envVar: "SMTP_USERNAME",
      key: "email.smtp_username",
      path: "check.notification.smtp.username",
      type: "string"
    },
    {

      description: "SMTP password.",
      envVar: "SMTP_PASSWORD",
      key: "email.smtp_password",
      path: "check.notification.smtp.password",
      secret: true,
      type: "string"
    },
    {

      description: "Sender address of the alert.",
      envVar: "EMAIL_FROM",
      key: "email.from",
      path: "check.notification.from",
      type: "string"
    },
    {

      description: "Recipient addresses of the alert. Comma-separated in the environment variable.",
      envVar: "EMAIL_TO",
      key: "email.to",
      path: "check.notification.to",
      type: "list"
    },
    {

      description: "Subject line of the alert.",
      envVar: "EMAIL_SUBJECT",
      key: "email.subject",
      path: "check.notification.subject",
      type: "string"
    }
  ],

  logging: [
    {

      description: "Log file location. Leave empty to use pagepulse.log in the data directory.",
      envVar: "PAGEPULSE_LOG_FILE",
      key: "logging.file",
      path: "paths.logFile",
      type: "path"
    },
    {

      description: "Maximum log file size in bytes. When exceeded, the file is trimmed to half this size keeping the most recent entries.",
      envVar: "LOG_MAX_SIZE",
      key: "logging.max_size",
      max: 104857600,
      min: 10240,
      path: "logging.maxSize",
      type: "integer",
      unit: "bytes"
    }
  ]
};

/*
 * USER CONFIG TYPES
 *
 * The structure of config.json. All fields are optional because missing fields use defaults.
 */

/**
 * The "browser" section of config.json.
 */
export interface UserBrowserConfig {

  executable_path?: Nullable<string>;
  headless?: boolean;
  navigation_timeout?: number;
}

/**
 * The "email" section of config.json.
 */
export interface UserEmailConfig {

  enabled?: boolean;
  from?: string;
  smtp_host?: string;
  smtp_password?: string;
  smtp_port?: number;
  smtp_secure?: boolean;
  smtp_username?: string;
  subject?: string;
  to?: string[];
}

/**
 * The "logging" section of config.json.
 */
export interface UserLoggingConfig {

  file?: Nullable<string>;
  max_size?: number;
}

/**
 * User configuration with all fields optional. This is the structure of the config.json file.
 */
export interface UserConfig {

  browser?: UserBrowserConfig;
  email?: UserEmailConfig;
  expected_text?: string;
  logging?: UserLoggingConfig;
  max_attempts?: number;
  retry_delay_seconds?: number;
  url?: string;
}

/**
 * Result of loading the user config file.
 */
export type UserConfigLoadResult =
  { config: UserConfig; status: "loaded" } |
  { created: boolean; status: "missing" };

/*
 * DEFAULTS AND TEMPLATE
 */

/**
 * Hard-coded default configuration values. The check target has no sensible default, so url and expectedText are empty and fail validation unless the user
 * config or the environment provides them.
 */
export const DEFAULTS: Config = {

  browser: {

    executablePath: null,
    headless: true,
    navigationTimeout: 30000
  },

  check: {

    expectedText: "",
    maxAttempts: 2,

    notification: {

      enabled: false,
      from: "",

      smtp: {

        host: "",
        password: "",
        port: 587,
        secure: false,
        username: ""
      },

      subject: "Application is DOWN",
      to: []
    },

    retryDelaySeconds: 60,
    url: ""
  },

  logging: {

    maxSize: 1048576
  },

  paths: {

    logFile: null
  }
};

/**
 * Builds the starter config.json written on first run. It carries the defaults plus placeholder values the user is expected to replace. Email stays disabled so
 * that an unedited template never tries to reach a real server.
 * @returns The template configuration.
 */
export function createTemplateConfig(): UserConfig {

  return {

    email: {

      enabled: false,
      from: "alerts@example.com",
      smtp_host: "smtp.example.com",
      smtp_password: "your_password",
      smtp_port: DEFAULTS.check.notification.smtp.port,
      smtp_secure: DEFAULTS.check.notification.smtp.secure,
      smtp_username: "alerts@example.com",
      subject: DEFAULTS.check.notification.subject,
      to: ["oncall@example.com"]
    },

    expected_text: "I'm alive",
    max_attempts: DEFAULTS.check.maxAttempts,
    retry_delay_seconds: DEFAULTS.check.retryDelaySeconds,
    url: "https://example.com/"
  };
}

/*
 * CONFIG FILE OPERATIONS
 */

/**
 * Writes the starter template to the given path, creating parent directories as needed. An existing file is never overwritten.
 * @param filePath - Where to write the template.
 * @returns True if the template was written, false if writing failed (the failure is logged).
 */
export async function writeTemplateConfig(filePath: string): Promise<boolean> {

  try {

    await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
    await fsPromises.writeFile(filePath, JSON.stringify(createTemplateConfig(), null, 2) + "\n", { encoding: "utf-8", flag: "wx" });
  } catch(error) {

    LOG.error("Failed to create template configuration file %s: %s.", filePath, formatError(error));

    return false;
  }

  return true;
}

/**
 * Loads user configuration from the config file. A missing file is replaced by the starter template and reported as "missing" so the caller can stop and let the
 * user edit it.
 * @param filePath - Path to config.json.
 * @returns The parsed configuration, or the missing-file status.
 * @throws ConfigError if the file exists but cannot be read or does not hold a JSON object.
 */
export async function loadUserConfig(filePath: string): Promise<UserConfigLoadResult> {

  let content: string;

  try {

    content = await fsPromises.readFile(filePath, "utf-8");
  } catch(error) {

    if((error as NodeJS.ErrnoException).code === "ENOENT") {

      LOG.warn("Configuration file not found: %s.", filePath);

      return { created: await writeTemplateConfig(filePath), status: "missing" };
    }

    throw new ConfigError([ "Failed to read configuration file ", filePath, ": ", formatError(error), "." ].join(""), { cause: error });
  }

  let parsed: unknown;

  try {

    parsed = JSON.parse(content);
  } catch(error) {

    throw new ConfigError([ "Invalid JSON in configuration file ", filePath, ": ", formatError(error), "." ].join(""), { cause: error });
  }

  if((parsed === null) || (typeof parsed !== "object") || Array.isArray(parsed)) {

    throw new ConfigError([ "Configuration file ", filePath, " must contain a JSON object." ].join(""));
  }

  LOG.debug("config", "Loaded configuration file %s.", filePath);

  return { config: parsed as UserConfig, status: "loaded" };
}

/*
 * CONFIGURATION MERGING
 */

/**
 * Parses an environment variable value according to the setting type.
 * @param value - The raw environment variable value.
 * @param type - The expected type of the setting.
 * @returns The parsed value, or undefined if parsing fails.
 */
export function parseEnvValue(value: string, type: SettingMetadata["type"]): Nullable<boolean | number | string | string[]> | undefined {

  switch(type) {

    case "boolean": {

      // Accept common truthy values for environment variables.
      const lower = value.toLowerCase();

      return (lower === "true") || (lower === "1") || (lower === "yes");
    }

    case "integer": {

      const num = Number(value.trim());

      return ((value.trim().length === 0) || Number.isNaN(num)) ? undefined : num;
    }

    case "list": {

      return value.split(",").map((entry) => entry.trim()).filter((entry) => entry.length > 0);
    }

    case "path": {

      return (value.length > 0) ? value : null;
    }

    default: {

      return value;
    }
  }
}

/**
 * Checks that a value read from config.json has the JSON type a setting expects. Range checks happen later, in validateConfiguration().
 * @param value - The value from the file.
 * @param type - The expected type of the setting.
 * @returns True if the value can be used as-is.
 */
export function isValidFileValue(value: unknown, type: SettingMetadata["type"]): boolean {

  switch(type) {

    case "boolean": {

      return typeof value === "boolean";
    }

    case "integer": {

      return typeof value === "number";
    }

    case "list": {

      return Array.isArray(value) && value.every((entry) => typeof entry === "string");
    }

    case "path": {

      return (value === null) || (typeof value === "string");
    }

    default: {

      return typeof value === "string";
    }
  }
}

/**
 * Gets a value from a nested object using a dot-separated path.
 * @param obj - The object to read from.
 * @param settingPath - Dot-separated path (e.g., "email.smtp_host").
 * @returns The value at the path, or undefined if not found.
 */
export function getNestedValue(obj: unknown, settingPath: string): unknown {

  const parts = settingPath.split(".");
  let current: unknown = obj;

  for(const part of parts) {

    if((current === null) || (current === undefined) || (typeof current !== "object")) {

      return undefined;
    }

    current = (current as Record<string, unknown>)[part];
  }

  return current;
}

/**
 * Sets a value in a nested object using a dot-separated path, creating intermediate objects as needed.
 * @param obj - The object to modify.
 * @param settingPath - Dot-separated path (e.g., "check.notification.smtp.host").
 * @param value - The value to set.
 */
export function setNestedValue(obj: Record<string, unknown>, settingPath: string, value: unknown): void {

  const parts = settingPath.split(".");
  let current = obj;

  for(let i = 0; i < (parts.length - 1); i++) {

    const part = parts[i];

    if(current[part] === undefined) {

      current[part] = {};
    }

    current = current[part] as Record<string, unknown>;
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Returns every setting across all categories.
 * @returns The flattened metadata list.
 */
export function getAllSettings(): SettingMetadata[] {

  return Object.values(CONFIG_METADATA).flat();
}

/**
 * Looks up a setting by its config.json key.
 * @param key - Dot-separated config.json key (e.g., "email.smtp_port").
 * @returns The setting, or undefined if no setting has that key.
 */
export function findSetting(key: string): SettingMetadata | undefined {

  return getAllSettings().find((setting) => setting.key === key);
}

/**
 * Merges user configuration with defaults and environment overrides to produce the final configuration. Priority: env vars > user config > defaults. File values
 * of the wrong type and unparseable environment values are skipped with a warning, leaving the lower-priority value in place.
 * @param userConfig - User configuration from the config file.
 * @returns The merged configuration.
 */
export function mergeConfiguration(userConfig: UserConfig): Config {

  // Start with a deep copy of defaults.
  const config = JSON.parse(JSON.stringify(DEFAULTS)) as Config;
  const target = config as unknown as Record<string, unknown>;

  for(const setting of getAllSettings()) {

    const userValue = getNestedValue(userConfig, setting.key);

    if(userValue === undefined) {

      continue;
    }

    if(!isValidFileValue(userValue, setting.type)) {

      LOG.warn("Ignoring configuration value %s: expected %s, got %s.", setting.key, setting.type, JSON.stringify(userValue));

      continue;
    }

    // Lists are copied so the merged configuration never aliases the parsed file.
    setNestedValue(target, setting.path, Array.isArray(userValue) ? [...userValue] : userValue);
  }

  // Apply environment variable overrides (highest priority).
  for(const setting of getAllSettings()) {

    const envValue = setting.envVar ? process.env[setting.envVar] : undefined;

    if(envValue === undefined) {

      continue;
    }

    const parsedValue = parseEnvValue(envValue, setting.type);

    if(parsedValue === undefined) {

      LOG.warn("Ignoring environment variable %s: %s is not a valid %s.", setting.envVar, JSON.stringify(envValue), setting.type);

      continue;
    }

    LOG.debug("config", "Environment variable %s overrides %s.", setting.envVar, setting.key);

    setNestedValue(target, setting.path, parsedValue);
  }

  return config;
}

/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for pagepulse.
 */
import type { CheckConfig, Config, Nullable } from "../types/index.js";
import { ConfigError, LOG, formatDuration, maskSecret } from "../utils/index.js";
import { findSetting, loadUserConfig, mergeConfiguration } from "./userConfig.js";

/*
 * CONFIGURATION
 *
 * Configuration uses a layered approach with the following priority (highest to lowest):
 *
 * 1. Environment variables (SCREAMING_SNAKE_CASE naming)
 * 2. User config file (config.json in the data directory, or the --config path)
 * 3. Hard-coded defaults (defined in userConfig.ts)
 *
 * The settings are organized by functional area:
 *
 * - check: The target URL, the expected marker text, and the retry policy, plus email alert settings
 * - browser: Chrome launch settings (executable path, headless mode, navigation timeout)
 * - logging: Log file size limit
 * - paths: Log file location
 *
 * Configuration is loaded once at startup via initializeConfiguration(). The result is validated and frozen; nothing downstream mutates it.
 */

/**
 * Outcome of configuration startup. "template" means the config file was missing and the run must stop so the user can edit the starter file.
 */
export type ConfigInitResult =
  { config: Config; status: "ready" } |
  { configPath: string; created: boolean; status: "template" };

/**
 * Recursively freezes a plain configuration object.
 * @param value - The object to freeze.
 * @returns The same object, frozen.
 */
function deepFreeze<T>(value: T): T {

  if((value !== null) && (typeof value === "object")) {

    for(const child of Object.values(value)) {

      deepFreeze(child);
    }

    Object.freeze(value);
  }

  return value;
}

/**
 * Loads the user config file, merges defaults and environment variable overrides, and validates the result.
 * @param configPath - Path to config.json.
 * @returns The frozen configuration, or the template status when the config file had to be created.
 * @throws ConfigError if the file cannot be parsed or any value is invalid.
 */
export async function initializeConfiguration(configPath: string): Promise<ConfigInitResult> {

  const result = await loadUserConfig(configPath);

  if(result.status === "missing") {

    return { configPath, created: result.created, status: "template" };
  }

  const config = mergeConfiguration(result.config);

  validateConfiguration(config);

  LOG.debug("config", "Configuration initialized from defaults, user config, and environment variables.");

  return { config: deepFreeze(config), status: "ready" };
}

/*
 * CONFIGURATION VALIDATION
 *
 * We collect every validation error before failing so the operator can fix all of them in one edit instead of discovering them one run at a time.
 */

/**
 * Validates that a configuration value is an integer within an inclusive range.
 * @param name - The configuration name for error messages.
 * @param value - The value to validate.
 * @param min - Minimum allowed value (inclusive).
 * @param max - Maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validateIntRange(name: string, value: number, min: number, max: number): Nullable<string> {

  if(!Number.isInteger(value)) {

    return [ name, " must be an integer, got: ", String(value) ].join("");
  }

  if(value < min) {

    return [ name, " must be at least ", String(min), ", got: ", String(value) ].join("");
  }

  if(value > max) {

    return [ name, " must be at most ", String(max), ", got: ", String(value) ].join("");
  }

  return null;
}

/**
 * Validates that a value is an absolute http or https URL.
 * @param name - The configuration name for error messages.
 * @param value - The value to validate.
 * @returns Error message if invalid, null if valid.
 */
export function validateHttpUrl(name: string, value: string): Nullable<string> {

  if(value.trim().length === 0) {

    return [ name, " is required" ].join("");
  }

  let parsed: URL;

  try {

    parsed = new URL(value);
  } catch {

    return [ name, " must be an absolute URL, got: ", value ].join("");
  }

  if((parsed.protocol !== "http:") && (parsed.protocol !== "https:")) {

    return [ name, " must use http or https, got: ", parsed.protocol ].join("");
  }

  return null;
}

/**
 * Validates an integer setting against the bounds declared for it in CONFIG_METADATA.
 * @param key - The config.json key of the setting.
 * @param value - The value to validate.
 * @returns Error message if invalid, null if valid.
 */
export function validateSettingRange(key: string, value: number): Nullable<string> {

  const setting = findSetting(key);

  return validateIntRange(key, value, setting?.min ?? Number.MIN_SAFE_INTEGER, setting?.max ?? Number.MAX_SAFE_INTEGER);
}

/**
 * Validates the check section: target, marker, retry policy, and the email settings when alerts are enabled.
 * @param check - The check configuration.
 * @returns All error messages found, empty when valid.
 */
export function validateCheckConfig(check: CheckConfig): string[] {

  const errors: string[] = [];
  const push = (error: Nullable<string>): void => {

    if(error) {

      errors.push(error);
    }
  };

  push(validateHttpUrl("url", check.url));

  if(check.expectedText.length === 0) {

    errors.push("expected_text is required");
  }

  push(validateSettingRange("retry_delay_seconds", check.retryDelaySeconds));
  push(validateSettingRange("max_attempts", check.maxAttempts));

  const { notification } = check;

  if(notification.enabled) {

    if(notification.smtp.host.trim().length === 0) {

      errors.push("email.smtp_host is required when email alerts are enabled");
    }

    push(validateSettingRange("email.smtp_port", notification.smtp.port));

    if(notification.from.trim().length === 0) {

      errors.push("email.from is required when email alerts are enabled");
    }

    if(notification.to.length === 0) {

      errors.push("email.to needs at least one recipient when email alerts are enabled");
    }
  }

  return errors;
}

/**
 * Validates all configuration values and throws if any are invalid.
 * @param config - The merged configuration.
 * @throws ConfigError listing every invalid value.
 */
export function validateConfiguration(config: Config): void {

  const errors = validateCheckConfig(config.check);

  for(const error of [
    validateSettingRange("browser.navigation_timeout", config.browser.navigationTimeout),
    validateSettingRange("logging.max_size", config.logging.maxSize)
  ]) {

    if(error) {

      errors.push(error);
    }
  }

  if(errors.length > 0) {

    throw new ConfigError([ "Configuration validation failed:\n  ", errors.join("\n  ") ].join(""));
  }

  if(config.check.maxAttempts === 0) {

    LOG.warn("max_attempts is 0. No check will be made and the alert is sent immediately.");
  }
}

/**
 * Renders a setting value for startup output, masking settings marked secret in CONFIG_METADATA.
 * @param key - The config.json key of the setting.
 * @param value - The value to render.
 * @returns The value, or its masked form.
 */
function displayValue(key: string, value: string): string {

  return findSetting(key)?.secret ? maskSecret(value) : value;
}

/**
 * Displays the active configuration at the start of a run. The SMTP password is never printed.
 * @param config - The validated configuration.
 */
export function displayConfiguration(config: Config): void {

  const { check } = config;
  const { notification } = check;

  LOG.info("Starting single check with configuration:");
  LOG.info("  URL: %s", check.url);
  LOG.info("  Expected text: %s", check.expectedText);
  LOG.info("  Retry delay: %s", formatDuration(check.retryDelaySeconds * 1000));
  LOG.info("  Max attempts: %s", check.maxAttempts);
  LOG.info("  Chrome executable: %s", config.browser.executablePath ?? "autodetect");

  if(!notification.enabled) {

    LOG.info("  Email alerts: disabled");

    return;
  }

  LOG.info("  Email alerts: %s to %s via %s:%s (%s, password %s)", notification.from, notification.to.join(", "), notification.smtp.host,
    notification.smtp.port, notification.smtp.secure ? "TLS" : "STARTTLS", displayValue("email.smtp_password", notification.smtp.password));
}

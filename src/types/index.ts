/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Type definitions for pagepulse.
 */
import type { DeliveryError, RenderError } from "../utils/errors.js";

/**
 * A utility type that represents a value that can be null.
 * @typeParam T - The type that can be nullable.
 */
export type Nullable<T> = T | null;

/*
 * CONFIGURATION TYPES
 *
 * The Config interface is the root configuration object. The check section is the only part the monitoring core consumes; the remaining sections configure the
 * browser, logging, and filesystem layers around it. Values come from defaults, the user config file, and environment variables, in increasing priority.
 */

/**
 * SMTP transport settings for alert delivery.
 */
export interface SmtpSettings {

  host: string;

  // Cleartext password for SMTP AUTH. Only sent when a username is configured.
  password: string;

  port: number;

  // When true, the connection uses implicit TLS from the first byte (usually port 465). When false, the server must offer STARTTLS and the session is upgraded
  // before authenticating.
  secure: boolean;

  username: string;
}

/**
 * Email notification settings. When enabled, the transport settings and at least one recipient must be present. The monitoring core does not check this; a bad
 * value simply fails at send time.
 */
export interface NotificationConfig {

  enabled: boolean;
  from: string;
  smtp: SmtpSettings;
  subject: string;
  to: string[];
}

/**
 * The immutable configuration of a single check run.
 */
export interface CheckConfig {

  // The marker whose presence in the rendered document means the target is alive. Matched exactly and case-sensitively.
  expectedText: string;

  // Upper bound on attempts in one run. Zero skips every attempt and goes straight to notification.
  maxAttempts: number;

  notification: NotificationConfig;

  // Fixed pause between a failed attempt and the next one.
  retryDelaySeconds: number;

  url: string;
}

/**
 * Browser-related configuration controlling Chrome launch behavior.
 */
export interface BrowserConfig {

  // Path to the Chrome executable. When null, the application searches common installation paths across macOS, Linux, and Windows. Environment variable:
  // CHROME_BIN.
  executablePath: Nullable<string>;

  // Run Chrome without a visible window. Disable only to watch a check while debugging it. Environment variable: BROWSER_HEADLESS. Default: true.
  headless: boolean;

  // Time in milliseconds to wait for page navigation to settle. Environment variable: NAV_TIMEOUT. Default: 30000ms.
  navigationTimeout: number;
}

/**
 * Log file configuration.
 */
export interface LoggingConfig {

  // Maximum size in bytes before the log file is trimmed to half this size. Environment variable: LOG_MAX_SIZE. Default: 1048576 (1 MiB).
  maxSize: number;
}

/**
 * Filesystem locations that can be overridden.
 */
export interface PathsConfig {

  // Absolute path to the log file. When null, the log lives in the data directory. Environment variable: PAGEPULSE_LOG_FILE.
  logFile: Nullable<string>;
}

/**
 * The application configuration.
 */
export interface Config {

  browser: BrowserConfig;
  check: CheckConfig;
  logging: LoggingConfig;
  paths: PathsConfig;
}

/*
 * MONITORING TYPES
 *
 * The monitoring core talks to the outside world through two capabilities: a renderer that turns a URL into document text, and a notifier that delivers an alert.
 * Both are interfaces so that tests can substitute in-memory fakes for Chrome and SMTP.
 */

/**
 * A rendering session owned by exactly one check attempt. It must be closed when the attempt ends, whatever the outcome.
 */
export interface RenderSession {

  close: () => Promise<void>;

  // Navigates to the URL and returns the full rendered document text. Rejects with a RenderError on navigation or rendering failure.
  open: (url: string) => Promise<string>;
}

/**
 * The rendering capability. Each call to openSession() acquires an isolated session.
 */
export interface PageRenderer {

  openSession: () => Promise<RenderSession>;
}

/**
 * The result of a single check attempt. "not-alive" and "errored" are treated identically by the runner and differ only in what is logged.
 */
export type AttemptResult =
  { status: "alive" } |
  { status: "not-alive" } |
  { error: RenderError; status: "errored" };

/**
 * The result of a notification call.
 */
export type NotifyResult =
  { status: "disabled" } |
  { messageId: string; recipients: string[]; status: "sent" } |
  { error: DeliveryError; status: "failed" };

/**
 * The notification capability. Implementations report delivery failures through the result and never reject.
 */
export interface AlertNotifier {

  notify: (settings: NotificationConfig, url: string, expectedText: string) => Promise<NotifyResult>;
}

/**
 * The terminal state of a run.
 */
export type RunOutcome =
  { attempt: number; status: "succeeded" } |
  { attempts: number; notification: NotifyResult; status: "exhausted" } |
  { attempts: number; status: "cancelled" };

/**
 * A pause between attempts. The default implementation is an awaited timer that honors an abort signal.
 */
export type DelayFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

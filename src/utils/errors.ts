/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error classes and formatting utilities for pagepulse.
 */

/* Three error classes mark the failure domains of a run. RenderError covers anything that goes wrong while loading and reading the target page, DeliveryError
 * covers alert delivery, and ConfigError covers startup configuration. The first two never escape the monitoring core; the third aborts startup before the core
 * runs.
 */

/**
 * Formats an error for logging by extracting the message if available, falling back to string conversion for non-Error objects. Trailing punctuation is stripped
 * to allow callers to add consistent punctuation in their log format strings.
 * @param error - The error to format.
 * @returns A string representation suitable for logging, without trailing punctuation.
 */
export function formatError(error: unknown): string {

  let message: string;

  if(error instanceof Error) {

    message = error.message;
  } else if(error && (typeof (error as { message?: unknown }).message === "string")) {

    message = (error as { message: string }).message;
  } else {

    message = String(error);
  }

  // Strip trailing punctuation to prevent double punctuation when callers add their own.
  return message.replace(/[.!?]+$/, "");
}

/**
 * A failure while rendering the target page: browser launch, navigation, timeout, or reading the document.
 */
export class RenderError extends Error {

  constructor(message: string, options?: { cause?: unknown }) {

    super(message, options);

    this.name = "RenderError";
  }

  /**
   * Wraps an arbitrary thrown value. An existing RenderError is returned as-is so that its original message is not nested.
   * @param error - The thrown value.
   * @param context - Short description of what was being done, used as the message prefix.
   * @returns A RenderError carrying the original value as its cause.
   */
  static from(error: unknown, context: string): RenderError {

    if(error instanceof RenderError) {

      return error;
    }

    return new RenderError([ context, ": ", formatError(error) ].join(""), { cause: error });
  }
}

/**
 * A failure while composing or delivering an alert.
 */
export class DeliveryError extends Error {

  constructor(message: string, options?: { cause?: unknown }) {

    super(message, options);

    this.name = "DeliveryError";
  }
}

/**
 * A configuration problem detected at startup.
 */
export class ConfigError extends Error {

  constructor(message: string, options?: { cause?: unknown }) {

    super(message, options);

    this.name = "ConfigError";
  }
}

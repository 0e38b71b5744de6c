/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * template.ts: Alert message composition for pagepulse.
 */
import type { NotificationConfig } from "../types/index.js";
import type { SendMailOptions } from "nodemailer";

/**
 * Formats the plaintext body of the alert.
 * @param url - The checked URL.
 * @param expectedText - The marker that was not found.
 * @returns The message body.
 */
export function formatAlertMessage(url: string, expectedText: string): string {

  return [ "The application at ", url, " does not show the expected message: '", expectedText, "'.\nPlease check the service." ].join("");
}

/**
 * Builds the complete alert message: sender, every recipient on a single To header, the configured subject, and the plaintext body.
 * @param settings - The notification settings.
 * @param url - The checked URL.
 * @param expectedText - The marker that was not found.
 * @returns Message options for the mail transport.
 */
export function buildAlertMail(settings: NotificationConfig, url: string, expectedText: string): SendMailOptions {

  return {

    from: settings.from,
    subject: settings.subject,
    text: formatAlertMessage(url, expectedText),
    to: settings.to.join(", ")
  };
}

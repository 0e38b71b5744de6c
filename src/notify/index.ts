/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: SMTP email alerts for pagepulse.
 */
import type { AlertNotifier, NotificationConfig, NotifyResult, Nullable, SmtpSettings } from "../types/index.js";
import { DeliveryError, LOG, formatError, startTimer } from "../utils/index.js";
import type { SendMailOptions } from "nodemailer";
import { buildAlertMail } from "./template.js";
import nodemailer from "nodemailer";

export { buildAlertMail, formatAlertMessage } from "./template.js";

/* Alerts go out over SMTP through nodemailer. A transport is created for each alert and closed right after the send, since a run sends at most one message.
 *
 * Two connection modes are supported. With smtp_secure on, the connection is TLS from the first byte (port 465 on most servers). With it off, the client
 * connects in plaintext and the server must upgrade the session with STARTTLS before credentials are exchanged; requireTLS makes nodemailer refuse to continue
 * on a server that does not offer it.
 */

/**
 * The slice of a nodemailer transporter the notifier uses.
 */
export interface MailTransport {

  close: () => void;
  sendMail: (message: SendMailOptions) => Promise<{ messageId?: string }>;
}

/**
 * Creates a mail transport for the given SMTP settings.
 */
export type TransportFactory = (smtp: SmtpSettings) => MailTransport;

/**
 * SMTP connection options passed to nodemailer.
 */
export interface SmtpTransportOptions {

  auth?: { pass: string; user: string };
  host: string;
  port: number;
  requireTLS: boolean;
  secure: boolean;
}

/**
 * Maps the configured SMTP settings onto nodemailer connection options. Credentials are included only when a username is configured.
 * @param smtp - The SMTP settings.
 * @returns The transport options.
 */
export function buildTransportOptions(smtp: SmtpSettings): SmtpTransportOptions {

  const options: SmtpTransportOptions = {

    host: smtp.host,
    port: smtp.port,
    requireTLS: !smtp.secure,
    secure: smtp.secure
  };

  if(smtp.username.length > 0) {

    options.auth = { pass: smtp.password, user: smtp.username };
  }

  return options;
}

/**
 * The production transport factory, backed by nodemailer's SMTP transport.
 * @param smtp - The SMTP settings.
 * @returns A nodemailer transporter.
 */
export function createSmtpTransport(smtp: SmtpSettings): MailTransport {

  return nodemailer.createTransport(buildTransportOptions(smtp));
}

/**
 * Sends one alert. Every failure is returned as a DeliveryError; nothing is thrown.
 * @param factory - The transport factory.
 * @param settings - The notification settings.
 * @param url - The checked URL.
 * @param expectedText - The marker that was not found.
 * @returns The notification result.
 */
async function sendAlertMail(factory: TransportFactory, settings: NotificationConfig, url: string, expectedText: string): Promise<NotifyResult> {

  const elapsed = startTimer();
  let transport: Nullable<MailTransport> = null;

  try {

    transport = factory(settings.smtp);

    LOG.debug("notify", "Connecting to %s:%s using %s.", settings.smtp.host, settings.smtp.port, settings.smtp.secure ? "TLS" : "STARTTLS");

    const info = await transport.sendMail(buildAlertMail(settings, url, expectedText));

    LOG.info("Alert email sent to %s.", settings.to.join(", "));
    LOG.debug("notify", "Message %s accepted after %sms.", info.messageId ?? "(no id)", elapsed());

    return { messageId: info.messageId ?? "", recipients: [...settings.to], status: "sent" };
  } catch(error) {

    const deliveryError = new DeliveryError([ "Failed to send alert email: ", formatError(error) ].join(""), { cause: error });

    LOG.error("%s.", deliveryError.message);

    return { error: deliveryError, status: "failed" };
  } finally {

    transport?.close();
  }
}

/**
 * Creates the email notifier.
 * @param factory - Optional transport factory. Defaults to nodemailer SMTP.
 * @returns The alert notifier.
 */
export function createEmailNotifier(factory: TransportFactory = createSmtpTransport): AlertNotifier {

  return {

    notify: async (settings: NotificationConfig, url: string, expectedText: string): Promise<NotifyResult> => {

      if(!settings.enabled) {

        LOG.info("Email alerts are disabled. No alert sent.");

        return { status: "disabled" };
      }

      return sendAlertMail(factory, settings, url, expectedText);
    }
  };
}

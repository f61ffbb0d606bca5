// ---------------------------------------------------------------------------
// Failure notification email (nodemailer)
// ---------------------------------------------------------------------------

import nodemailer from "nodemailer";
import type { NotificationSettings } from "./config.js";
import { NotificationDeliveryError, errorMessage } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import type { RunResult } from "./types.js";

export interface FailureNotifier {
  notifyFailures(failed: readonly RunResult[]): Promise<boolean>;
}

/** The part of a nodemailer Transporter the notifier uses. */
export interface MailTransport {
  sendMail(message: nodemailer.SendMailOptions): Promise<unknown>;
  close(): void;
}

export type TransportFactory = (
  options: SmtpTransportSettings,
) => MailTransport;

export interface SmtpTransportSettings {
  host: string;
  port: number;
  secure: boolean;
  requireTLS: boolean;
  auth: { user: string; pass: string };
}

const defaultTransportFactory: TransportFactory = (options) =>
  nodemailer.createTransport(options);

export function composeFailureMessage(failed: readonly RunResult[]): {
  subject: string;
  text: string;
} {
  let text = "The following backup jobs failed:\n\n";
  for (const job of failed) {
    text += `• ${job.name}\n`;
    text += `  Source: ${job.source}\n`;
    text += `  Error: ${job.error ?? "Unknown error"}\n\n`;
  }
  return {
    subject: `Backup Sync Failed - ${failed.length} job(s)`,
    text,
  };
}

// config.json keys the transport still needs
export function missingSmtpFields(n: NotificationSettings): string[] {
  const fields: [string, string | undefined][] = [
    ["smtp_server", n.smtpServer],
    ["smtp_user", n.smtpUser],
    ["smtp_pass", n.smtpPass],
  ];
  return fields.filter(([, value]) => !value).map(([key]) => key);
}

export function smtpTransportSettings(
  n: NotificationSettings,
): SmtpTransportSettings | null {
  if (!n.smtpServer || !n.smtpUser || !n.smtpPass) return null;
  // 465 is SMTPS; everything else must upgrade with STARTTLS
  const secure = n.smtpPort === 465;
  return {
    host: n.smtpServer,
    port: n.smtpPort,
    secure,
    requireTLS: !secure,
    auth: { user: n.smtpUser, pass: n.smtpPass },
  };
}

/**
 * Sends one summary email per batch listing every failed job. Delivery
 * problems are logged and never thrown: a failed email must not change the
 * batch outcome.
 */
export class Notifier implements FailureNotifier {
  private readonly logger: Logger;
  private readonly createTransport: TransportFactory;

  constructor(
    private readonly settings: NotificationSettings | undefined,
    {
      logger,
      createTransport,
    }: { logger?: Logger; createTransport?: TransportFactory } = {},
  ) {
    this.logger = logger ?? new NullLogger();
    this.createTransport = createTransport ?? defaultTransportFactory;
  }

  async notifyFailures(failed: readonly RunResult[]): Promise<boolean> {
    if (!failed.length) {
      this.logger.warn("No failed jobs, skipping notification");
      return false;
    }
    const recipient = this.settings?.email;
    if (!this.settings || !recipient) {
      this.logger.warn("No email configuration found, skipping notification");
      return false;
    }
    const transportSettings = smtpTransportSettings(this.settings);
    if (!transportSettings) {
      this.report(
        new NotificationDeliveryError("SMTP settings incomplete", {
          missing: missingSmtpFields(this.settings),
        }),
      );
      return false;
    }

    const { subject, text } = composeFailureMessage(failed);
    let transport: MailTransport | undefined;
    try {
      transport = this.createTransport(transportSettings);
      await transport.sendMail({
        from: transportSettings.auth.user,
        to: recipient,
        subject,
        text,
      });
      this.logger.info("Notification email sent successfully", {
        failed: failed.length,
      });
      return true;
    } catch (err) {
      this.report(
        new NotificationDeliveryError(
          `Failed to send notification email: ${errorMessage(err)}`,
          { host: transportSettings.host, port: transportSettings.port },
          { cause: err },
        ),
      );
      return false;
    } finally {
      transport?.close();
    }
  }

  private report(err: NotificationDeliveryError): void {
    this.logger.error(err.message, { kind: err.kind, ...err.context });
  }
}

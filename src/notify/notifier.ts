import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import pino from "pino";
import type { NotificationConfig } from "../types/index.js";

/**
 * Delivers one message to a list of addresses.
 * Resolves true when at least one destination accepted it.
 */
export interface Notifier {
  notify(subject: string, body: string, destinations: readonly string[]): Promise<boolean>;
}

export type SmtpSettings = NotificationConfig["smtp"];

/**
 * SMTP notifier. Every call opens its own transport and closes it before
 * returning, so no connection is shared between identifiers.
 */
export class EmailNotifier implements Notifier {
  private logger: pino.Logger;

  constructor(
    private readonly smtp: SmtpSettings,
    logger?: pino.Logger,
  ) {
    this.logger = (logger ?? pino({ level: "info" })).child({
      component: "punchclock.email",
    });
  }

  async notify(subject: string, body: string, destinations: readonly string[]): Promise<boolean> {
    if (destinations.length === 0) {
      this.logger.warn({ subject }, "No destinations for notification");
      return false;
    }

    const transport = this.createTransport();
    let delivered = 0;

    try {
      for (const to of destinations) {
        try {
          await transport.sendMail({
            from: this.smtp.user,
            to,
            subject,
            text: body,
          });
          delivered++;
          this.logger.info({ to, subject }, "Notification sent");
        } catch (err) {
          this.logger.error({ err, to, subject }, "Failed to send notification");
        }
      }
    } finally {
      transport.close();
    }

    return delivered > 0;
  }

  private createTransport(): Transporter {
    const implicitTls = this.smtp.port === 465;
    return nodemailer.createTransport({
      host: this.smtp.host,
      port: this.smtp.port,
      secure: implicitTls,
      requireTLS: !implicitTls,
      auth: {
        user: this.smtp.user,
        pass: this.smtp.password,
      },
    });
  }
}

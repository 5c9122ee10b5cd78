import nodemailer from "nodemailer";
import type { SendMailOptions } from "nodemailer";
import {
  GENERIC_EMAIL,
  KIND_EMAIL,
  kindOf,
  type Notification,
  type TransportKey
} from "@hookrelay/shared";
import type { SmtpConfig } from "../config/env.js";
import { permanent, type Transport } from "./transport.js";

export interface EmailNotification extends Notification {
  emailSubject(): string | undefined;
}

export function isEmailNotification(
  notification: Notification
): notification is EmailNotification {
  return "emailSubject" in notification && typeof notification.emailSubject === "function";
}

/** The parts of a nodemailer transporter the transport calls. */
export type Mailer = {
  sendMail(options: SendMailOptions): Promise<unknown>;
  verify(): Promise<unknown>;
};

export function createMailer(cfg: SmtpConfig): Mailer {
  return nodemailer.createTransport({
    host: cfg.host,
    port: cfg.port,
    secure: cfg.secure,
    auth: cfg.user ? { user: cfg.user, pass: cfg.pass } : undefined
  });
}

/** The generic email when present, else the first namespaced one by key. */
export function recipientEmail(notification: Notification): string | undefined {
  const generic = notification.recipient.get(GENERIC_EMAIL);
  if (generic !== undefined) return generic;
  return notification.recipient
    .toList()
    .find((id) => kindOf(id.namespaceAndKind) === KIND_EMAIL)?.value;
}

export class EmailTransport implements Transport {
  constructor(
    readonly key: TransportKey,
    private readonly mailer: Mailer,
    private readonly from: string
  ) {}

  async push(notification: Notification, signal: AbortSignal): Promise<void> {
    const to = recipientEmail(notification);
    if (to === undefined) {
      throw permanent(new Error("recipient does not have an email address"));
    }
    signal.throwIfAborted();

    const subject =
      (isEmailNotification(notification) ? notification.emailSubject() : undefined) ??
      `Notification: ${notification.context.type}`;
    await this.mailer.sendMail({
      from: this.from,
      to,
      subject,
      text: notification.render(this.key)
    });
  }

  async validate(signal: AbortSignal): Promise<void> {
    signal.throwIfAborted();
    try {
      await this.mailer.verify();
    } catch (err) {
      throw permanent(new Error("SMTP verification failed", { cause: err }));
    }
  }
}

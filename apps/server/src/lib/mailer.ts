import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type { SmtpConfig } from './env.js';
import { describeError, PortalError } from './errors.js';

const SMTP_TIMEOUT_MS = 30_000;

export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

export type OutgoingEmail = {
  to: string;
  subject: string;
  text: string;
  ics: string;
};

export function smtpReady(config: SmtpConfig): boolean {
  return Boolean(config.host && config.user && config.pass && config.from);
}

/**
 * SMTP with STARTTLS (implicit TLS on port 465). One attempt, bounded by
 * connection and socket timeouts.
 */
export function createSmtpTransport(config: SmtpConfig): MailTransport {
  const implicitTls = config.port === 465;
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: implicitTls,
    requireTLS: !implicitTls,
    auth: { user: config.user, pass: config.pass },
    connectionTimeout: SMTP_TIMEOUT_MS,
    greetingTimeout: SMTP_TIMEOUT_MS,
    socketTimeout: SMTP_TIMEOUT_MS,
  });
}

export class Mailer {
  private readonly transport: MailTransport;

  constructor(
    private readonly config: SmtpConfig,
    transport?: MailTransport
  ) {
    this.transport = transport ?? createSmtpTransport(config);
  }

  get configured(): boolean {
    return smtpReady(this.config);
  }

  assertConfigured(): void {
    if (!this.configured) {
      throw new PortalError(
        'SMTP_NOT_CONFIGURED',
        'Email is not configured. Set SMTP_HOST, SMTP_USER, SMTP_PASS and FROM_EMAIL.'
      );
    }
  }

  /**
   * Sends a plain-text message with the calendar invite attached as event.ics
   */
  async send(email: OutgoingEmail): Promise<void> {
    this.assertConfigured();
    try {
      await this.transport.sendMail({
        from: this.config.from,
        to: email.to,
        subject: email.subject,
        text: email.text,
        attachments: [
          {
            filename: 'event.ics',
            content: email.ics,
            contentType: 'text/calendar; charset=utf-8',
          },
        ],
      });
    } catch (e) {
      throw new PortalError('SMTP_SEND_FAILURE', `Email to ${email.to} failed: ${describeError(e)}`, { cause: e });
    }
  }
}

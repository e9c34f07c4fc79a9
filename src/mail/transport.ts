import nodemailer, { type Transporter } from 'nodemailer';
import type { Config, MailMessage } from '../types/index.js';
import { DeliveryError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Hands one message to the mail server. Rejects with a DeliveryError when the
 * message could not be sent.
 */
export interface MailTransport {
  send(message: MailMessage): Promise<void>;
}

export class SmtpMailTransport implements MailTransport {
  private transporter: Transporter;
  private from: string | undefined;

  constructor(smtp: Config['smtp']) {
    this.from = smtp.user;
    this.transporter = nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: smtp.port === 465,
      requireTLS: smtp.port !== 465,
      auth: smtp.user && smtp.password ? { user: smtp.user, pass: smtp.password } : undefined,
    });
  }

  async send(message: MailMessage): Promise<void> {
    try {
      const info = await this.transporter.sendMail({
        from: this.from,
        to: message.to,
        subject: message.subject,
        html: message.html,
        text: message.text,
      });
      logger.debug(`SMTP accepted message ${info.messageId} for ${message.to}`);
    } catch (error) {
      throw new DeliveryError(message.to, error);
    }
  }
}

/**
 * Prints each message instead of sending it. Used for dry runs.
 */
export class PreviewMailTransport implements MailTransport {
  readonly messages: MailMessage[] = [];

  async send(message: MailMessage): Promise<void> {
    this.messages.push(message);
    console.log('─'.repeat(60));
    console.log(`To: ${message.to}`);
    console.log(`Subject: ${message.subject}`);
    console.log('');
    console.log(message.text ?? message.html ?? '');
  }
}

export function createMailTransport(config: Config, options: { dryRun?: boolean } = {}): MailTransport {
  if (options.dryRun) return new PreviewMailTransport();
  return new SmtpMailTransport(config.smtp);
}

import type { Config } from '../types/index.js';
import type { MailTransport } from '../mail/transport.js';
import { describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const ALERT_SUBJECT_PREFIX = '[CRITICAL ALERT]';

export const ALERT_SUBJECTS = {
  'invalid-format': 'INVALID FILE FORMAT',
  'missing-columns': 'MISSING REQUIRED COLUMNS IN ROSTER',
  'file-not-found': 'ROSTER FILE NOT FOUND',
  'parse-failure': 'CRITICAL ERROR READING ROSTER',
  delivery: 'REMINDER DELIVERY FAILURE',
  warnings: 'DATA FORMAT WARNINGS IN ROSTER',
} as const;

/**
 * Something that escalates a problem to a human. Best effort: never throws.
 */
export interface Alerter {
  alert(subject: string, body: string): Promise<void>;
}

export class AdminAlerter implements Alerter {
  constructor(
    private readonly config: Pick<Config, 'smtp' | 'alerts'>,
    private readonly transport: MailTransport
  ) {}

  get isConfigured(): boolean {
    const { smtp, alerts } = this.config;
    return Boolean(alerts.adminEmail && smtp.user && smtp.password);
  }

  async alert(subject: string, body: string): Promise<void> {
    const adminEmail = this.config.alerts.adminEmail;
    if (!adminEmail || !this.isConfigured) {
      logger.warn(`Admin alert "${subject}" not sent: ADMIN_EMAIL or sender credentials are not configured`);
      return;
    }

    try {
      await this.transport.send({
        to: adminEmail,
        subject: `${ALERT_SUBJECT_PREFIX} ${subject}`,
        text: body,
      });
      logger.info(`Admin alert sent to ${adminEmail}: ${subject}`);
    } catch (error) {
      // Never escalated further: there is nowhere left to report it
      logger.error(`Could not send admin alert "${subject}": ${describeError(error)}`);
    }
  }
}

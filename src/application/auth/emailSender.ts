import type { Logger } from '../../infra/logger.js';

/**
 * Outbound email port. Delivery itself (SMTP, provider API) lives outside this service.
 */
export interface EmailSender {
  sendVerification(email: string, username: string, link: string): Promise<void>;
  sendPasswordReset(email: string, link: string): Promise<void>;
}

/**
 * Development sender: writes the message to the log instead of mailing it.
 */
export class LogEmailSender implements EmailSender {
  constructor(private readonly logger: Logger) {}

  async sendVerification(email: string, username: string, link: string): Promise<void> {
    this.logger.info({ to: email, username, link }, 'Confirm your email');
  }

  async sendPasswordReset(email: string, link: string): Promise<void> {
    this.logger.info({ to: email, link }, 'Reset your password');
  }
}

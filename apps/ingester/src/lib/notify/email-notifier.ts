/**
 * Nodemailer Email Notifier
 * Sends diversion notices over SMTP
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type { SmtpConfig } from '../config';
import type { Notifier } from '../ingest/types';
import { logError, logInfo } from '../observability/logger';

export interface SendResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

export class EmailNotifier implements Notifier {
  private transporter: Transporter | null = null;

  constructor(private readonly smtp: SmtpConfig) {}

  private getTransporter(): Transporter {
    if (this.transporter) {
      return this.transporter;
    }

    const { host, port, secure, user, password } = this.smtp;
    this.transporter = nodemailer.createTransport({
      host,
      port,
      secure,
      auth: user ? { user, pass: password } : undefined,
    });

    logInfo('Email transporter initialized', { host, port });
    return this.transporter;
  }

  async notify(title: string, body: string, tag: string): Promise<void> {
    await this.send(title, body, tag);
  }

  /**
   * Send one notification; failures are logged and returned, never thrown
   */
  async send(title: string, body: string, tag: string): Promise<SendResult> {
    try {
      const info = await this.getTransporter().sendMail({
        from: this.smtp.from,
        to: this.smtp.to,
        subject: title,
        text: `${body}\n\nSite: ${tag}`,
      });

      logInfo('Notification email sent', { messageId: info.messageId, site: tag });
      return { success: true, messageId: info.messageId };
    } catch (error) {
      logError('Failed to send notification email', error, { subject: title, site: tag });
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /**
   * Check the SMTP connection and credentials
   */
  async verify(): Promise<boolean> {
    try {
      await this.getTransporter().verify();
      logInfo('Email configuration verified');
      return true;
    } catch (error) {
      logError('Email configuration verification failed', error);
      return false;
    }
  }
}

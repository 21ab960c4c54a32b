import { Injectable, Logger } from '@nestjs/common';
import type * as React from 'react';
import { Resend } from 'resend';
import { envString } from '../config/env';

export type EmailMessage = {
  to: string;
  subject: string;
  react: React.ReactElement;
  text: string;
};

@Injectable()
export class EmailService {
  private readonly logger = new Logger(EmailService.name);
  private readonly resend: Resend | null;
  private readonly from: string;
  private readonly replyTo?: string;

  constructor() {
    const apiKey = envString('RESEND_API_KEY', '');
    this.resend = apiKey ? new Resend(apiKey) : null;

    const fromEmail = envString('RESEND_FROM_EMAIL', '');
    const fromName = envString('RESEND_FROM_NAME', '');
    this.from =
      fromName && fromEmail
        ? `${fromName} <${fromEmail}>`
        : fromEmail || 'Freight Matching <noreply@localhost>';

    const replyTo = envString('RESEND_REPLY_TO', '');
    this.replyTo = replyTo || undefined;
  }

  /** Never throws; a failed send is logged and reported as `false`. */
  async send(message: EmailMessage): Promise<boolean> {
    if (!this.resend) {
      this.logger.warn('RESEND_API_KEY not set; skipping email send.');
      return false;
    }

    try {
      const { error } = await this.resend.emails.send({
        from: this.from,
        to: message.to,
        subject: message.subject,
        react: message.react,
        text: message.text,
        ...(this.replyTo ? { reply_to: this.replyTo } : {}),
      });

      if (error) {
        this.logger.error(
          `Resend rejected "${message.subject}" to ${message.to}: ${error.message}`,
        );
        return false;
      }
      return true;
    } catch (err) {
      this.logger.error(
        `Failed to send "${message.subject}" to ${message.to} via Resend.`,
        err instanceof Error ? err.stack : String(err),
      );
      return false;
    }
  }
}

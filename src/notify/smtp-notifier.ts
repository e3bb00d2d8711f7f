/**
 * SMTP delivery through nodemailer. One transport is created per notifier and
 * reused for every message.
 */

import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import { DeliveryError, toError } from '../core/errors.js';
import type { Notifier, SmtpNotifierConfig } from './types.js';

export class SmtpNotifier implements Notifier {
  readonly channel = 'smtp';
  private readonly transport: Transporter;

  constructor(
    private readonly config: SmtpNotifierConfig,
    transport?: Transporter,
  ) {
    this.transport =
      transport ??
      nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: config.secure,
        auth: config.user ? { user: config.user, pass: config.password ?? '' } : undefined,
      });
  }

  /** Resolve a user identity to an email address */
  addressFor(recipient: string): string {
    return recipient.includes('@') ? recipient : `${recipient}@${this.config.recipientDomain}`;
  }

  async send(recipient: string, subject: string, body: string): Promise<void> {
    const to = this.addressFor(recipient);
    try {
      await this.transport.sendMail({ from: this.config.from, to, subject, text: body });
    } catch (err) {
      throw new DeliveryError(`SMTP delivery to ${to} failed: ${toError(err).message}`, this.channel, toError(err));
    }
  }
}

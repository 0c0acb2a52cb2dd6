import { Resend } from 'resend';
import { SendError } from '../errors';
import { createLogger } from '../logger';

const log = createLogger('Mailer');

export interface MailSender {
  /** Rejects with `SendError` when the message could not be handed off. */
  send(fromAddress: string, toAddress: string, subject: string, htmlBody: string): Promise<void>;
}

export class ResendMailSender implements MailSender {
  private client: Resend | null = null;

  constructor(private readonly apiKey: string | null) {}

  async send(fromAddress: string, toAddress: string, subject: string, htmlBody: string): Promise<void> {
    if (!this.apiKey) {
      throw new SendError('RESEND_API_KEY is not set');
    }
    if (!this.client) {
      this.client = new Resend(this.apiKey);
    }

    let error: { message: string } | null;
    try {
      ({ error } = await this.client.emails.send({
        from: fromAddress,
        to: toAddress,
        subject,
        html: htmlBody,
      }));
    } catch (err) {
      throw new SendError(`Failed to send email to ${toAddress}`, err);
    }

    if (error) {
      throw new SendError(`Failed to send email to ${toAddress}: ${error.message}`);
    }
    log.info(`Email sent to ${toAddress}: ${subject}`);
  }
}

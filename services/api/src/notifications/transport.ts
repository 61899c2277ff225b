import nodemailer, { type Transporter } from 'nodemailer';
import type { MailConfig } from '../config/index.js';
import type { AppLogger } from '../logger.js';

export interface EmailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

export interface EmailTransport {
  readonly name: string;
  send(message: EmailMessage): Promise<void>;
}

export class SmtpEmailTransport implements EmailTransport {
  readonly name = 'smtp';
  private readonly transporter: Transporter;

  constructor(config: Extract<MailConfig, { transport: 'smtp' }>) {
    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure,
      ...(config.user ? { auth: { user: config.user, pass: config.password } } : {}),
    });
  }

  async send(message: EmailMessage): Promise<void> {
    await this.transporter.sendMail(message);
  }
}

/**
 * Writes messages to the log instead of sending them. Used for local runs.
 */
export class LogEmailTransport implements EmailTransport {
  readonly name = 'log';

  constructor(private readonly logger: AppLogger) {}

  async send(message: EmailMessage): Promise<void> {
    this.logger.info(
      { to: message.to, subject: message.subject, body: message.text },
      'Email (log transport)'
    );
  }
}

export function createEmailTransport(config: MailConfig, logger: AppLogger): EmailTransport {
  switch (config.transport) {
    case 'smtp':
      return new SmtpEmailTransport(config);
    case 'log':
      return new LogEmailTransport(logger);
  }
}

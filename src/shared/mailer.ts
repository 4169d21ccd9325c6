/**
 * Run log delivery over SMTP
 */

import fs from 'fs-extra';
import path from 'path';
import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import { MailError, errorMessage } from './errors.js';
import { logger as rootLogger, type Logger } from './logger.js';

export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
}

export interface LogSender {
  send(recipient: string, subject: string, body: string, artifactPath: string): Promise<boolean>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  username: string;
  password: string;
}

export interface LogDispatcherOptions {
  transport: MailTransport;
  from: string;
  policy?: RetryPolicy;
  logger?: Logger;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxAttempts: 3, delayMs: 5000 };

/**
 * SMTP transport with STARTTLS and login, or implicit TLS on port 465
 */
export function createSmtpTransport(settings: SmtpSettings): MailTransport {
  return nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.port === 465,
    requireTLS: settings.port !== 465,
    auth: { user: settings.username, pass: settings.password }
  });
}

export class LogDispatcher implements LogSender {
  private transport: MailTransport;
  private from: string;
  private policy: RetryPolicy;
  private logger: Logger;

  constructor(options: LogDispatcherOptions) {
    const policy = options.policy ?? DEFAULT_RETRY_POLICY;
    if (policy.maxAttempts < 1) {
      throw new Error(`maxAttempts must be at least 1, got ${policy.maxAttempts}`);
    }
    this.policy = policy;
    this.transport = options.transport;
    this.from = options.from;
    this.logger = options.logger ?? rootLogger;
  }

  /**
   * Mail a log artifact as an attachment
   * @returns true once a send succeeds; false when the artifact is unreadable
   *   or every attempt failed
   */
  async send(recipient: string, subject: string, body: string, artifactPath: string): Promise<boolean> {
    let content: Buffer;
    try {
      content = await fs.readFile(artifactPath);
    } catch (error) {
      this.logger.error({ err: error, artifactPath }, 'Failed to read log attachment, not sending');
      return false;
    }

    const message: SendMailOptions = {
      from: this.from,
      to: recipient,
      subject,
      text: body,
      attachments: [{ filename: path.basename(artifactPath), content }]
    };

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
      try {
        await this.transport.sendMail(message);
        this.logger.info({ recipient, subject, attempt }, 'Log mail sent');
        return true;
      } catch (error) {
        const failure = new MailError(
          `Attempt ${attempt}/${this.policy.maxAttempts} to mail ${subject} failed: ${errorMessage(error)}`,
          { cause: error }
        );
        this.logger.warn({ err: failure }, failure.message);

        if (attempt < this.policy.maxAttempts) {
          await new Promise(resolve => setTimeout(resolve, this.policy.delayMs));
        }
      }
    }

    this.logger.error({ recipient, subject, attempts: this.policy.maxAttempts }, 'Giving up on log mail');
    return false;
  }
}

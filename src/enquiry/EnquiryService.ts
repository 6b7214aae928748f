/**
 * Purpose: Turn an enquiry form submission into mail to the sales inbox(es)
 *
 * Key behaviors:
 * - Honeypot hits are answered as success and dropped
 * - Timing and field errors come back together, nothing is sent
 * - One independent SMTP session per recipient, in order; every recipient
 *   is attempted even after a failure
 * - The enquirer's address is the Reply-To of every copy
 */

import { getLogger, registerComponent } from '../logging/index.js';
import type { EnquirySettings } from '../config/MailerConfig.js';
import type { SmtpClientProperties } from '../connectors/smtp/SmtpClientProperties.js';
import type { SmtpFailure } from '../connectors/smtp/SmtpError.js';
import { MailSendFunction, sendMail } from '../connectors/smtp/SmtpSender.js';
import { Enquiry, readEnquirySubmission, validateEnquiry } from './EnquiryForm.js';
import { checkSubmission } from './EnquiryGuard.js';

registerComponent('enquiry', 'Enquiry form handling');
const logger = getLogger('enquiry');

export interface RecipientFailure {
  recipient: string;
  failure: SmtpFailure;
}

export type EnquiryOutcome =
  | { status: 'sent'; delivered: string[] }
  | { status: 'discarded' }
  | { status: 'rejected'; errors: string[] }
  | { status: 'failed'; errors: string[]; failures: RecipientFailure[] };

export interface EnquiryServiceConfig {
  settings: EnquirySettings;
  smtp: SmtpClientProperties;
  /** Defaults to sendMail */
  send?: MailSendFunction;
  clock?: () => Date;
}

/**
 * Plain-text body with CRLF line endings, e.g.
 *
 *   New enterprise enquiry from example.org
 *   =======================================
 *
 *   Name:    Ada
 *   ...
 */
export function composeEnquiryBody(enquiry: Enquiry, siteName: string): string {
  const title = `New enterprise enquiry from ${siteName}`;
  const lines = [
    title,
    '='.repeat(title.length),
    '',
    `Name:    ${enquiry.name}`,
    `Email:   ${enquiry.email}`,
    `Company: ${enquiry.company}`,
    `Phone:   ${enquiry.phone || 'Not provided'}`,
    `Plan:    ${enquiry.plan || 'Not specified'}`,
    '',
    'Message:',
    '--------',
    enquiry.message,
  ];
  return lines.join('\r\n') + '\r\n';
}

export class EnquiryService {
  private readonly settings: EnquirySettings;
  private readonly smtp: SmtpClientProperties;
  private readonly send: MailSendFunction;
  private readonly clock: () => Date;

  constructor(config: EnquiryServiceConfig) {
    this.settings = config.settings;
    this.smtp = config.smtp;
    this.send = config.send ?? ((message, props) => sendMail(message, props));
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Message shown to the visitor when delivery fails
   */
  getUnavailableMessage(): string {
    return `Unable to send your message right now. Please email ${this.settings.fallbackAddress} directly.`;
  }

  async submit(input: unknown): Promise<EnquiryOutcome> {
    const submission = readEnquirySubmission(input);

    const verdict = checkSubmission(submission, {
      minFillSeconds: this.settings.minFillSeconds,
      now: this.clock(),
    });
    if (verdict.bot) {
      logger.info('Honeypot field filled; enquiry discarded');
      return { status: 'discarded' };
    }

    const { enquiry, errors } = validateEnquiry(submission);
    const allErrors = [...verdict.errors, ...errors];
    if (allErrors.length > 0) {
      logger.debug('Enquiry rejected', { errors: allErrors.length });
      return { status: 'rejected', errors: allErrors };
    }

    return this.deliver(enquiry);
  }

  private async deliver(enquiry: Enquiry): Promise<EnquiryOutcome> {
    const body = composeEnquiryBody(enquiry, this.settings.siteName);
    const delivered: string[] = [];
    const failures: RecipientFailure[] = [];

    for (const recipient of this.settings.recipients) {
      const result = await this.send(
        { to: recipient, subject: this.settings.subject, body, replyTo: enquiry.email },
        this.smtp
      );
      if (result.ok) {
        delivered.push(recipient);
      } else {
        failures.push({ recipient, failure: result.failure });
        logger.error(`Enquiry not delivered to ${recipient}: ${result.failure.message}`, undefined, {
          kind: result.failure.kind,
        });
      }
    }

    if (failures.length > 0) {
      return { status: 'failed', errors: [this.getUnavailableMessage()], failures };
    }

    logger.info(`Enquiry from ${enquiry.company} delivered`, { recipients: delivered.length });
    return { status: 'sent', delivered };
  }
}

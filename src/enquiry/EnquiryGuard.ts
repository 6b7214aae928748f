/**
 * Anti-spam checks that run before validation: the honeypot field and the
 * minimum time between rendering the form and submitting it. Rate limiting
 * lives in the HTTP layer (see EnquiryServlet).
 */

import type { EnquirySubmission } from './EnquiryForm.js';

export const TOO_QUICK_ERROR = 'Form submitted too quickly. Please wait a moment and try again.';

export interface GuardVerdict {
  /** Honeypot filled in: answer as if sent, send nothing */
  bot: boolean;
  errors: string[];
}

export interface GuardOptions {
  minFillSeconds: number;
  now: Date;
}

export function checkSubmission(submission: EnquirySubmission, options: GuardOptions): GuardVerdict {
  if (submission.website !== '') {
    return { bot: true, errors: [] };
  }

  const errors: string[] = [];
  const nowSeconds = Math.floor(options.now.getTime() / 1000);
  if (submission.renderedAt > 0 && nowSeconds - submission.renderedAt < options.minFillSeconds) {
    errors.push(TOO_QUICK_ERROR);
  }

  return { bot: false, errors };
}

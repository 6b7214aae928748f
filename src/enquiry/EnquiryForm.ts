/**
 * Enquiry form fields, normalization and validation.
 *
 * Submissions arrive as loosely typed form or JSON bodies. Every field is
 * coerced to a trimmed string (missing or non-string values become ''),
 * then checked in a fixed order so the error list reads top to bottom like
 * the form.
 */

import { z } from 'zod';

export const ENQUIRY_PLANS = ['Basic', 'Standard', 'Premium', 'Not Sure'] as const;

export type EnquiryPlan = (typeof ENQUIRY_PLANS)[number];

export const MESSAGE_MIN_LENGTH = 10;
export const MESSAGE_MAX_LENGTH = 5000;

/**
 * A validated enquiry, ready to be mailed
 */
export interface Enquiry {
  name: string;
  email: string;
  company: string;
  phone: string;
  plan: EnquiryPlan | '';
  message: string;
}

/**
 * Everything the form posts, anti-spam fields included
 */
export interface EnquirySubmission extends Omit<Enquiry, 'plan'> {
  plan: string;
  /** Honeypot; real visitors never see it, so it must stay empty */
  website: string;
  /** Unix seconds when the form was rendered; 0 when absent */
  renderedAt: number;
}

const textField = z
  .unknown()
  .transform((value) => (typeof value === 'string' ? value.trim() : ''));

const timestampField = z.unknown().transform((value) => {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
  return Number.isFinite(parsed) ? Math.trunc(parsed) : 0;
});

const submissionSchema = z.object({
  name: textField,
  email: textField,
  company: textField,
  phone: textField,
  plan: textField,
  message: textField,
  website: textField,
  renderedAt: timestampField,
  _ts: timestampField,
});

const emailSchema = z.string().email();

function isPlan(value: string): value is EnquiryPlan {
  return ENQUIRY_PLANS.some((plan) => plan === value);
}

/**
 * Coerce a request body into a submission. `_ts` is accepted as an alias
 * of `renderedAt`.
 */
export function readEnquirySubmission(input: unknown): EnquirySubmission {
  // Arrays and scalars carry no named fields
  const source = typeof input === 'object' && input !== null && !Array.isArray(input) ? input : {};
  const fields = submissionSchema.parse(source);

  return {
    name: fields.name,
    email: fields.email,
    company: fields.company,
    phone: fields.phone,
    plan: fields.plan,
    message: fields.message,
    website: fields.website,
    renderedAt: fields.renderedAt || fields._ts,
  };
}

/**
 * Unknown plans are dropped rather than rejected.
 */
export function normalizePlan(plan: string): EnquiryPlan | '' {
  return isPlan(plan) ? plan : '';
}

export function validateEnquiry(submission: EnquirySubmission): { enquiry: Enquiry; errors: string[] } {
  const errors: string[] = [];

  if (submission.name === '') errors.push('Name is required.');

  if (submission.email === '') {
    errors.push('Email is required.');
  } else if (!emailSchema.safeParse(submission.email).success) {
    errors.push('Please enter a valid email address.');
  }

  if (submission.company === '') errors.push('Company name is required.');

  const messageLength = [...submission.message].length;
  if (submission.message === '') {
    errors.push('Message is required.');
  } else if (messageLength < MESSAGE_MIN_LENGTH) {
    errors.push(`Message must be at least ${MESSAGE_MIN_LENGTH} characters.`);
  } else if (messageLength > MESSAGE_MAX_LENGTH) {
    errors.push(`Message must be under ${MESSAGE_MAX_LENGTH} characters.`);
  }

  return {
    enquiry: {
      name: submission.name,
      email: submission.email,
      company: submission.company,
      phone: submission.phone,
      plan: normalizePlan(submission.plan),
      message: submission.message,
    },
    errors,
  };
}

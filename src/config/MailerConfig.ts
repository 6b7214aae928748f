/**
 * Mailer Configuration
 *
 * Relay credentials, sender identity, enquiry routing and HTTP settings, all
 * read from environment variables (entry points load .env first through
 * dotenv). Validated with zod, cached after the first load, with a reset
 * for tests.
 */

import { z } from 'zod';
import {
  SmtpClientProperties,
  createSmtpClientProperties,
} from '../connectors/smtp/SmtpClientProperties.js';

export interface EnquirySettings {
  recipients: string[];
  subject: string;
  siteName: string;
  fallbackAddress: string;
  minFillSeconds: number;
  rateLimit: number;
  rateWindowMinutes: number;
}

export interface ServerSettings {
  host: string;
  port: number;
}

export interface MailerConfig {
  smtp: SmtpClientProperties;
  enquiry: EnquirySettings;
  server: ServerSettings;
}

export class MailerConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid mailer configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'MailerConfigError';
  }
}

const emailAddress = z.string().trim().email();

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? fallback : Number(v)))
    .pipe(z.number().int().positive());

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? fallback : !/^(false|0|no|off)$/i.test(v.trim())));

const recipientList = z
  .string({ required_error: 'is required' })
  .transform((v) =>
    v
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  )
  .pipe(z.array(emailAddress).min(1, 'needs at least one address'));

const smtpEnvSchema = z.object({
  SMTP_HOST: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  SMTP_PORT: positiveInt(587).pipe(z.number().max(65535)),
  SMTP_USERNAME: z.string({ required_error: 'is required' }).min(1, 'is required'),
  SMTP_PASSWORD: z.string({ required_error: 'is required' }).min(1, 'is required'),
  SMTP_FROM: optionalString.pipe(emailAddress.optional()),
  SMTP_FROM_NAME: optionalString,
  SMTP_EHLO_DOMAIN: optionalString,
  SMTP_CONNECT_TIMEOUT: positiveInt(10000),
  SMTP_READ_TIMEOUT: positiveInt(10000),
  SMTP_TLS_REJECT_UNAUTHORIZED: booleanFlag(true),
  SMTP_TLS_CA_FILE: optionalString,
});

const envSchema = smtpEnvSchema.extend({
  ENQUIRY_RECIPIENTS: recipientList,
  ENQUIRY_SUBJECT: optionalString,
  ENQUIRY_SITE_NAME: optionalString,
  ENQUIRY_FALLBACK_ADDRESS: optionalString.pipe(emailAddress.optional()),
  ENQUIRY_MIN_FILL_SECONDS: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? 3 : Number(v)))
    .pipe(z.number().int().nonnegative()),
  ENQUIRY_RATE_LIMIT: positiveInt(3),
  ENQUIRY_RATE_WINDOW_MINUTES: positiveInt(10),
  HOST: optionalString,
  PORT: positiveInt(8080).pipe(z.number().max(65535)),
});

function domainOf(address: string): string | undefined {
  const at = address.lastIndexOf('@');
  return at > 0 ? address.substring(at + 1) : undefined;
}

function toIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

function buildSmtpProperties(vars: z.infer<typeof smtpEnvSchema>): SmtpClientProperties {
  const from = vars.SMTP_FROM ?? vars.SMTP_USERNAME;
  const ehloDomain = vars.SMTP_EHLO_DOMAIN ?? domainOf(from) ?? 'localhost';

  return createSmtpClientProperties({
    host: vars.SMTP_HOST,
    port: vars.SMTP_PORT,
    username: vars.SMTP_USERNAME,
    password: vars.SMTP_PASSWORD,
    from,
    fromName: vars.SMTP_FROM_NAME ?? '',
    ehloDomain,
    messageIdDomain: domainOf(from) ?? ehloDomain,
    connectTimeout: vars.SMTP_CONNECT_TIMEOUT,
    readTimeout: vars.SMTP_READ_TIMEOUT,
    tls: {
      rejectUnauthorized: vars.SMTP_TLS_REJECT_UNAUTHORIZED,
      ca: vars.SMTP_TLS_CA_FILE,
    },
  });
}

/**
 * Relay settings only (SMTP_* variables), for tools that send without
 * serving enquiries. Throws MailerConfigError naming every invalid variable.
 */
export function parseSmtpConfig(env: NodeJS.ProcessEnv): SmtpClientProperties {
  const parsed = smtpEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new MailerConfigError(toIssues(parsed.error));
  }
  return buildSmtpProperties(parsed.data);
}

/**
 * Build the configuration from an environment map. Throws MailerConfigError
 * naming every invalid variable.
 */
export function parseMailerConfig(env: NodeJS.ProcessEnv): MailerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new MailerConfigError(toIssues(parsed.error));
  }

  const vars = parsed.data;
  const smtp = buildSmtpProperties(vars);
  const from = smtp.from;

  return {
    smtp,
    enquiry: {
      recipients: vars.ENQUIRY_RECIPIENTS,
      subject: vars.ENQUIRY_SUBJECT ?? 'Enterprise Enquiry',
      siteName: vars.ENQUIRY_SITE_NAME ?? 'localhost',
      fallbackAddress: vars.ENQUIRY_FALLBACK_ADDRESS ?? from,
      minFillSeconds: vars.ENQUIRY_MIN_FILL_SECONDS,
      rateLimit: vars.ENQUIRY_RATE_LIMIT,
      rateWindowMinutes: vars.ENQUIRY_RATE_WINDOW_MINUTES,
    },
    server: {
      host: vars.HOST ?? '0.0.0.0',
      port: vars.PORT,
    },
  };
}

let cachedConfig: MailerConfig | null = null;
let cachedSmtpConfig: SmtpClientProperties | null = null;

/**
 * Get the configuration for the current process environment.
 * Cached after the first successful call; use resetMailerConfig() in tests.
 */
export function getMailerConfig(): MailerConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = parseMailerConfig(process.env);
  return cachedConfig;
}

/**
 * Relay settings for the current process environment, cached like
 * getMailerConfig().
 */
export function getSmtpConfig(): SmtpClientProperties {
  if (cachedSmtpConfig) return cachedSmtpConfig;
  cachedSmtpConfig = parseSmtpConfig(process.env);
  return cachedSmtpConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetMailerConfig(): void {
  cachedConfig = null;
  cachedSmtpConfig = null;
}

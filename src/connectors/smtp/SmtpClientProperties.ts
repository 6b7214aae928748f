/**
 * Purpose: Connection, identity and timeout settings for one SMTP session
 *
 * Key behaviors:
 * - Supplied by the caller on every send (from MailerConfig), never baked in
 * - Relay reached in plaintext on the submission port, then upgraded via STARTTLS
 * - TLS negotiated between TLSv1.2 and TLSv1.3 only
 * - Deadlines on connect and on every reply read
 */

import type { SecureVersion } from 'tls';

export const TLS_MIN_VERSION: SecureVersion = 'TLSv1.2';
export const TLS_MAX_VERSION: SecureVersion = 'TLSv1.3';

/**
 * TLS settings applied to the STARTTLS upgrade
 */
export interface SmtpTlsProperties {
  /** Verify the relay certificate chain and host name (default: true) */
  rejectUnauthorized: boolean;

  /** SNI / certificate host name; defaults to the relay host unless that is an IP address */
  servername?: string;

  /** Path to an extra PEM trust anchor */
  ca?: string;
}

/**
 * SMTP Client Properties
 */
export interface SmtpClientProperties {
  /** Relay hostname */
  host: string;

  /** Relay port (submission: 587) */
  port: number;

  /** AUTH LOGIN username */
  username: string;

  /** AUTH LOGIN password */
  password: string;

  /** Envelope sender and From address */
  from: string;

  /** Display name for the From header; omitted when empty */
  fromName: string;

  /** Domain announced in EHLO */
  ehloDomain: string;

  /** Right-hand side of generated Message-IDs; falls back to ehloDomain */
  messageIdDomain: string;

  /** TCP connect deadline in milliseconds */
  connectTimeout: number;

  /** Deadline for each reply read and for the TLS handshake, in milliseconds */
  readTimeout: number;

  tls: SmtpTlsProperties;
}

/**
 * Get default SMTP client properties
 */
export function getDefaultSmtpClientProperties(): SmtpClientProperties {
  return {
    host: 'localhost',
    port: 587,
    username: '',
    password: '',
    from: '',
    fromName: '',
    ehloDomain: 'localhost',
    messageIdDomain: '',
    connectTimeout: 10000,
    readTimeout: 10000,
    tls: {
      rejectUnauthorized: true,
    },
  };
}

/**
 * Merge partial properties over the defaults. The nested tls block is merged
 * field by field.
 */
export function createSmtpClientProperties(
  overrides: Partial<Omit<SmtpClientProperties, 'tls'>> & { tls?: Partial<SmtpTlsProperties> } = {}
): SmtpClientProperties {
  const defaults = getDefaultSmtpClientProperties();
  return {
    ...defaults,
    ...overrides,
    tls: { ...defaults.tls, ...overrides.tls },
  };
}

/**
 * Domain used for Message-ID generation
 */
export function getMessageIdDomain(props: SmtpClientProperties): string {
  return props.messageIdDomain || props.ehloDomain;
}

function hasLineBreak(value: string): boolean {
  return /[\r\n]/.test(value);
}

/**
 * Validate SMTP client properties.
 * Returns a list of problems; empty when the properties are usable.
 */
export function validateSmtpClientProperties(props: SmtpClientProperties): string[] {
  const errors: string[] = [];

  if (!props.host || props.host.trim() === '') {
    errors.push('SMTP host is required');
  }

  if (!Number.isInteger(props.port) || props.port < 1 || props.port > 65535) {
    errors.push(`SMTP port must be between 1 and 65535 (got ${props.port})`);
  }

  if (!(props.connectTimeout > 0)) {
    errors.push('Connect timeout must be greater than zero');
  }

  if (!(props.readTimeout > 0)) {
    errors.push('Read timeout must be greater than zero');
  }

  if (!props.username) {
    errors.push('SMTP username is required');
  }

  if (!props.password) {
    errors.push('SMTP password is required');
  }

  if (!props.from || props.from.trim() === '') {
    errors.push('Sender address is required');
  }

  const identityFields: Array<[string, string]> = [
    ['host', props.host],
    ['username', props.username],
    ['from', props.from],
    ['fromName', props.fromName],
    ['ehloDomain', props.ehloDomain],
    ['messageIdDomain', props.messageIdDomain],
  ];
  for (const [name, value] of identityFields) {
    if (hasLineBreak(value)) {
      errors.push(`${name} must not contain line breaks`);
    }
  }

  return errors;
}

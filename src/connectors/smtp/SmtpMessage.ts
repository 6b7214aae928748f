/**
 * Outbound message model and RFC 5322 serialization for the DATA phase.
 *
 * The message is plain text, UTF-8, sent 8bit. The subject always goes out
 * as a base64 encoded-word; the body has its line endings normalized to
 * CRLF and is dot-stuffed before the end-of-data marker is appended.
 */

import { format } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import { SmtpClientProperties, getMessageIdDomain } from './SmtpClientProperties.js';

export const END_OF_DATA = '\r\n.\r\n';

/**
 * One email, as handed to sendMail(). Built per call, never stored.
 */
export interface OutboundMessage {
  to: string;
  subject: string;
  body: string;
  replyTo: string;
}

export interface ComposedMessage {
  messageId: string;
  /** Header block, ending with the blank separator line */
  headers: string;
  /** Headers + stuffed body + END_OF_DATA */
  payload: string;
}

export interface ComposeOptions {
  date?: Date;
  messageId?: string;
}

/**
 * RFC 2822 date in local time, e.g. "Thu, 21 Dec 2000 16:01:07 +0200".
 */
export function formatRfc2822Date(date: Date): string {
  return format(date, 'EEE, dd MMM yyyy HH:mm:ss xx');
}

export function generateMessageId(domain: string): string {
  return `<${uuidv4()}@${domain}>`;
}

/**
 * MIME encoded-word, base64 ("B") flavour: =?UTF-8?B?...?=
 */
export function encodeHeaderWord(text: string): string {
  return `=?UTF-8?B?${Buffer.from(text, 'utf8').toString('base64')}?=`;
}

/**
 * Decode a single UTF-8 "B" encoded-word. Returns null for anything else.
 */
export function decodeHeaderWord(word: string): string | null {
  const match = /^=\?UTF-8\?B\?([A-Za-z0-9+/=]*)\?=$/i.exec(word.trim());
  if (!match) {
    return null;
  }
  return Buffer.from(match[1] ?? '', 'base64').toString('utf8');
}

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n|\r|\n/g, '\r\n');
}

/**
 * SMTP transparency: every line that begins with "." gets one more.
 * Line endings are normalized to CRLF first.
 */
export function dotStuff(body: string): string {
  return normalizeLineEndings(body)
    .split('\r\n')
    .map((line) => (line.startsWith('.') ? `.${line}` : line))
    .join('\r\n');
}

/**
 * Inverse of dotStuff(): drop the first "." of every line that starts with one.
 */
export function dotUnstuff(data: string): string {
  return data
    .split('\r\n')
    .map((line) => (line.startsWith('.') ? line.substring(1) : line))
    .join('\r\n');
}

function isPrintableAscii(text: string): boolean {
  return /^[\x20-\x7e]*$/.test(text);
}

export function formatFromHeader(props: SmtpClientProperties): string {
  if (!props.fromName) {
    return props.from;
  }
  const name = isPrintableAscii(props.fromName) ? props.fromName : encodeHeaderWord(props.fromName);
  return `${name} <${props.from}>`;
}

/**
 * Problems that would make the message unsafe or impossible to send.
 * Addresses end up inside SMTP commands and headers, so line breaks and
 * angle brackets are refused.
 */
export function validateOutboundMessage(message: OutboundMessage): string[] {
  const errors: string[] = [];

  const addresses: Array<[string, string]> = [
    ['recipient', message.to],
    ['reply-to', message.replyTo],
  ];
  for (const [label, value] of addresses) {
    if (!value || value.trim() === '') {
      errors.push(`${label} address is required`);
    } else if (/[\r\n<>]/.test(value)) {
      errors.push(`${label} address contains forbidden characters`);
    }
  }

  if (/[\r\n]/.test(message.subject)) {
    errors.push('subject must not contain line breaks');
  }

  return errors;
}

export function buildMessageHeaders(
  message: OutboundMessage,
  props: SmtpClientProperties,
  meta: { date: Date; messageId: string }
): string {
  const headers = [
    `Date: ${formatRfc2822Date(meta.date)}`,
    `From: ${formatFromHeader(props)}`,
    `Reply-To: ${message.replyTo}`,
    `To: ${message.to}`,
    `Subject: ${encodeHeaderWord(message.subject)}`,
    `Message-ID: ${meta.messageId}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset=UTF-8',
    'Content-Transfer-Encoding: 8bit',
  ];
  return headers.join('\r\n') + '\r\n\r\n';
}

/**
 * Serialize a message into the bytes sent after DATA.
 */
export function composeMessage(
  message: OutboundMessage,
  props: SmtpClientProperties,
  options: ComposeOptions = {}
): ComposedMessage {
  const messageId = options.messageId ?? generateMessageId(getMessageIdDomain(props));
  const headers = buildMessageHeaders(message, props, {
    date: options.date ?? new Date(),
    messageId,
  });

  return {
    messageId,
    headers,
    payload: headers + dotStuff(message.body) + END_OF_DATA,
  };
}

/**
 * SMTP Connector Module
 *
 * Raw-socket SMTP client: STARTTLS, AUTH LOGIN, one plain-text message per session.
 */

export { sendMail, verifyRelay } from './SmtpSender.js';
export type {
  SmtpSendResult,
  SmtpVerifyResult,
  SmtpSendOptions,
  MailSendFunction,
} from './SmtpSender.js';
export type { SmtpClientProperties, SmtpTlsProperties } from './SmtpClientProperties.js';
export {
  getDefaultSmtpClientProperties,
  createSmtpClientProperties,
  validateSmtpClientProperties,
  TLS_MIN_VERSION,
  TLS_MAX_VERSION,
} from './SmtpClientProperties.js';
export { SmtpConnection, openSocket, tlsServerName } from './SmtpConnection.js';
export type { SmtpChannel, SmtpConnectionFactory } from './SmtpConnection.js';
export { SmtpSendError, toSmtpFailure } from './SmtpError.js';
export type { SmtpFailure, SmtpFailureKind } from './SmtpError.js';
export type { OutboundMessage, ComposedMessage } from './SmtpMessage.js';
export {
  composeMessage,
  dotStuff,
  dotUnstuff,
  encodeHeaderWord,
  decodeHeaderWord,
  formatRfc2822Date,
  generateMessageId,
  normalizeLineEndings,
  validateOutboundMessage,
  END_OF_DATA,
} from './SmtpMessage.js';
export type { SmtpReply } from './SmtpReply.js';
export {
  buildReply,
  isFinalReplyLine,
  parseEhloCapabilities,
  hasCapability,
  getAuthMechanisms,
} from './SmtpReply.js';

/**
 * SMTP session failures.
 *
 * Each protocol step has its own failure kind. Inside the session a step
 * throws SmtpSendError; sendMail() and verifyRelay() catch it at the module
 * boundary and hand the caller a plain SmtpFailure value.
 */

export type SmtpFailureKind =
  | 'configuration-error'
  | 'invalid-message'
  | 'connection-error'
  | 'greeting-error'
  | 'starttls-error'
  | 'tls-error'
  | 'auth-mechanism-error'
  | 'auth-username-error'
  | 'auth-failed-error'
  | 'sender-rejected-error'
  | 'recipient-rejected-error'
  | 'data-rejected-error'
  | 'message-rejected-error'
  | 'transport-error';

/**
 * Human-readable prefix per failure kind
 */
const FAILURE_PREFIX: Record<SmtpFailureKind, string> = {
  'configuration-error': 'Invalid SMTP settings',
  'invalid-message': 'Invalid message',
  'connection-error': 'Connection failed',
  'greeting-error': 'Bad greeting',
  'starttls-error': 'STARTTLS rejected',
  'tls-error': 'TLS handshake failed',
  'auth-mechanism-error': 'AUTH rejected',
  'auth-username-error': 'Username rejected',
  'auth-failed-error': 'Auth failed',
  'sender-rejected-error': 'MAIL FROM rejected',
  'recipient-rejected-error': 'RCPT TO rejected',
  'data-rejected-error': 'DATA rejected',
  'message-rejected-error': 'Message rejected',
  'transport-error': 'Transport error',
};

export interface SmtpFailure {
  kind: SmtpFailureKind;
  /** e.g. "RCPT TO rejected: 550 5.1.1 No such user" */
  message: string;
  /** Raw relay reply, when the failure came from one */
  response?: string;
}

export class SmtpSendError extends Error {
  readonly kind: SmtpFailureKind;
  readonly response?: string;

  constructor(kind: SmtpFailureKind, detail: string, response?: string) {
    super(`${FAILURE_PREFIX[kind]}: ${detail}`);
    this.name = 'SmtpSendError';
    this.kind = kind;
    this.response = response;
  }

  toFailure(): SmtpFailure {
    const failure: SmtpFailure = { kind: this.kind, message: this.message };
    if (this.response !== undefined) {
      failure.response = this.response;
    }
    return failure;
  }
}

/**
 * Convert anything caught at the module boundary into a failure value.
 * Errors that are not SmtpSendError become transport errors.
 */
export function toSmtpFailure(error: unknown): SmtpFailure {
  if (error instanceof SmtpSendError) {
    return error.toFailure();
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new SmtpSendError('transport-error', detail).toFailure();
}

/**
 * Purpose: Deliver one plain-text email through an SMTP relay
 *
 * Key behaviors:
 * - One connection per message, closed on every exit path
 * - Plaintext EHLO, STARTTLS, TLS upgrade, EHLO again, AUTH LOGIN
 * - MAIL FROM / RCPT TO / DATA, dot-stuffed body, QUIT
 * - Each step checks its expected reply code; the first mismatch ends the
 *   session with that step's failure kind and the relay's reply text
 * - No retries. Failures come back as values, never as rejections
 */

import { getLogger, registerComponent } from '../../logging/index.js';
import type { Logger } from '../../logging/index.js';
import {
  SmtpClientProperties,
  validateSmtpClientProperties,
} from './SmtpClientProperties.js';
import { SmtpChannel, SmtpConnection, SmtpConnectionFactory } from './SmtpConnection.js';
import { SmtpFailure, SmtpFailureKind, SmtpSendError, toSmtpFailure } from './SmtpError.js';
import {
  OutboundMessage,
  composeMessage,
  validateOutboundMessage,
} from './SmtpMessage.js';
import {
  SmtpReply,
  getAuthMechanisms,
  hasCapability,
  parseEhloCapabilities,
} from './SmtpReply.js';

registerComponent('smtp', 'SMTP STARTTLS sender');
const logger = getLogger('smtp');

export type SmtpSendResult =
  | { ok: true; messageId: string; response: string }
  | { ok: false; failure: SmtpFailure };

export type SmtpVerifyResult =
  | { ok: true; capabilities: string[]; response: string }
  | { ok: false; failure: SmtpFailure };

export interface SmtpSendOptions {
  /** Replaces the TCP/TLS layer (defaults to SmtpConnection.connect) */
  connectionFactory?: SmtpConnectionFactory;
  /** Clock used for the Date header */
  now?: () => Date;
}

/**
 * Signature shared by sendMail() and anything standing in for it
 */
export type MailSendFunction = (
  message: OutboundMessage,
  props: SmtpClientProperties
) => Promise<SmtpSendResult>;

/**
 * One SMTP session. Each method is one protocol step; a step that does not
 * get its expected reply throws SmtpSendError.
 */
class SmtpSession {
  private channel: SmtpChannel | null = null;
  private readonly log: Logger;

  constructor(
    private readonly props: SmtpClientProperties,
    private readonly connectionFactory: SmtpConnectionFactory
  ) {
    this.log = logger.child('session');
  }

  async open(): Promise<void> {
    try {
      this.channel = await this.connectionFactory(this.props, this.log);
    } catch (error) {
      throw new SmtpSendError('connection-error', errorMessage(error));
    }
  }

  /**
   * Greeting through AUTH LOGIN. Returns the capabilities advertised over
   * TLS and the relay's answer to the password.
   */
  async handshake(): Promise<{ capabilities: string[]; authReply: SmtpReply }> {
    const greeting = await this.read();
    this.expect(greeting, '220', 'greeting-error');

    const plainCapabilities = parseEhloCapabilities(await this.command(`EHLO ${this.props.ehloDomain}`));
    if (!hasCapability(plainCapabilities, 'STARTTLS')) {
      this.log.warn('Relay did not advertise STARTTLS; trying it anyway', { host: this.props.host });
    }

    this.expect(await this.command('STARTTLS'), '220', 'starttls-error');

    const channel = this.requireChannel();
    try {
      await channel.startTls();
    } catch (error) {
      throw new SmtpSendError('tls-error', errorMessage(error));
    }
    // Credentials never go over a plaintext channel
    if (!channel.isSecure()) {
      throw new SmtpSendError('tls-error', 'connection is not encrypted after STARTTLS');
    }

    // Capabilities from before the upgrade are discarded
    const capabilities = parseEhloCapabilities(await this.command(`EHLO ${this.props.ehloDomain}`));
    const mechanisms = getAuthMechanisms(capabilities);
    if (mechanisms.length > 0 && !mechanisms.includes('LOGIN')) {
      this.log.warn('Relay does not advertise AUTH LOGIN', { mechanisms: mechanisms.join(' ') });
    }

    this.expect(await this.command('AUTH LOGIN'), '334', 'auth-mechanism-error');
    this.expect(await this.command(base64(this.props.username), true), '334', 'auth-username-error');
    const authReply = await this.command(base64(this.props.password), true);
    this.expect(authReply, '235', 'auth-failed-error');

    return { capabilities, authReply };
  }

  async envelope(from: string, to: string): Promise<void> {
    this.expect(await this.command(`MAIL FROM:<${from}>`), '250', 'sender-rejected-error');
    this.expect(await this.command(`RCPT TO:<${to}>`), '250', 'recipient-rejected-error');
  }

  async data(payload: string): Promise<SmtpReply> {
    this.expect(await this.command('DATA'), '354', 'data-rejected-error');

    const channel = this.requireChannel();
    await channel.writeRaw(payload);
    const reply = await channel.readReply();
    this.expect(reply, '250', 'message-rejected-error');
    return reply;
  }

  /**
   * QUIT and read whatever comes back. The outcome is already decided, so
   * a relay that hangs up early only gets a debug line.
   */
  async quit(): Promise<void> {
    try {
      await this.command('QUIT');
    } catch (error) {
      this.log.debug(`QUIT not acknowledged: ${errorMessage(error)}`);
    }
  }

  close(): void {
    this.channel?.close();
    this.channel = null;
  }

  // -- internal --

  private requireChannel(): SmtpChannel {
    if (!this.channel) {
      throw new SmtpSendError('transport-error', 'Connection is not open');
    }
    return this.channel;
  }

  private read(): Promise<SmtpReply> {
    return this.requireChannel().readReply();
  }

  private async command(line: string, redact = false): Promise<SmtpReply> {
    const channel = this.requireChannel();
    await channel.writeLine(line, redact);
    return channel.readReply();
  }

  private expect(reply: SmtpReply, code: string, kind: SmtpFailureKind): void {
    if (reply.code !== code) {
      throw new SmtpSendError(kind, reply.text, reply.text);
    }
  }
}

function base64(value: string): string {
  return Buffer.from(value, 'utf8').toString('base64');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function preflight(props: SmtpClientProperties): SmtpSendError | null {
  const problems = validateSmtpClientProperties(props);
  return problems.length > 0 ? new SmtpSendError('configuration-error', problems.join('; ')) : null;
}

/**
 * Send one message. Resolves to a success or a failure value; never rejects.
 */
export async function sendMail(
  message: OutboundMessage,
  props: SmtpClientProperties,
  options: SmtpSendOptions = {}
): Promise<SmtpSendResult> {
  const messageProblems = validateOutboundMessage(message);
  const invalid =
    preflight(props) ??
    (messageProblems.length > 0 ? new SmtpSendError('invalid-message', messageProblems.join('; ')) : null);
  if (invalid) {
    logger.warn(invalid.message, { to: message.to });
    return { ok: false, failure: invalid.toFailure() };
  }

  const session = new SmtpSession(props, options.connectionFactory ?? SmtpConnection.connect);
  const startTime = Date.now();

  try {
    await session.open();
    await session.handshake();
    await session.envelope(props.from, message.to);

    const composed = composeMessage(message, props, { date: (options.now ?? (() => new Date()))() });
    const reply = await session.data(composed.payload);
    await session.quit();

    logger.info(`Message accepted by ${props.host}`, {
      to: message.to,
      messageId: composed.messageId,
      durationMs: Date.now() - startTime,
    });
    return { ok: true, messageId: composed.messageId, response: reply.text };
  } catch (error) {
    const failure = toSmtpFailure(error);
    logger.warn(failure.message, { kind: failure.kind, to: message.to, host: props.host });
    return { ok: false, failure };
  } finally {
    session.close();
  }
}

/**
 * Check relay settings: connect, STARTTLS and authenticate, then QUIT
 * without sending anything.
 */
export async function verifyRelay(
  props: SmtpClientProperties,
  options: SmtpSendOptions = {}
): Promise<SmtpVerifyResult> {
  const invalid = preflight(props);
  if (invalid) {
    return { ok: false, failure: invalid.toFailure() };
  }

  const session = new SmtpSession(props, options.connectionFactory ?? SmtpConnection.connect);

  try {
    await session.open();
    const { capabilities, authReply } = await session.handshake();
    await session.quit();

    logger.info(`Relay ${props.host}:${props.port} accepted credentials`);
    return { ok: true, capabilities, response: authReply.text };
  } catch (error) {
    const failure = toSmtpFailure(error);
    logger.warn(failure.message, { kind: failure.kind, host: props.host });
    return { ok: false, failure };
  } finally {
    session.close();
  }
}

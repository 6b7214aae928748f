/**
 * Purpose: One TCP connection to an SMTP relay, upgradable in place to TLS
 *
 * Key behaviors:
 * - Connect with a deadline
 * - Split incoming bytes into CRLF lines; bytes past a complete reply stay
 *   buffered for the next read
 * - Deadline on every reply read; expiry, socket errors and the relay
 *   hanging up all reject the pending read
 * - STARTTLS upgrade wraps the same socket, discards anything buffered from
 *   the plaintext phase and enforces TLSv1.2..TLSv1.3
 */

import * as net from 'net';
import * as tls from 'tls';
import * as fs from 'fs';
import type { Logger } from '../../logging/index.js';
import {
  SmtpClientProperties,
  TLS_MAX_VERSION,
  TLS_MIN_VERSION,
} from './SmtpClientProperties.js';
import { SmtpReply, buildReply, isFinalReplyLine } from './SmtpReply.js';

/**
 * What the SMTP session needs from a connection
 */
export interface SmtpChannel {
  readReply(): Promise<SmtpReply>;
  /** Write one command; CRLF is appended. `redact` hides the line from traces. */
  writeLine(line: string, redact?: boolean): Promise<void>;
  /** Write data exactly as given (the DATA payload) */
  writeRaw(data: string): Promise<void>;
  startTls(): Promise<void>;
  /** True once startTls() has completed; AUTH is only sent when it is */
  isSecure(): boolean;
  close(): void;
}

/**
 * Opens a channel to the relay. Replaceable so that callers can supply a
 * different transport.
 */
export type SmtpConnectionFactory = (
  props: SmtpClientProperties,
  logger: Logger
) => Promise<SmtpChannel>;

interface PendingRead {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

/**
 * SNI name for the handshake. IP addresses are not valid SNI names, so a
 * relay addressed by IP gets none unless one is configured.
 */
export function tlsServerName(props: SmtpClientProperties): string | undefined {
  if (props.tls.servername) {
    return props.tls.servername;
  }
  return net.isIP(props.host) === 0 ? props.host : undefined;
}

/**
 * Open a plain TCP socket to the relay, bounded by props.connectTimeout.
 */
export function openSocket(props: SmtpClientProperties): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = new net.Socket();

    const timeout = setTimeout(() => {
      socket.destroy();
      reject(new Error(`Connection to ${props.host}:${props.port} timed out after ${props.connectTimeout} ms`));
    }, props.connectTimeout);

    socket.once('error', (error) => {
      clearTimeout(timeout);
      socket.destroy();
      reject(error);
    });

    socket.connect({ host: props.host, port: props.port }, () => {
      clearTimeout(timeout);
      socket.setNoDelay(true);
      resolve(socket);
    });
  });
}

export class SmtpConnection implements SmtpChannel {
  protected socket: net.Socket;
  protected secure = false;

  private buffer: Buffer = Buffer.alloc(0);
  private lines: string[] = [];
  private pending: PendingRead | null = null;
  private terminalError: Error | null = null;

  private readonly onData = (chunk: Buffer): void => this.handleData(chunk);
  private readonly onError = (error: Error): void => this.handleEnd(error);
  private readonly onClose = (): void => this.handleEnd(new Error('Connection closed by relay'));

  constructor(
    socket: net.Socket,
    protected readonly props: SmtpClientProperties,
    protected readonly logger: Logger
  ) {
    this.socket = socket;
    this.attach(socket);
  }

  /**
   * Default factory: plain TCP connect, TLS added later by startTls().
   */
  static async connect(props: SmtpClientProperties, logger: Logger): Promise<SmtpConnection> {
    const socket = await openSocket(props);
    logger.debug(`Connected to ${props.host}:${props.port}`, {
      localAddress: socket.localAddress,
      localPort: socket.localPort,
    });
    return new SmtpConnection(socket, props, logger);
  }

  isSecure(): boolean {
    return this.secure;
  }

  /**
   * Read one complete reply within props.readTimeout.
   */
  async readReply(): Promise<SmtpReply> {
    const deadline = Date.now() + this.props.readTimeout;
    const lines: string[] = [];

    for (;;) {
      const line = await this.readLine(deadline);
      lines.push(line);
      if (isFinalReplyLine(line)) break;
    }

    const reply = buildReply(lines);
    if (this.logger.isTraceEnabled()) {
      for (const line of lines) {
        this.logger.trace(`S: ${line}`);
      }
    }
    return reply;
  }

  async writeLine(line: string, redact = false): Promise<void> {
    this.logger.trace(`C: ${redact ? '***' : line}`);
    await this.writeRaw(`${line}\r\n`);
  }

  writeRaw(data: string): Promise<void> {
    const socket = this.socket;
    return new Promise((resolve, reject) => {
      if (socket.destroyed) {
        reject(this.terminalError ?? new Error('Connection is closed'));
        return;
      }
      socket.write(data, 'utf8', (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Upgrade the current socket to TLS. The handshake is bounded by
   * props.readTimeout.
   */
  startTls(): Promise<void> {
    const plain = this.socket;
    this.detach(plain);
    // Nothing read before the handshake may be trusted afterwards
    this.buffer = Buffer.alloc(0);
    this.lines = [];

    const options: tls.ConnectionOptions = {
      socket: plain,
      servername: tlsServerName(this.props),
      rejectUnauthorized: this.props.tls.rejectUnauthorized,
      minVersion: TLS_MIN_VERSION,
      maxVersion: TLS_MAX_VERSION,
    };
    if (this.props.tls.ca) {
      options.ca = fs.readFileSync(this.props.tls.ca);
    }

    return new Promise((resolve, reject) => {
      const secureSocket = tls.connect(options);

      const timeout = setTimeout(() => {
        secureSocket.destroy();
        reject(new Error(`TLS handshake timed out after ${this.props.readTimeout} ms`));
      }, this.props.readTimeout);

      const onHandshakeError = (error: Error): void => {
        clearTimeout(timeout);
        secureSocket.destroy();
        reject(error);
      };

      secureSocket.once('error', onHandshakeError);
      secureSocket.once('secureConnect', () => {
        clearTimeout(timeout);
        secureSocket.removeListener('error', onHandshakeError);
        this.socket = secureSocket;
        this.secure = true;
        this.attach(secureSocket);
        this.logger.debug('TLS established', {
          protocol: secureSocket.getProtocol(),
          cipher: secureSocket.getCipher().name,
        });
        resolve();
      });
    });
  }

  /**
   * Destroy the socket. Safe to call more than once.
   */
  close(): void {
    if (!this.socket.destroyed) {
      this.socket.destroy();
    }
    this.detach(this.socket);
    this.handleEnd(new Error('Connection is closed'));
  }

  // -- internal --

  protected attach(socket: net.Socket): void {
    socket.on('data', this.onData);
    socket.on('error', this.onError);
    socket.on('close', this.onClose);
  }

  protected detach(socket: net.Socket): void {
    socket.removeListener('data', this.onData);
    socket.removeListener('error', this.onError);
    socket.removeListener('close', this.onClose);
  }

  private readLine(deadline: number): Promise<string> {
    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.terminalError) {
      return Promise.reject(this.terminalError);
    }

    return new Promise((resolve, reject) => {
      const remaining = Math.max(0, deadline - Date.now());
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new Error(`Timed out after ${this.props.readTimeout} ms waiting for reply`));
      }, remaining);

      this.pending = {
        resolve: (line) => {
          clearTimeout(timer);
          resolve(line);
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
    });
  }

  private handleData(chunk: Buffer): void {
    this.buffer = Buffer.concat([this.buffer, chunk]);

    let newline = this.buffer.indexOf(0x0a);
    while (newline !== -1) {
      const raw = this.buffer.subarray(0, newline).toString('utf8');
      this.buffer = this.buffer.subarray(newline + 1);
      this.pushLine(raw.endsWith('\r') ? raw.slice(0, -1) : raw);
      newline = this.buffer.indexOf(0x0a);
    }
  }

  private pushLine(line: string): void {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.resolve(line);
    } else {
      this.lines.push(line);
    }
  }

  private handleEnd(error: Error): void {
    if (this.terminalError) return;

    // An unterminated last line still counts as a line
    if (this.buffer.length > 0) {
      const rest = this.buffer.toString('utf8');
      this.buffer = Buffer.alloc(0);
      this.pushLine(rest);
    }

    this.terminalError = error;
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.reject(error);
    }
  }
}

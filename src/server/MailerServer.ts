/**
 * Mailer Server
 *
 * Wires configuration, the enquiry service and the HTTP API together and
 * owns the listening socket.
 */

import type { Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import { createApp, startServer } from '../api/server.js';
import type { MailerConfig } from '../config/MailerConfig.js';
import type { MailSendFunction } from '../connectors/smtp/SmtpSender.js';
import { EnquiryService } from '../enquiry/index.js';
import { getLogger, registerComponent } from '../logging/index.js';

registerComponent('server', 'Server lifecycle');
const logger = getLogger('server');

export interface MailerServerOptions {
  /** Replaces sendMail, e.g. with a stub in tests */
  send?: MailSendFunction;
  trustProxy?: number;
}

export class MailerServer {
  private readonly config: MailerConfig;
  private readonly options: MailerServerOptions;
  private server: HttpServer | null = null;

  constructor(config: MailerConfig, options: MailerServerOptions = {}) {
    this.config = config;
    this.options = options;
  }

  async start(): Promise<void> {
    if (this.server) return;

    const { smtp, enquiry, server } = this.config;
    logger.info(`Relay ${smtp.host}:${smtp.port} as ${smtp.username}; enquiries to ${enquiry.recipients.join(', ')}`);

    const enquiryService = new EnquiryService({
      settings: enquiry,
      smtp,
      send: this.options.send,
    });
    const app = createApp({
      enquiryService,
      enquirySettings: enquiry,
      trustProxy: this.options.trustProxy,
    });

    this.server = await startServer(app, server.host, server.port);
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    logger.info('Mailer API stopped');
  }

  /**
   * Install SIGTERM/SIGINT handlers for graceful shutdown.
   * If stop() hangs, force-exit after 5 seconds.
   */
  installSignalHandlers(): void {
    const shutdown = async (signal: string) => {
      logger.warn(`Received ${signal}, shutting down...`);
      const timeout = setTimeout(() => process.exit(1), 5000);
      try {
        await this.stop();
      } catch (err) {
        logger.error('Error during graceful shutdown', err instanceof Error ? err : new Error(String(err)));
      } finally {
        clearTimeout(timeout);
      }
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  /**
   * Bound address, once started (port 0 resolves to the real port)
   */
  getAddress(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }
}

/**
 * Site Mailer
 *
 * Entry point for the enquiry API. Reads SMTP_*, ENQUIRY_* and HOST/PORT
 * from the environment (or .env) and serves POST /api/enquiries.
 */

import 'dotenv/config';
import { MailerConfigError, getMailerConfig } from './config/MailerConfig.js';
import { getLogger, initializeLogging, shutdownLogging } from './logging/index.js';
import { MailerServer } from './server/MailerServer.js';

initializeLogging();
const logger = getLogger('server');

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection', reason instanceof Error ? reason : new Error(String(reason)));
  process.exit(1);
});

async function main(): Promise<void> {
  let server: MailerServer;
  try {
    server = new MailerServer(getMailerConfig());
  } catch (error) {
    if (error instanceof MailerConfigError) {
      logger.error(error.message);
      await shutdownLogging();
      process.exit(1);
    }
    throw error;
  }

  try {
    await server.start();
    server.installSignalHandlers();
  } catch (error) {
    logger.error('Failed to start mailer', error instanceof Error ? error : new Error(String(error)));
    process.exit(1);
  }
}

void main();

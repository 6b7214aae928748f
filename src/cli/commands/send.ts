/**
 * Sends one plain-text message through the configured relay.
 */

import { Command } from 'commander';
import ora from 'ora';
import { getSmtpConfig } from '../../config/MailerConfig.js';
import { sendMail } from '../../connectors/smtp/index.js';
import { readMessageBody } from '../lib/MessageInput.js';
import { OutputFormatter, formatDuration } from '../lib/OutputFormatter.js';
import type { GlobalOptions, SendCommandOptions } from '../types/index.js';

/**
 * send <to> -s <subject> -b <text|@file> [-r <address>]
 */
export function registerSendCommand(program: Command): void {
  program
    .command('send <to>')
    .description('Send a plain-text message through the SMTP relay')
    .requiredOption('-s, --subject <subject>', 'Message subject')
    .requiredOption('-b, --body <body>', 'Message body, or @file to read it from a file')
    .option('-r, --reply-to <address>', 'Reply-To address (defaults to the sender)')
    .action(async (to: string, options: SendCommandOptions, cmd: Command) => {
      const globalOpts: GlobalOptions = cmd.parent?.opts() ?? {};
      const formatter = new OutputFormatter(globalOpts.json);

      const smtp = getSmtpConfig();
      const body = readMessageBody(options.body);
      const replyTo = options.replyTo ?? smtp.from;

      const spinner = formatter.isJson()
        ? null
        : ora(`Sending to ${to} via ${smtp.host}:${smtp.port}...`).start();
      const startTime = Date.now();

      const result = await sendMail({ to, subject: options.subject, body, replyTo }, smtp);
      const duration = Date.now() - startTime;
      spinner?.stop();

      if (result.ok) {
        formatter.succeeded(
          'Message sent',
          [
            ['to', to],
            ['message-id', result.messageId],
            ['response', result.response],
            ['time', formatDuration(duration)],
          ],
          { success: true, to, messageId: result.messageId, response: result.response, duration }
        );
      } else {
        formatter.failed(result.failure, { success: false, to, failure: result.failure, duration });
      }
    });
}

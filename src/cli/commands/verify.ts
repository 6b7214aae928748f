/**
 * Runs greeting, STARTTLS and AUTH LOGIN against the relay and quits
 * without sending anything.
 */

import { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { getSmtpConfig } from '../../config/MailerConfig.js';
import { verifyRelay } from '../../connectors/smtp/index.js';
import { OutputFormatter } from '../lib/OutputFormatter.js';
import type { GlobalOptions } from '../types/index.js';

export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Check that the relay accepts STARTTLS and the configured credentials')
    .action(async (_options: Record<string, never>, cmd: Command) => {
      const globalOpts: GlobalOptions = cmd.parent?.opts() ?? {};
      const formatter = new OutputFormatter(globalOpts.json);

      const smtp = getSmtpConfig();
      const relay = `${smtp.host}:${smtp.port}`;
      const spinner = formatter.isJson() ? null : ora(`Connecting to ${relay}...`).start();

      const result = await verifyRelay(smtp);
      spinner?.stop();

      if (result.ok) {
        formatter.succeeded(
          `Relay ${relay} accepted ${smtp.username}`,
          [
            ['response', result.response],
            ['extensions', result.capabilities.join(', ') || chalk.gray('(none)')],
          ],
          { success: true, relay, capabilities: result.capabilities, response: result.response }
        );
      } else {
        formatter.failed(result.failure, { success: false, relay, failure: result.failure });
      }
    });
}

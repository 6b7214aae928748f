#!/usr/bin/env node
/**
 * Site Mailer CLI
 *
 * Send a message or check the relay from the command line, with the same
 * SMTP_* settings the server reads (environment or .env).
 *
 * Usage: site-mailer [options] <command> [arguments]
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { MailerConfigError } from '../config/MailerConfig.js';
import { OutputFormatter } from './lib/OutputFormatter.js';
import { LogLevel, setGlobalLevel } from '../logging/index.js';
import { registerSendCommand } from './commands/send.js';
import { registerVerifyCommand } from './commands/verify.js';
import type { GlobalOptions } from './types/index.js';

const VERSION = '0.1.0';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('site-mailer')
    .description('Send mail through an authenticated STARTTLS relay')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Log the SMTP conversation (credentials redacted)');

  // Protocol logs would interleave with the spinner unless asked for
  program.hook('preAction', (thisCommand) => {
    const opts: GlobalOptions = thisCommand.opts();
    setGlobalLevel(opts.verbose ? LogLevel.TRACE : LogLevel.ERROR);
  });

  registerSendCommand(program);
  registerVerifyCommand(program);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Send a one-line message')}
  $ site-mailer send sales@example.com -s "Hello" -b "Testing the relay"

  ${chalk.gray('# Send a file as the body')}
  $ site-mailer send sales@example.com -s "Report" -b @report.txt

  ${chalk.gray('# Check STARTTLS and credentials')}
  $ site-mailer verify
`
  );

  return program;
}

function describeError(error: unknown): string {
  if (error instanceof MailerConfigError) {
    return `Configuration error: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse `argv` and run the command. Errors are reported through the
 * formatter, honouring --json, and leave process.exitCode at 1.
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    const opts: GlobalOptions = program.opts();
    new OutputFormatter(opts.json).error(describeError(error));
  }
}

if (require.main === module) {
  void runCli(process.argv);
}

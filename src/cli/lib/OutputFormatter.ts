/**
 * CLI output: coloured text for people, or the equivalent JSON with --json.
 */

import chalk from 'chalk';
import type { SmtpFailure } from '../../connectors/smtp/index.js';

export type DetailRow = [label: string, value: string];

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Indented label/value rows, labels padded to the widest one.
 */
export function formatDetails(rows: DetailRow[]): string {
  const width = rows.reduce((widest, [label]) => Math.max(widest, label.length), 0);
  return rows.map(([label, value]) => `  ${chalk.gray(label.padEnd(width))}  ${value}`).join('\n');
}

export function formatFailure(failure: SmtpFailure): string {
  const rows: DetailRow[] = [['kind', failure.kind]];
  if (failure.response !== undefined) {
    rows.push(['response', failure.response]);
  }
  return formatDetails(rows);
}

export class OutputFormatter {
  constructor(private readonly jsonMode = false) {}

  isJson(): boolean {
    return this.jsonMode;
  }

  /**
   * Print `text`, or `json` pretty-printed in JSON mode.
   */
  output(text: string, json: unknown): void {
    console.log(this.jsonMode ? formatJson(json) : text);
  }

  succeeded(title: string, rows: DetailRow[], json: unknown): void {
    this.output(`${chalk.green('✔')} ${chalk.bold(title)}\n${formatDetails(rows)}`, json);
  }

  /**
   * Print the failure and mark the process as failed.
   */
  failed(failure: SmtpFailure, json: unknown): void {
    this.output(`${chalk.red('✖')} ${failure.message}\n${formatFailure(failure)}`, json);
    process.exitCode = 1;
  }

  /**
   * Report an error that stopped a command. JSON goes to stdout like every
   * other result; text goes to stderr.
   */
  error(message: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: false, error: message }));
    } else {
      console.error(`${chalk.red('✖')} ${message}`);
    }
    process.exitCode = 1;
  }
}

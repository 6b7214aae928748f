/**
 * CLI Types
 */

/**
 * Options accepted by every command (declared on the root program)
 */
export interface GlobalOptions {
  json?: boolean;
  verbose?: boolean;
}

export interface SendCommandOptions {
  subject: string;
  body: string;
  replyTo?: string;
}

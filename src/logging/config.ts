/**
 * Logging settings, read from the environment once and then cached.
 *
 *   LOG_LEVEL                 TRACE | DEBUG | INFO | WARN | ERROR (default INFO)
 *   LOG_FORMAT                text | json (default text)
 *   LOG_FILE                  optional path for a rotating log file
 *   LOG_TIMESTAMP_FORMAT      classic (yyyy-MM-dd HH:mm:ss,SSS) | iso
 *   MAILER_DEBUG_COMPONENTS   comma list such as "smtp:TRACE,enquiry"
 */

import { LogLevel, parseLogLevel } from './LogLevel.js';

export type TimestampFormat = 'classic' | 'iso';

export interface LoggingConfiguration {
  logLevel: LogLevel;
  /** Raw MAILER_DEBUG_COMPONENTS entries, see DebugModeRegistry.initFromEnv */
  debugComponents: string[];
  logFormat: 'text' | 'json';
  logFile?: string;
  timestampFormat: TimestampFormat;
}

let cached: LoggingConfiguration | undefined;

function oneOf<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

function splitList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
}

export function getLoggingConfig(): LoggingConfiguration {
  if (cached) {
    return cached;
  }

  const env = process.env;
  cached = {
    logLevel: parseLogLevel(env['LOG_LEVEL'] ?? 'INFO'),
    debugComponents: splitList(env['MAILER_DEBUG_COMPONENTS']),
    logFormat: oneOf(env['LOG_FORMAT'], ['text', 'json'], 'text'),
    logFile: env['LOG_FILE'] || undefined,
    timestampFormat: oneOf(env['LOG_TIMESTAMP_FORMAT'], ['classic', 'iso'], 'classic'),
  };
  return cached;
}

/**
 * Forget the cached settings so the next read sees the current environment.
 */
export function resetLoggingConfig(): void {
  cached = undefined;
}

/**
 * Owns the root winston logger and hands out cached component loggers.
 *
 *   registerComponent('smtp', 'SMTP STARTTLS sender');
 *   const logger = getLogger('smtp');
 *
 * Entry points call initializeLogging() once; anything that asks for a
 * logger earlier gets the defaults built on first use.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

// winston priorities: lower number = more severe
const LEVELS = { error: 0, warn: 1, info: 2, debug: 3, trace: 4 };

let root: winston.Logger | undefined;
let globalLevel: LogLevel = LogLevel.INFO;
const loggers = new Map<string, Logger>();

/**
 * Build the root logger from LOG_* settings plus any extra transports, and
 * apply MAILER_DEBUG_COMPONENTS overrides.
 */
export function initializeLogging(extraTransports: LogTransport[] = []): winston.Logger {
  const config = getLoggingConfig();
  globalLevel = config.logLevel;

  const outputs: LogTransport[] = [new ConsoleTransport(config.logFormat, config.timestampFormat)];
  if (config.logFile) {
    outputs.push(new FileTransport(config.logFile, config.logFormat));
  }
  outputs.push(...extraTransports);

  root = winston.createLogger({
    levels: LEVELS,
    // Logger decides per component; winston passes everything through.
    level: 'trace',
    transports: outputs.map((output) => output.createWinstonTransport()),
    exitOnError: false,
  });

  setGlobalLevelProvider(() => globalLevel);
  initFromEnv(config.debugComponents);
  return root;
}

function currentRoot(): winston.Logger {
  return root ?? initializeLogging();
}

export function getLogger(component: string): Logger {
  let logger = loggers.get(component);
  if (!logger) {
    currentRoot();
    logger = new Logger(component, currentRoot);
    loggers.set(component, logger);
  }
  return logger;
}

/**
 * Level for every component without an override. The CLI uses this for
 * --verbose.
 */
export function setGlobalLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  return globalLevel;
}

/**
 * Flush and close the transports. Resolves once winston reports finish.
 */
export async function shutdownLogging(): Promise<void> {
  const closing = root;
  if (!closing) {
    return;
  }
  await new Promise<void>((resolve) => {
    closing.on('finish', resolve);
    closing.end();
  });
}

/** Test helper: drop the root, cached loggers and global level. */
export function resetLogging(): void {
  root?.close();
  root = undefined;
  globalLevel = LogLevel.INFO;
  loggers.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}

/**
 * Component logger. Every entry carries the component name; whether it is
 * written depends on the component's effective level in DebugModeRegistry.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { shouldLog } from './DebugModeRegistry.js';

type Metadata = Record<string, unknown>;

/**
 * A winston logger, or a getter for one. LoggerFactory passes a getter so
 * loggers created at import time write to whatever root exists later.
 */
export type WinstonSink = winston.Logger | (() => winston.Logger);

const WINSTON_LEVEL: Record<LogLevel, string> = {
  [LogLevel.TRACE]: 'trace',
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
};

// LoggerFactory owns the global level; Logger only reads it.
let readGlobalLevel: () => LogLevel = () => LogLevel.INFO;

/** @internal */
export function setGlobalLevelProvider(provider: () => LogLevel): void {
  readGlobalLevel = provider;
}

export class Logger {
  constructor(
    private readonly component: string,
    private readonly sink: WinstonSink
  ) {}

  getComponent(): string {
    return this.component;
  }

  /**
   * Logger for `${component}.${name}`. Without its own override it uses
   * the parent's level.
   */
  child(name: string): Logger {
    return new Logger(`${this.component}.${name}`, this.sink);
  }

  isEnabled(level: LogLevel): boolean {
    return shouldLog(this.component, level, readGlobalLevel());
  }

  isDebugEnabled(): boolean {
    return this.isEnabled(LogLevel.DEBUG);
  }

  isTraceEnabled(): boolean {
    return this.isEnabled(LogLevel.TRACE);
  }

  trace(message: string, metadata?: Metadata): void {
    this.write(LogLevel.TRACE, message, metadata);
  }

  debug(message: string, metadata?: Metadata): void {
    this.write(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: Metadata): void {
    this.write(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: Metadata): void {
    this.write(LogLevel.WARN, message, metadata);
  }

  error(message: string, error?: Error, metadata?: Metadata): void {
    this.write(LogLevel.ERROR, message, metadata, error);
  }

  private write(level: LogLevel, message: string, metadata?: Metadata, error?: Error): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const meta: Metadata = { component: this.component, ...metadata };
    if (error?.stack) {
      meta['errorStack'] = error.stack;
    }

    const target = typeof this.sink === 'function' ? this.sink() : this.sink;
    target.log(WINSTON_LEVEL[level], message, meta);
  }
}

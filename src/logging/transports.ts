/**
 * Console and file outputs for the root winston logger.
 */

import winston from 'winston';
import type { TimestampFormat } from './config.js';

export type OutputFormat = 'text' | 'json';

/**
 * Something that can hand the root logger a winston transport.
 * initializeLogging() accepts extra ones next to console and file.
 */
export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

const ROTATE_AT_BYTES = 10 * 1024 * 1024;
const ROTATED_FILES_KEPT = 5;

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Local time as yyyy-MM-dd HH:mm:ss,SSS
 */
export function formatClassicTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time},${pad(date.getMilliseconds(), 3)}`;
}

function stringField(info: winston.Logform.TransformableInfo, key: string): string | undefined {
  const value = info[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * One line per entry, stack (if any) on the following lines:
 *
 *   WARN 2026-02-10 14:30:15,042 [smtp] Relay does not advertise STARTTLS
 */
function lineFormat(timestamps: TimestampFormat): winston.Logform.Format {
  return winston.format.printf((info) => {
    const now = new Date();
    const stamp = timestamps === 'iso' ? now.toISOString() : formatClassicTimestamp(now);
    const component = stringField(info, 'component');
    const stack = stringField(info, 'errorStack');

    const head = [info.level.toUpperCase().padStart(5), stamp];
    if (component) {
      head.push(`[${component}]`);
    }
    head.push(String(info.message));

    const line = head.join(' ');
    return stack ? `${line}\n${stack}` : line;
  });
}

function jsonFormat(): winston.Logform.Format {
  return winston.format.combine(winston.format.timestamp(), winston.format.json());
}

/**
 * Writes to stdout only; service managers capture a single stream.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  constructor(
    private readonly output: OutputFormat,
    private readonly timestamps: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: this.output === 'json' ? jsonFormat() : lineFormat(this.timestamps),
      stderrLevels: [],
    });
  }
}

/**
 * Appends to LOG_FILE, rotating at 10 MB and keeping five files.
 */
export class FileTransport implements LogTransport {
  readonly name = 'file';

  constructor(
    private readonly filename: string,
    private readonly output: OutputFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filename,
      format: this.output === 'json' ? jsonFormat() : lineFormat('classic'),
      maxsize: ROTATE_AT_BYTES,
      maxFiles: ROTATED_FILES_KEPT,
    });
  }
}

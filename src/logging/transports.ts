/**
 * Winston transports for ferry. A text line reads
 *
 *    INFO 2026-02-10 14:30:15,042 [transport] Transfer complete
 *
 * with the level right-aligned to five characters.
 */

import winston from 'winston';

export type LogFormat = 'text' | 'json';
export type TimestampFormat = 'local' | 'iso';

export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

const ROTATE_AT_BYTES = 10 * 1024 * 1024;
const ROTATED_FILES = 5;

function pad(value: number, width = 2): string {
  return value.toString().padStart(width, '0');
}

/** yyyy-MM-dd HH:mm:ss,SSS in local time */
export function formatLocalTimestamp(date: Date): string {
  const day = [date.getFullYear(), pad(date.getMonth() + 1), pad(date.getDate())].join('-');
  const time = [pad(date.getHours()), pad(date.getMinutes()), pad(date.getSeconds())].join(':');
  return `${day} ${time},${pad(date.getMilliseconds(), 3)}`;
}

export function formatTextLine(
  level: string,
  message: unknown,
  component: unknown,
  errorStack: unknown,
  timestamp: string
): string {
  const parts = [level.toUpperCase().padStart(5), timestamp];
  if (typeof component === 'string' && component !== '') {
    parts.push(`[${component}]`);
  }
  parts.push(String(message));
  const line = parts.join(' ');
  return typeof errorStack === 'string' && errorStack !== '' ? `${line}\n${errorStack}` : line;
}

function lineFormat(format: LogFormat, timestamps: TimestampFormat): winston.Logform.Format {
  if (format === 'json') {
    return winston.format.combine(winston.format.timestamp(), winston.format.json());
  }
  return winston.format.printf(({ level, message, component, errorStack }) => {
    const now = new Date();
    const stamp = timestamps === 'iso' ? now.toISOString() : formatLocalTimestamp(now);
    return formatTextLine(level, message, component, errorStack, stamp);
  });
}

/**
 * Writes every level to stderr, which leaves stdout to command output such as --json reports.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  constructor(
    private readonly format: LogFormat,
    private readonly timestamps: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: lineFormat(this.format, this.timestamps),
      stderrLevels: ['error', 'warn', 'info', 'debug', 'trace'],
    });
  }
}

/** Size-rotated log file. Text lines always use local timestamps. */
export class FileTransport implements LogTransport {
  readonly name = 'file';

  constructor(
    private readonly filename: string,
    private readonly format: LogFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filename,
      format: lineFormat(this.format, 'local'),
      maxsize: ROTATE_AT_BYTES,
      maxFiles: ROTATED_FILES,
    });
  }
}

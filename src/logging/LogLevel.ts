/**
 * Log levels, ordered from most to least verbose.
 */
export enum LogLevel {
  TRACE = 'TRACE',
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.TRACE]: 0,
  [LogLevel.DEBUG]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.WARN]: 3,
  [LogLevel.ERROR]: 4,
};

const ALIASES: Record<string, LogLevel> = {
  INFORMATION: LogLevel.INFO,
  WARNING: LogLevel.WARN,
};

/** Winston priorities, where a lower number is more severe. */
export const WINSTON_LEVELS = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
} as const;

export type WinstonLevelName = keyof typeof WINSTON_LEVELS;

/**
 * Match a level name case-insensitively, or undefined when it names no level.
 */
export function matchLogLevel(name: string): LogLevel | undefined {
  const key = name.trim().toUpperCase();
  return Object.values(LogLevel).find((level) => level === key) ?? ALIASES[key];
}

/**
 * Parse a level name. Unknown names fall back to INFO.
 */
export function parseLogLevel(name: string): LogLevel {
  return matchLogLevel(name) ?? LogLevel.INFO;
}

export function shouldDisplayLogLevel(itemLevel: LogLevel, filterLevel: LogLevel): boolean {
  return SEVERITY[itemLevel] >= SEVERITY[filterLevel];
}

export function toWinstonLevel(level: LogLevel): WinstonLevelName {
  switch (level) {
    case LogLevel.TRACE:
      return 'trace';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.ERROR:
      return 'error';
  }
}

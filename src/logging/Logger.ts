/**
 * Component-scoped logger over the shared winston root.
 *
 * The root and the global level are looked up on every call, so loggers
 * created at module load keep working after logging is re-initialized.
 */

import type winston from 'winston';
import { LogLevel, toWinstonLevel } from './LogLevel.js';
import { shouldLog } from './DebugModeRegistry.js';

export type LogMetadata = Record<string, unknown>;

export interface LoggerContext {
  sink(): winston.Logger;
  globalLevel(): LogLevel;
}

export class Logger {
  constructor(
    private readonly component: string,
    private readonly context: LoggerContext
  ) {}

  trace(message: string, metadata?: LogMetadata): void {
    this.write(LogLevel.TRACE, message, metadata);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write(LogLevel.WARN, message, metadata);
  }

  /**
   * The error's stack travels as `errorStack` and is printed below the message.
   */
  error(message: string, error?: Error, metadata?: LogMetadata): void {
    const stack = error?.stack;
    this.write(LogLevel.ERROR, message, stack ? { ...metadata, errorStack: stack } : metadata);
  }

  isEnabled(level: LogLevel): boolean {
    return shouldLog(this.component, level, this.context.globalLevel());
  }

  isDebugEnabled(): boolean {
    return this.isEnabled(LogLevel.DEBUG);
  }

  /** "storage" + "rsync" gives "storage.rsync". */
  child(name: string): Logger {
    return new Logger(`${this.component}.${name}`, this.context);
  }

  getComponent(): string {
    return this.component;
  }

  private write(level: LogLevel, message: string, metadata: LogMetadata | undefined): void {
    if (this.isEnabled(level)) {
      this.context.sink().log(toWinstonLevel(level), message, { ...metadata, component: this.component });
    }
  }
}

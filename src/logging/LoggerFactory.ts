/**
 * Root winston logger and the per-component Logger cache.
 *
 *   const logger = getLogger('transport');
 *   logger.info('Transfer complete', { totalBytes });
 *
 * The environment configuration is applied the first time anything logs or
 * changes the level. initializeLogging() is only called directly to add transports.
 */

import winston from 'winston';
import { LogLevel, WINSTON_LEVELS } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger } from './Logger.js';
import type { LoggerContext } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

interface LoggingState {
  root: winston.Logger | null;
  level: LogLevel;
  loggers: Map<string, Logger>;
}

const state: LoggingState = {
  root: null,
  level: LogLevel.INFO,
  loggers: new Map(),
};

function activeRoot(): winston.Logger {
  return state.root ?? initializeLogging();
}

const context: LoggerContext = {
  sink: activeRoot,
  globalLevel: () => {
    activeRoot();
    return state.level;
  },
};

/**
 * (Re)build the root logger from the environment. A previous root is closed.
 */
export function initializeLogging(additionalTransports: readonly LogTransport[] = []): winston.Logger {
  const config = getLoggingConfig();
  const sources: LogTransport[] = [new ConsoleTransport(config.logFormat, config.timestampFormat)];
  if (config.logFile !== undefined) {
    sources.push(new FileTransport(config.logFile, config.logFormat));
  }
  sources.push(...additionalTransports);

  state.root?.close();
  state.root = winston.createLogger({
    levels: WINSTON_LEVELS,
    // Level filtering happens in Logger so component overrides can go below the global level.
    level: 'trace',
    transports: sources.map((source) => source.createWinstonTransport()),
    exitOnError: false,
  });
  state.level = config.logLevel;
  initFromEnv(config.debugComponents);
  return state.root;
}

export function getLogger(component: string): Logger {
  let logger = state.loggers.get(component);
  if (logger === undefined) {
    logger = new Logger(component, context);
    state.loggers.set(component, logger);
  }
  return logger;
}

/** Components with an override keep it. */
export function setGlobalLevel(level: LogLevel): void {
  activeRoot();
  state.level = level;
}

export function getGlobalLevel(): LogLevel {
  return context.globalLevel();
}

/**
 * Flush and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const root = state.root;
  if (root === null) return;
  state.root = null;
  await new Promise<void>((resolve) => {
    root.once('finish', () => resolve());
    root.end();
  });
}

/** Drop the root, the cached loggers and the level (tests). */
export function resetLogging(): void {
  state.root?.close();
  state.root = null;
  state.level = LogLevel.INFO;
  state.loggers.clear();
}

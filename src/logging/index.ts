export { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';
export { Logger } from './Logger.js';
export type { LogMetadata } from './Logger.js';
export {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export {
  registerComponent,
  setComponentLevel,
  clearComponentLevel,
  getEffectiveLevel,
  getRegisteredComponents,
} from './DebugModeRegistry.js';
export type { ComponentStatus } from './DebugModeRegistry.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LoggingConfiguration } from './config.js';
export { ConsoleTransport, FileTransport, formatLocalTimestamp } from './transports.js';
export type { LogTransport, LogFormat, TimestampFormat } from './transports.js';

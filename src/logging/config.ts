/**
 * Logging configuration, parsed from the environment with zod and cached.
 * Tests call resetLoggingConfig() after touching process.env.
 */

import { z } from 'zod';
import { LogLevel, parseLogLevel } from './LogLevel.js';

const loggingEnvSchema = z.object({
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => parseLogLevel(value ?? LogLevel.INFO)),
  FERRY_DEBUG_COMPONENTS: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry !== '')
    ),
  LOG_FORMAT: z.enum(['text', 'json']).catch('text'),
  LOG_FILE: z
    .string()
    .optional()
    .transform((value) => (value ? value : undefined)),
  LOG_TIMESTAMP_FORMAT: z.enum(['local', 'iso']).catch('local'),
});

export interface LoggingConfiguration {
  /** LOG_LEVEL, default INFO */
  logLevel: LogLevel;
  /** FERRY_DEBUG_COMPONENTS, e.g. "transport,storage.rsync:TRACE" */
  debugComponents: string[];
  logFormat: 'text' | 'json';
  logFile: string | undefined;
  /** 'local' prints yyyy-MM-dd HH:mm:ss,SSS */
  timestampFormat: 'local' | 'iso';
}

let cached: LoggingConfiguration | null = null;

export function getLoggingConfig(): LoggingConfiguration {
  if (cached === null) {
    const env = loggingEnvSchema.parse(process.env);
    cached = {
      logLevel: env.LOG_LEVEL,
      debugComponents: env.FERRY_DEBUG_COMPONENTS,
      logFormat: env.LOG_FORMAT,
      logFile: env.LOG_FILE,
      timestampFormat: env.LOG_TIMESTAMP_FORMAT,
    };
  }
  return cached;
}

export function resetLoggingConfig(): void {
  cached = null;
}

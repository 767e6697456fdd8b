/**
 * Structured logging utility using pino
 *
 * Provides consistent logging across the application with:
 * - Environment-based log levels
 * - Structured JSON logging for production
 * - Pretty printing for development
 * - Component-based context
 */

import pino from 'pino';
import { createOptionReader, loggingOptions, runtimeOptions } from '../config/registry/index.js';

// The logger is created before any Config exists, so it reads its own
// options; invalid values fall back to defaults here and are reported by
// buildConfig later.
const read = createOptionReader(process.env, []);
const logLevel = read('logging.level', loggingOptions.level);
const prettyEnabled = read('logging.pretty', loggingOptions.pretty);
const nodeEnv = read('runtime.nodeEnv', runtimeOptions.nodeEnv);

// Detect test environment and suppress logs to keep test output clean
const isTest = nodeEnv === 'test' || process.env.VITEST !== undefined;

/**
 * Common pino options with security redaction
 */
const pinoOptions: pino.LoggerOptions = {
  level: logLevel,
  enabled: !isTest,
  redact: {
    paths: [
      'apiKey',
      'api_key',
      'token',
      'secret',
      'authorization',
      'Authorization',
      '*.apiKey',
      '*.api_key',
      '*.token',
      '*.secret',
      'llm.apiKey',
    ],
    censor: '***REDACTED***',
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
};

export const logger = pino({
  ...pinoOptions,
  ...(nodeEnv !== 'production' &&
    prettyEnabled && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    }),
});

/**
 * Create a child logger with component context
 *
 * @param component - Component name (e.g., 'chunker', 'router', 'coordinator')
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}

export type Logger = pino.Logger;

/**
 * Logging Configuration Section
 *
 * Log level and output settings.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const loggingOptions = {
  level: {
    envKey: 'LOG_LEVEL',
    defaultValue: 'info',
    description: 'Log level: fatal, error, warn, info, debug, or trace.',
    schema: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']),
    parse: 'string' as const,
  },
  pretty: {
    envKey: 'HYBRID_CHUNKER_LOG_PRETTY',
    defaultValue: true,
    description: 'Pretty-print logs outside production.',
    schema: z.boolean(),
    parse: 'boolean' as const,
  },
};

export const loggingSection: ConfigSectionMeta = {
  name: 'logging',
  description: 'Logging configuration.',
  options: loggingOptions,
};

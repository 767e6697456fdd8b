/**
 * Storage Configuration Section
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const storageOptions = {
  sqlitePath: {
    envKey: 'HYBRID_CHUNKER_SQLITE_PATH',
    defaultValue: ':memory:',
    description: 'SQLite database file for the bundled article store.',
    schema: z.string().min(1),
    parse: 'string' as const,
  },
  busyTimeoutMs: {
    envKey: 'HYBRID_CHUNKER_SQLITE_BUSY_TIMEOUT_MS',
    defaultValue: 5000,
    description: 'SQLite busy timeout in milliseconds.',
    schema: z.number().int().min(0),
    parse: 'int' as const,
  },
};

export const storageSection: ConfigSectionMeta = {
  name: 'storage',
  description: 'Bundled SQLite article store.',
  options: storageOptions,
};

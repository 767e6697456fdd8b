/**
 * Runtime Configuration Section
 *
 * Runtime environment settings.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const runtimeOptions = {
  nodeEnv: {
    envKey: 'NODE_ENV',
    defaultValue: 'development',
    description: 'Node.js environment: development, production, or test.',
    schema: z.string(),
    parse: 'string' as const,
  },
};

export const runtimeSection: ConfigSectionMeta = {
  name: 'runtime',
  description: 'Runtime environment configuration.',
  options: runtimeOptions,
};

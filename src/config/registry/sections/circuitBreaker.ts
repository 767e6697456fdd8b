/**
 * Circuit Breaker Configuration Section
 *
 * Settings for the breaker guarding the completion provider.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const circuitBreakerOptions = {
  failureThreshold: {
    envKey: 'HYBRID_CHUNKER_CB_FAILURE_THRESHOLD',
    defaultValue: 5,
    description: 'Consecutive failures before opening the circuit.',
    schema: z.number().int().min(1),
    parse: 'int' as const,
    reloadable: true,
  },
  resetTimeoutMs: {
    envKey: 'HYBRID_CHUNKER_CB_RESET_TIMEOUT_MS',
    defaultValue: 60000,
    description: 'Time in milliseconds an open circuit waits before allowing a trial.',
    schema: z.number().int().min(1),
    parse: 'int' as const,
    reloadable: true,
  },
};

export const circuitBreakerSection: ConfigSectionMeta = {
  name: 'circuitBreaker',
  description: 'Circuit breaker pattern configuration for failure prevention.',
  options: circuitBreakerOptions,
};

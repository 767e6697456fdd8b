/**
 * LLM Configuration Section
 *
 * Completion provider selection and call discipline for chunk refinement.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const llmOptions = {
  provider: {
    envKey: 'HYBRID_CHUNKER_LLM_PROVIDER',
    defaultValue: 'disabled',
    description: 'Completion provider: openai, anthropic, or disabled.',
    schema: z.enum(['openai', 'anthropic', 'disabled']),
    parse: 'string' as const,
  },
  apiKey: {
    envKey: 'HYBRID_CHUNKER_LLM_API_KEY',
    defaultValue: '',
    description: 'API key for the completion provider.',
    schema: z.string(),
    parse: 'string' as const,
    sensitive: true,
  },
  model: {
    envKey: 'HYBRID_CHUNKER_LLM_MODEL',
    defaultValue: 'gpt-4o-mini',
    description: 'Model name passed to the provider.',
    schema: z.string().min(1),
    parse: 'string' as const,
  },
  baseUrl: {
    envKey: 'HYBRID_CHUNKER_LLM_BASE_URL',
    defaultValue: '',
    description: 'Optional base URL for OpenAI-compatible endpoints.',
    schema: z.string(),
    parse: 'string' as const,
  },
  temperature: {
    envKey: 'HYBRID_CHUNKER_LLM_TEMPERATURE',
    defaultValue: 0.1,
    description: 'Sampling temperature.',
    schema: z.number().min(0).max(2),
    parse: 'number' as const,
  },
  maxOutputTokens: {
    envKey: 'HYBRID_CHUNKER_LLM_MAX_OUTPUT_TOKENS',
    defaultValue: 256,
    description: 'Upper bound on reply tokens.',
    schema: z.number().int().min(1).max(2048),
    parse: 'int' as const,
  },
  requestTimeoutMs: {
    envKey: 'HYBRID_CHUNKER_LLM_REQUEST_TIMEOUT_MS',
    defaultValue: 30000,
    description: 'Per-call timeout, independent of the circuit breaker timeout.',
    schema: z.number().int().min(1),
    parse: 'int' as const,
  },
  maxRetries: {
    envKey: 'HYBRID_CHUNKER_LLM_MAX_RETRIES',
    defaultValue: 3,
    description: 'Retries after a transient failure.',
    schema: z.number().int().min(0).max(10),
    parse: 'int' as const,
  },
  retryBaseDelayMs: {
    envKey: 'HYBRID_CHUNKER_LLM_RETRY_BASE_DELAY_MS',
    defaultValue: 1000,
    description: 'First backoff delay; doubles per attempt.',
    schema: z.number().int().min(0),
    parse: 'int' as const,
  },
  retryMaxDelayMs: {
    envKey: 'HYBRID_CHUNKER_LLM_RETRY_MAX_DELAY_MS',
    defaultValue: 60000,
    description: 'Backoff delay cap.',
    schema: z.number().int().min(0),
    parse: 'int' as const,
  },
  retryJitter: {
    envKey: 'HYBRID_CHUNKER_LLM_RETRY_JITTER',
    defaultValue: 0.25,
    description: 'Fractional jitter applied to each backoff delay (0 disables).',
    schema: z.number().min(0).max(1),
    parse: 'number' as const,
  },
  maxOffset: {
    envKey: 'HYBRID_CHUNKER_LLM_MAX_OFFSET',
    defaultValue: 120,
    description: 'Largest boundary move, in characters, accepted from a refinement.',
    schema: z.number().int().min(0),
    parse: 'int' as const,
    reloadable: true,
  },
  refinementEnabled: {
    envKey: 'HYBRID_CHUNKER_LLM_REFINE_ENABLED',
    defaultValue: true,
    description: 'When false refinement returns chunks unchanged without calling the provider.',
    schema: z.boolean(),
    parse: 'boolean' as const,
    reloadable: true,
  },
};

export const llmSection: ConfigSectionMeta = {
  name: 'llm',
  description: 'LLM refinement provider and call discipline.',
  options: llmOptions,
};

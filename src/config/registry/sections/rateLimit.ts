/**
 * Rate Limit Configuration Section
 *
 * Ceilings and cost model for LLM refinement calls.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const rateLimitOptions = {
  maxLlmCallsPerMin: {
    envKey: 'HYBRID_CHUNKER_MAX_LLM_CALLS_PER_MIN',
    defaultValue: 60,
    description: 'Global LLM calls allowed per minute window.',
    schema: z.number().int().min(0),
    parse: 'int' as const,
    reloadable: true,
  },
  maxLlmCallsPerDomain: {
    envKey: 'HYBRID_CHUNKER_MAX_LLM_CALLS_PER_DOMAIN',
    defaultValue: 10,
    description: 'LLM calls allowed per source domain within the same minute window.',
    schema: z.number().int().min(0),
    parse: 'int' as const,
    reloadable: true,
  },
  maxLlmCallsPerBatch: {
    envKey: 'HYBRID_CHUNKER_MAX_LLM_CALLS_PER_BATCH',
    defaultValue: 100,
    description: 'LLM calls allowed per batch.',
    schema: z.number().int().min(0),
    parse: 'int' as const,
    reloadable: true,
  },
  maxLlmPercentagePerBatch: {
    envKey: 'HYBRID_CHUNKER_MAX_LLM_PERCENTAGE_PER_BATCH',
    defaultValue: 0.3,
    description: "Fraction of a batch's chunks that may use LLM refinement.",
    schema: z.number().min(0).max(1),
    parse: 'number' as const,
    reloadable: true,
  },
  dailyCostLimitUsd: {
    envKey: 'HYBRID_CHUNKER_DAILY_COST_LIMIT_USD',
    defaultValue: 10.0,
    description: 'Cumulative estimated LLM spend allowed per day.',
    schema: z.number().min(0),
    parse: 'number' as const,
    reloadable: true,
  },
  costPerTokenInput: {
    envKey: 'HYBRID_CHUNKER_COST_PER_TOKEN_INPUT',
    defaultValue: 0.000125,
    description: 'USD per input token.',
    schema: z.number().min(0),
    parse: 'number' as const,
    reloadable: true,
  },
  costPerTokenOutput: {
    envKey: 'HYBRID_CHUNKER_COST_PER_TOKEN_OUTPUT',
    defaultValue: 0.000375,
    description: 'USD per output token.',
    schema: z.number().min(0),
    parse: 'number' as const,
    reloadable: true,
  },
  promptOverheadTokens: {
    envKey: 'HYBRID_CHUNKER_PROMPT_OVERHEAD_TOKENS',
    defaultValue: 200,
    description: 'Tokens added to every estimate for the prompt template.',
    schema: z.number().int().min(0),
    parse: 'int' as const,
    reloadable: true,
  },
  costTimezone: {
    envKey: 'HYBRID_CHUNKER_COST_TIMEZONE',
    defaultValue: 'UTC',
    description: 'IANA timezone whose midnight resets the daily cost counter.',
    schema: z.string().min(1),
    parse: 'string' as const,
  },
};

export const rateLimitSection: ConfigSectionMeta = {
  name: 'rateLimit',
  description: 'LLM call admission limits and cost model.',
  options: rateLimitOptions,
};

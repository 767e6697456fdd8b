/**
 * Router Configuration Section
 *
 * Weights and threshold of the quality router, plus routing feature flags.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

const weight = z.number().min(0).max(1);

export const routerOptions = {
  confidenceMin: {
    envKey: 'HYBRID_CHUNKER_CONFIDENCE_MIN',
    defaultValue: 0.6,
    description: 'Chunks scoring strictly below this are routed to LLM refinement.',
    schema: z.number().min(0).max(1),
    parse: 'number' as const,
    reloadable: true,
  },
  boundaryWeight: {
    envKey: 'HYBRID_CHUNKER_BOUNDARY_WEIGHT',
    defaultValue: 0.4,
    description: 'Weight of the boundary alignment score.',
    schema: weight,
    parse: 'number' as const,
    reloadable: true,
  },
  sizeWeight: {
    envKey: 'HYBRID_CHUNKER_SIZE_WEIGHT',
    defaultValue: 0.3,
    description: 'Weight of the size score.',
    schema: weight,
    parse: 'number' as const,
    reloadable: true,
  },
  complexityWeight: {
    envKey: 'HYBRID_CHUNKER_COMPLEXITY_WEIGHT',
    defaultValue: 0.3,
    description: 'Weight of the structural complexity score.',
    schema: weight,
    parse: 'number' as const,
    reloadable: true,
  },
  routingEnabled: {
    envKey: 'HYBRID_CHUNKER_LLM_ROUTING_ENABLED',
    defaultValue: true,
    description: 'When false no chunk is routed to refinement.',
    schema: z.boolean(),
    parse: 'boolean' as const,
    reloadable: true,
  },
  llmAllowDomains: {
    envKey: 'HYBRID_CHUNKER_LLM_ALLOW_DOMAINS',
    defaultValue: [],
    description: 'Comma separated domains whose imperfect chunks are always routed.',
    schema: z.array(z.string()),
    parse: 'stringArray' as const,
    reloadable: true,
  },
  llmDenyDomains: {
    envKey: 'HYBRID_CHUNKER_LLM_DENY_DOMAINS',
    defaultValue: [],
    description: 'Comma separated domains that are never routed.',
    schema: z.array(z.string()),
    parse: 'stringArray' as const,
    reloadable: true,
  },
};

export const routerSection: ConfigSectionMeta = {
  name: 'router',
  description: 'Quality router scoring.',
  options: routerOptions,
};

/**
 * Chunking Configuration Section
 *
 * Word and character bounds for the deterministic base chunker.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const chunkingOptions = {
  targetWords: {
    envKey: 'HYBRID_CHUNKER_TARGET_WORDS',
    defaultValue: 400,
    description: 'Accumulate paragraphs until a chunk reaches this many words.',
    schema: z.number().int().min(1),
    parse: 'int' as const,
  },
  minWords: {
    envKey: 'HYBRID_CHUNKER_MIN_WORDS',
    defaultValue: 200,
    description: 'Lower word bound for every chunk except the last one of an article.',
    schema: z.number().int().min(1),
    parse: 'int' as const,
  },
  maxWords: {
    envKey: 'HYBRID_CHUNKER_MAX_WORDS',
    defaultValue: 600,
    description: 'Hard upper word bound for a chunk.',
    schema: z.number().int().min(1),
    parse: 'int' as const,
  },
  overlapWords: {
    envKey: 'HYBRID_CHUNKER_OVERLAP_WORDS',
    defaultValue: 80,
    description: 'Words shared between consecutive sliding windows of an oversized paragraph.',
    schema: z.number().int().min(0),
    parse: 'int' as const,
  },
  minChars: {
    envKey: 'HYBRID_CHUNKER_MIN_CHARS',
    defaultValue: 800,
    description: 'Chunks shorter than this are merged with a neighbour when the merge fits maxWords.',
    schema: z.number().int().min(0),
    parse: 'int' as const,
  },
  maxArticleChars: {
    envKey: 'HYBRID_CHUNKER_MAX_ARTICLE_CHARS',
    defaultValue: 2_000_000,
    description: 'Articles longer than this are rejected with a ChunkingError.',
    schema: z.number().int().min(1),
    parse: 'int' as const,
  },
};

export const chunkingSection: ConfigSectionMeta = {
  name: 'chunking',
  description: 'Base chunker bounds.',
  options: chunkingOptions,
};

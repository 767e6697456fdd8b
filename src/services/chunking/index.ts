/**
 * Chunking System
 *
 * Deterministic base segmentation of articles into bounded chunks.
 *
 * @example
 * ```typescript
 * import { BaseChunker } from 'hybrid-chunker';
 *
 * const chunker = new BaseChunker(config.chunking);
 * const chunks = chunker.chunkArticle(article);
 * ```
 */

export { BaseChunker, chunkId, reconstructText, resliceChunk } from './base-chunker.js';
export { detectSemanticType } from './semantic-type.js';
export { analyzeText, countWords, estimateTokens, tokenizeWords } from './text-layout.js';

export type { TextLayout, WordRange, WordSpan } from './types.js';
export { CHARS_PER_TOKEN } from './types.js';

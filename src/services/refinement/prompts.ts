/**
 * Refinement prompts for LLM-based chunk boundary review
 */

import type { ArticleMetadata, Chunk } from '../../core/types.js';

/** Longest context snippet taken from each neighbouring chunk */
export const CONTEXT_SNIPPET_CHARS = 120;

// =============================================================================
// REFINEMENT SYSTEM PROMPT
// =============================================================================

export const REFINEMENT_SYSTEM_PROMPT = `You review chunks of a long article that were split by a rule-based chunker. Each chunk will be embedded and retrieved on its own, so it should read as a self-contained passage.

For the chunk you are given, decide:

1. **action** - one of:
   - "keep": the chunk is fine as a unit
   - "merge_prev": the chunk only makes sense together with the previous chunk
   - "merge_next": the chunk only makes sense together with the next chunk
   - "drop": the chunk carries no retrievable content (boilerplate, navigation, ads)

2. **offset_adjust** - an integer number of characters to move the END of the chunk so that it closes on a sentence or paragraph boundary. Negative moves it earlier, positive moves it into the next chunk. Use 0 when the end is already clean.

3. **semantic_type** - one of "intro", "body", "list", "quote", "conclusion", "code".

4. **confidence** - a number between 0 and 1.

5. **reason** - one short sentence.

Respond with a single JSON object and nothing else:
{"action": "keep", "offset_adjust": 0, "semantic_type": "body", "confidence": 0.9, "reason": "..."}`;

// =============================================================================
// USER PROMPT
// =============================================================================

export interface RefinementPromptInput {
  article: ArticleMetadata;
  chunk: Chunk;
  previous?: Chunk;
  next?: Chunk;
}

export function tailSnippet(text: string, maxChars: number = CONTEXT_SNIPPET_CHARS): string {
  return text.length <= maxChars ? text : text.slice(text.length - maxChars);
}

export function headSnippet(text: string, maxChars: number = CONTEXT_SNIPPET_CHARS): string {
  return text.slice(0, maxChars);
}

export function buildRefinementPrompt(input: RefinementPromptInput): string {
  const { article, chunk, previous, next } = input;
  const lines: string[] = [];

  if (article.title) {
    lines.push(`Title: ${article.title}`);
  }
  lines.push(`Domain: ${article.domain}`);
  lines.push(`Language: ${article.language}`);
  lines.push(`Chunk ${chunk.index} (characters ${chunk.charStart}-${chunk.charEnd}, ${chunk.wordCount} words)`);
  lines.push('');

  lines.push('--- End of previous chunk ---');
  lines.push(previous ? tailSnippet(previous.text) : '(start of article)');
  lines.push('');
  lines.push('--- Chunk ---');
  lines.push(chunk.text);
  lines.push('');
  lines.push('--- Start of next chunk ---');
  lines.push(next ? headSnippet(next.text) : '(end of article)');

  return lines.join('\n');
}

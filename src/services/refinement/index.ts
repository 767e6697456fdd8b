/**
 * LLM refinement of routed chunks
 */

export { RefinementClient } from './refinement-client.js';
export type { RefinementClientOptions } from './refinement-client.js';
export type { RefinementContext, RefinementOutcome, RefinementOutcomeStatus } from './types.js';
export {
  REFINEMENT_SYSTEM_PROMPT,
  CONTEXT_SNIPPET_CHARS,
  buildRefinementPrompt,
  headSnippet,
  tailSnippet,
} from './prompts.js';
export { parseRefinementResponse, refinementResponseSchema } from './response-parser.js';
export type { RefinementResponse } from './response-parser.js';
export {
  createCompletionProvider,
  classifyProviderError,
  OpenAIProvider,
  AnthropicProvider,
} from './providers/index.js';
export type { CompletionProviderName } from './providers/index.js';

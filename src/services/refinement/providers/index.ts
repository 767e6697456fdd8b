/**
 * Completion provider factory
 */

import { OpenAIProvider } from './openai.provider.js';
import { AnthropicProvider } from './anthropic.provider.js';
import type { ICompletionProvider } from './types.js';
import type { LlmConfig } from '../../../config/index.js';

export { OpenAIProvider } from './openai.provider.js';
export { AnthropicProvider } from './anthropic.provider.js';
export { classifyProviderError } from './types.js';
export type { CompletionProviderName } from './types.js';

/**
 * Adapter for the configured provider, or null when refinement has no
 * provider.
 */
export function createCompletionProvider(config: LlmConfig): ICompletionProvider | null {
  switch (config.provider) {
    case 'openai':
      return new OpenAIProvider(config.apiKey, config.model, config.baseUrl);
    case 'anthropic':
      return new AnthropicProvider(config.apiKey, config.model, config.baseUrl);
    case 'disabled':
      return null;
  }
}

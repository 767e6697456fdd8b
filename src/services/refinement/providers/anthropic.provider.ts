/**
 * Anthropic provider for chunk refinement
 */

import Anthropic from '@anthropic-ai/sdk';
import { createComponentLogger } from '../../../utils/logger.js';
import { LLMFatalError } from '../../../core/errors.js';
import { REFINEMENT_SYSTEM_PROMPT } from '../prompts.js';
import { classifyProviderError } from './types.js';
import type { CompletionParameters, CompletionResult, ICompletionProvider } from './types.js';

const logger = createComponentLogger('anthropic-provider');

export class AnthropicProvider implements ICompletionProvider {
  readonly name = 'anthropic';
  readonly model: string;
  private client: Anthropic;

  constructor(apiKey: string, model: string, baseUrl?: string) {
    this.client = new Anthropic({
      apiKey,
      baseURL: baseUrl || undefined,
      maxRetries: 0, // Disable SDK retry
    });
    this.model = model;
  }

  async complete(prompt: string, parameters: CompletionParameters): Promise<CompletionResult> {
    const response = await this.client.messages
      .create(
        {
          model: this.model,
          max_tokens: parameters.maxOutputTokens,
          temperature: parameters.temperature,
          system: REFINEMENT_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal: parameters.signal }
      )
      .catch((error: unknown) => {
        const classified = classifyProviderError(error, this.name);
        logger.debug({ kind: classified.kind, model: this.model }, 'Anthropic completion failed');
        throw classified;
      });

    // Extract text content from response
    const textBlock = response.content.find((block) => block.type === 'text');
    if (!textBlock || textBlock.type !== 'text') {
      throw new LLMFatalError('no text content returned', 'malformed_response', this.name);
    }

    return {
      text: textBlock.text,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}

/**
 * OpenAI provider for chunk refinement
 */

import { OpenAI } from 'openai';
import { createComponentLogger } from '../../../utils/logger.js';
import { LLMFatalError } from '../../../core/errors.js';
import { REFINEMENT_SYSTEM_PROMPT } from '../prompts.js';
import { classifyProviderError } from './types.js';
import type { CompletionParameters, CompletionResult, ICompletionProvider } from './types.js';

const logger = createComponentLogger('openai-provider');

export class OpenAIProvider implements ICompletionProvider {
  readonly name = 'openai';
  readonly model: string;
  private client: OpenAI;

  constructor(apiKey: string, model: string, baseUrl?: string) {
    this.client = new OpenAI({
      apiKey,
      baseURL: baseUrl || undefined,
      maxRetries: 0, // Disable SDK retry - the refinement client retries
    });
    this.model = model;
  }

  async complete(prompt: string, parameters: CompletionParameters): Promise<CompletionResult> {
    const response = await this.client.chat.completions
      .create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: REFINEMENT_SYSTEM_PROMPT },
            { role: 'user', content: prompt },
          ],
          ...(parameters.jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
          temperature: parameters.temperature,
          max_tokens: parameters.maxOutputTokens,
        },
        { signal: parameters.signal }
      )
      .catch((error: unknown) => {
        const classified = classifyProviderError(error, this.name);
        logger.debug({ kind: classified.kind, model: this.model }, 'OpenAI completion failed');
        throw classified;
      });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new LLMFatalError(
        'no content in message - model may have refused to respond',
        'malformed_response',
        this.name
      );
    }

    return {
      text: content,
      model: response.model,
      ...(response.usage
        ? {
            usage: {
              inputTokens: response.usage.prompt_tokens,
              outputTokens: response.usage.completion_tokens,
            },
          }
        : {}),
    };
  }
}

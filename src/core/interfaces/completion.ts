/**
 * Completion provider port used by the refinement client
 */

export interface CompletionParameters {
  temperature: number;
  maxOutputTokens: number;
  /** Request a JSON object reply when the provider supports it */
  jsonMode: boolean;
  signal?: AbortSignal;
}

export interface CompletionUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionResult {
  text: string;
  model: string;
  usage?: CompletionUsage;
}

/**
 * A single text completion call. Implementations throw LLMTransientError
 * or LLMFatalError so callers can tell retryable failures apart.
 */
export interface ICompletionProvider {
  readonly name: string;
  readonly model: string;
  complete(prompt: string, parameters: CompletionParameters): Promise<CompletionResult>;
}

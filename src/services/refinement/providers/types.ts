/**
 * Completion provider types and error classification
 */

import { LLMFatalError, LLMTransientError, isLLMError, type LLMError } from '../../../core/errors.js';
import { isRetryableNetworkError } from '../../../utils/retry.js';

export type {
  ICompletionProvider,
  CompletionParameters,
  CompletionResult,
  CompletionUsage,
} from '../../../core/interfaces/completion.js';

export type CompletionProviderName = 'openai' | 'anthropic';

const QUOTA_PATTERN = /insufficient_quota|quota|billing|credit balance/i;
const TIMEOUT_PATTERN = /timed? ?out|timeout|ETIMEDOUT/i;
const NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE']);

function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function readCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map an SDK or transport error to a transient or fatal LLM error.
 *
 * 429 rate_limit, 401/403 auth, 400/404/422 invalid_request,
 * 402 or a quota message quota, 5xx server, timeouts and connection
 * failures timeout/network, anything else unknown (transient).
 */
export function classifyProviderError(error: unknown, provider: string): LLMError {
  if (isLLMError(error)) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const status = readStatus(error);
  const code = readCode(error);
  const message = cause.message;
  const context = { status, code };

  if (status === 402 || code === 'insufficient_quota' || (status !== undefined && QUOTA_PATTERN.test(message))) {
    return new LLMFatalError(`Provider quota exhausted: ${message}`, 'quota', provider, context);
  }
  if (status === 429) {
    return new LLMTransientError(`Provider rate limited the call: ${message}`, 'rate_limit', provider, context);
  }
  if (status === 401 || status === 403) {
    return new LLMFatalError(`Provider rejected credentials: ${message}`, 'auth', provider, context);
  }
  if (status === 400 || status === 404 || status === 422) {
    return new LLMFatalError(`Provider rejected the request: ${message}`, 'invalid_request', provider, context);
  }
  if (status === 408) {
    return new LLMTransientError(`Provider request timed out: ${message}`, 'timeout', provider, context);
  }
  if (status !== undefined && status >= 500) {
    return new LLMTransientError(`Provider server error: ${message}`, 'server', provider, context);
  }

  if (cause.name === 'AbortError' || cause.name.includes('Timeout') || TIMEOUT_PATTERN.test(message)) {
    return new LLMTransientError(`Provider call timed out: ${message}`, 'timeout', provider, context);
  }
  if ((code !== undefined && NETWORK_CODES.has(code)) || isRetryableNetworkError(cause)) {
    return new LLMTransientError(`Provider connection failed: ${message}`, 'network', provider, context);
  }

  return new LLMTransientError(`Provider call failed: ${message}`, 'unknown', provider, context);
}

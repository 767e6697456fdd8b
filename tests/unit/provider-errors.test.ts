import { describe, it, expect } from 'vitest';
import { classifyProviderError } from '../../src/services/refinement/providers/types.js';
import { createCompletionProvider } from '../../src/services/refinement/providers/index.js';
import { LLMFatalError, LLMTransientError } from '../../src/core/errors.js';
import { defaultConfig } from '../../src/config/index.js';
import { httpError } from '../fixtures/fake-provider.js';

describe('classifyProviderError', () => {
  it.each([
    [429, 'rate_limit'],
    [408, 'timeout'],
    [500, 'server'],
    [503, 'server'],
  ] as const)('should treat HTTP %i as transient %s', (status, kind) => {
    const error = classifyProviderError(httpError(status), 'openai');

    expect(error).toBeInstanceOf(LLMTransientError);
    expect(error.kind).toBe(kind);
    expect(error.retryable).toBe(true);
    expect(error.provider).toBe('openai');
  });

  it.each([
    [401, 'auth'],
    [403, 'auth'],
    [400, 'invalid_request'],
    [404, 'invalid_request'],
    [422, 'invalid_request'],
    [402, 'quota'],
  ] as const)('should treat HTTP %i as fatal %s', (status, kind) => {
    const error = classifyProviderError(httpError(status), 'anthropic');

    expect(error).toBeInstanceOf(LLMFatalError);
    expect(error.kind).toBe(kind);
    expect(error.code).toBe('E4001');
  });

  it('should treat an exhausted quota reported as 429 as fatal', () => {
    const error = classifyProviderError(httpError(429, 'You exceeded your current quota'), 'openai');

    expect(error).toBeInstanceOf(LLMFatalError);
    expect(error.kind).toBe('quota');
  });

  it('should treat aborted requests as timeouts', () => {
    const aborted = Object.assign(new Error('Request was aborted'), { name: 'AbortError' });
    const error = classifyProviderError(aborted, 'openai');

    expect(error.kind).toBe('timeout');
    expect(error.code).toBe('E4002');
  });

  it('should treat connection resets as network errors', () => {
    const reset = Object.assign(new Error('socket closed'), { code: 'ECONNRESET' });

    expect(classifyProviderError(reset, 'openai').kind).toBe('network');
  });

  it('should treat anything else as unknown and transient', () => {
    const error = classifyProviderError('boom', 'openai');

    expect(error).toBeInstanceOf(LLMTransientError);
    expect(error.kind).toBe('unknown');
    expect(error.message).toBe('Provider call failed: boom');
  });

  it('should pass classified errors through unchanged', () => {
    const original = new LLMFatalError('bad reply', 'malformed_response', 'openai');

    expect(classifyProviderError(original, 'openai')).toBe(original);
  });
});

describe('createCompletionProvider', () => {
  it('should return null when refinement has no provider', () => {
    expect(createCompletionProvider(defaultConfig().llm)).toBeNull();
  });

  it('should build the configured provider', () => {
    const llm = { ...defaultConfig().llm, provider: 'openai' as const, apiKey: 'test-secret' };
    const provider = createCompletionProvider(llm);

    expect(provider?.name).toBe('openai');
    expect(provider?.model).toBe('gpt-4o-mini');
  });

  it('should build an anthropic provider', () => {
    const llm = {
      ...defaultConfig().llm,
      provider: 'anthropic' as const,
      apiKey: 'test-secret',
      model: 'claude-3-5-haiku-latest',
    };

    expect(createCompletionProvider(llm)?.name).toBe('anthropic');
  });
});

import { describe, it, expect } from 'vitest';
import { parseRefinementResponse } from '../../src/services/refinement/response-parser.js';
import { buildRefinementPrompt, headSnippet, tailSnippet } from '../../src/services/refinement/prompts.js';
import { LLMFatalError } from '../../src/core/errors.js';
import type { Chunk } from '../../src/core/types.js';

function parseError(content: string): LLMFatalError {
  try {
    parseRefinementResponse(content, 'fake');
  } catch (error) {
    if (error instanceof LLMFatalError) return error;
    throw error;
  }
  throw new Error('expected the reply to be rejected');
}

const VALID = '{"action":"merge_next","offset_adjust":-12,"semantic_type":"list","confidence":0.8,"reason":"split list"}';

describe('parseRefinementResponse', () => {
  it('should parse a bare JSON object', () => {
    expect(parseRefinementResponse(VALID, 'fake')).toEqual({
      action: 'merge_next',
      offset_adjust: -12,
      semantic_type: 'list',
      confidence: 0.8,
      reason: 'split list',
    });
  });

  it('should default the optional fields', () => {
    const parsed = parseRefinementResponse('{"action":"keep","semantic_type":"body","confidence":1}', 'fake');

    expect(parsed.offset_adjust).toBe(0);
    expect(parsed.reason).toBe('');
  });

  it('should unwrap a markdown code fence', () => {
    expect(parseRefinementResponse('```json\n' + VALID + '\n```', 'fake').action).toBe('merge_next');
  });

  it('should ignore prose around the object', () => {
    expect(parseRefinementResponse(`Here is my review: ${VALID} Hope this helps.`, 'fake').offset_adjust).toBe(-12);
  });

  it('should reject text that is not JSON', () => {
    const error = parseError('I think the chunk is fine.');

    expect(error.kind).toBe('malformed_response');
    expect(error.code).toBe('E4003');
    expect(error.retryable).toBe(false);
  });

  it.each([
    ['an unknown action', '{"action":"split","semantic_type":"body","confidence":0.5}', 'action'],
    ['an unknown semantic type', '{"action":"keep","semantic_type":"table","confidence":0.5}', 'semantic_type'],
    ['a confidence above 1', '{"action":"keep","semantic_type":"body","confidence":1.5}', 'confidence'],
    ['a fractional offset', '{"action":"keep","offset_adjust":2.5,"semantic_type":"body","confidence":0.5}', 'offset_adjust'],
    ['a missing confidence', '{"action":"keep","semantic_type":"body"}', 'confidence'],
  ])('should reject %s', (_label, content, field) => {
    const error = parseError(content);

    expect(error.kind).toBe('malformed_response');
    expect(error.message).toContain(field);
  });
});

describe('buildRefinementPrompt', () => {
  function chunk(index: number, text: string, charStart: number): Chunk {
    return {
      id: `c${index}`,
      articleId: 'a1',
      index,
      text,
      charStart,
      charEnd: charStart + text.length,
      wordCount: text.split(' ').length,
      tokenEstimate: Math.ceil(text.length / 4),
      overlapPrevious: 0,
      semanticType: 'body',
      scores: null,
      confidence: null,
      routingReasons: [],
      refinementStatus: 'unrefined',
      refinement: null,
      dropSuggested: false,
    };
  }

  it('should frame the chunk with its neighbours', () => {
    const prompt = buildRefinementPrompt({
      article: { id: 'a1', domain: 'example.com', language: 'en', title: 'Harbor notes', metadata: {} },
      chunk: chunk(1, 'Middle part.', 10),
      previous: chunk(0, 'First part.', 0),
      next: chunk(2, 'Last part.', 22),
    });

    expect(prompt.split('\n')).toEqual([
      'Title: Harbor notes',
      'Domain: example.com',
      'Language: en',
      'Chunk 1 (characters 10-22, 2 words)',
      '',
      '--- End of previous chunk ---',
      'First part.',
      '',
      '--- Chunk ---',
      'Middle part.',
      '',
      '--- Start of next chunk ---',
      'Last part.',
    ]);
  });

  it('should mark the article edges', () => {
    const prompt = buildRefinementPrompt({
      article: { id: 'a1', domain: 'example.com', language: 'en', metadata: {} },
      chunk: chunk(0, 'Only part.', 0),
    });

    expect(prompt).toContain('(start of article)');
    expect(prompt).toContain('(end of article)');
    expect(prompt.startsWith('Domain: example.com')).toBe(true);
  });

  it('should trim context snippets', () => {
    expect(tailSnippet('abcdef', 3)).toBe('def');
    expect(headSnippet('abcdef', 3)).toBe('abc');
    expect(tailSnippet('ab', 3)).toBe('ab');
  });
});

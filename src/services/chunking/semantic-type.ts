/**
 * Heuristic semantic type of a chunk
 */

import type { SemanticType } from '../../core/types.js';

const LIST_LINE = /^\s*(?:[-*+•]|\d+[.)])\s+/;
const QUOTE_LINE = /^\s*>/;
const INDENTED_CODE_LINE = /^(?: {4}|\t)\S/;
const FENCE = /```/;

function nonEmptyLines(text: string): string[] {
  return text.split('\n').filter((line) => line.trim().length > 0);
}

function share(lines: string[], pattern: RegExp): number {
  if (lines.length === 0) return 0;
  return lines.filter((line) => pattern.test(line)).length / lines.length;
}

/**
 * Classify a chunk by its structure first, then by its position.
 * A lone chunk is always `body` unless its structure says otherwise.
 */
export function detectSemanticType(text: string, index: number, total: number): SemanticType {
  const lines = nonEmptyLines(text);

  if (FENCE.test(text) || share(lines, INDENTED_CODE_LINE) >= 0.5) {
    return 'code';
  }
  if (share(lines, LIST_LINE) >= 0.5) {
    return 'list';
  }
  if (share(lines, QUOTE_LINE) >= 0.5) {
    return 'quote';
  }

  if (total > 1) {
    if (index === 0) return 'intro';
    if (index === total - 1) return 'conclusion';
  }
  return 'body';
}

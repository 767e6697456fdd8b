/**
 * Quality signals scored by the router. Each factor lies in [0, 1] and a
 * higher value means the base chunk is more likely good as it is.
 */

export const BOUNDARY_PENALTIES = {
  start: 0.3,
  end: 0.3,
  danglingPunctuation: 0.2,
  continuationWord: 0.2,
} as const;

export const COMPLEXITY_PENALTIES = {
  listShare: 0.4,
  tableShare: 0.4,
  codeFence: 0.2,
  unbalancedFence: 0.2,
  perHeading: 0.1,
  maxHeadings: 0.2,
  unbalancedBrackets: 0.1,
  unbalancedQuotes: 0.1,
  perMarkupMarker: 0.02,
  maxMarkup: 0.1,
} as const;

const CONTINUATION_WORDS = new Set([
  'and',
  'but',
  'or',
  'so',
  'yet',
  'nor',
  'however',
  'therefore',
  'thus',
  'also',
  'then',
  'because',
  'which',
  'moreover',
  'furthermore',
  'meanwhile',
]);

const SENTENCE_START = /^[\p{Lu}\p{N}"'“‘\(\[*•#>-]/u;
const SENTENCE_CLOSE = /[.!?…]["'”’)\]]*$/;
const DANGLING_END = /[,;:\-–—]$/;
const LIST_LINE = /^\s*(?:[-*+•]|\d+[.)])\s+/;
const TABLE_LINE = /\|.*\|/;
const HEADING_LINE = /^\s*#{1,6}\s/;
const MARKUP = /\*\*|__|`[^`\n]+`|<\/?[a-z][^>]*>/gi;

export interface BoundaryPosition {
  /** First chunk of the article: its start is aligned by construction */
  isFirst: boolean;
  /** Last chunk of the article: its end is aligned by construction */
  isLast: boolean;
}

export interface BoundarySignal {
  score: number;
  startMisaligned: boolean;
  endMisaligned: boolean;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function firstWord(text: string): string {
  const match = /^[^\p{L}]*(\p{L}+)/u.exec(text);
  return match?.[1]?.toLowerCase() ?? '';
}

export function scoreBoundary(text: string, position: BoundaryPosition): BoundarySignal {
  const head = text.trimStart();
  const tail = text.trimEnd();
  let penalty = 0;
  let startMisaligned = false;
  let endMisaligned = false;

  if (!position.isFirst) {
    if (!SENTENCE_START.test(head)) {
      penalty += BOUNDARY_PENALTIES.start;
      startMisaligned = true;
    }
    if (CONTINUATION_WORDS.has(firstWord(head))) {
      penalty += BOUNDARY_PENALTIES.continuationWord;
      startMisaligned = true;
    }
  }

  if (!position.isLast) {
    if (!SENTENCE_CLOSE.test(tail)) {
      penalty += BOUNDARY_PENALTIES.end;
      endMisaligned = true;
    }
    if (DANGLING_END.test(tail)) {
      penalty += BOUNDARY_PENALTIES.danglingPunctuation;
      endMisaligned = true;
    }
  }

  return { score: clamp01(1 - penalty), startMisaligned, endMisaligned };
}

export interface SizeBounds {
  targetWords: number;
  minWords: number;
  maxWords: number;
}

/**
 * 1 at the target, falling linearly to 0 at min (below) or max (above)
 */
export function scoreSize(wordCount: number, bounds: SizeBounds): number {
  const { targetWords, minWords, maxWords } = bounds;
  const deviation =
    wordCount <= targetWords
      ? (targetWords - wordCount) / (targetWords - minWords)
      : (wordCount - targetWords) / (maxWords - targetWords);
  return 1 - clamp01(deviation);
}

function countOf(text: string, char: string): number {
  return text.split(char).length - 1;
}

export function complexityPenalty(text: string): number {
  const lines = text.split('\n').filter((line) => line.trim().length > 0);
  const p = COMPLEXITY_PENALTIES;
  let penalty = 0;

  if (lines.length > 0) {
    penalty += p.listShare * (lines.filter((line) => LIST_LINE.test(line)).length / lines.length);
    penalty += p.tableShare * (lines.filter((line) => TABLE_LINE.test(line)).length / lines.length);
    const headings = lines.filter((line) => HEADING_LINE.test(line)).length;
    penalty += Math.min(p.maxHeadings, p.perHeading * headings);
  }

  const fences = text.match(/```/g)?.length ?? 0;
  if (fences > 0) {
    penalty += p.codeFence;
    if (fences % 2 === 1) penalty += p.unbalancedFence;
  }

  if (countOf(text, '(') !== countOf(text, ')') || countOf(text, '[') !== countOf(text, ']')) {
    penalty += p.unbalancedBrackets;
  }
  if (countOf(text, '"') % 2 === 1 || countOf(text, '“') !== countOf(text, '”')) {
    penalty += p.unbalancedQuotes;
  }

  const markup = text.match(MARKUP)?.length ?? 0;
  penalty += Math.min(p.maxMarkup, p.perMarkupMarker * markup);

  return penalty;
}

export function scoreComplexity(text: string): number {
  return 1 - clamp01(complexityPenalty(text));
}

/**
 * Token cost model for refinement calls
 */

import type { RateLimitConfig } from '../../config/index.js';
import type { CompletionUsage } from '../../core/interfaces/completion.js';

/** Share of estimated tokens billed at the input rate; the rest at the output rate */
export const INPUT_TOKEN_SHARE = 0.8;

export type CostModel = Pick<
  RateLimitConfig,
  'costPerTokenInput' | 'costPerTokenOutput' | 'promptOverheadTokens'
>;

export function estimateCallTokens(text: string, model: CostModel): number {
  return Math.floor(text.length / 4) + model.promptOverheadTokens;
}

/**
 * Pre-call estimate used to reserve budget
 */
export function estimateCallCost(text: string, model: CostModel): number {
  const tokens = estimateCallTokens(text, model);
  return (
    tokens * INPUT_TOKEN_SHARE * model.costPerTokenInput +
    tokens * (1 - INPUT_TOKEN_SHARE) * model.costPerTokenOutput
  );
}

/**
 * Cost of a call whose provider reported token usage
 */
export function costOfUsage(usage: CompletionUsage, model: CostModel): number {
  return usage.inputTokens * model.costPerTokenInput + usage.outputTokens * model.costPerTokenOutput;
}

export { LlmRateLimiter } from './llm-rate-limiter.js';
export type {
  Admission,
  AdmissionRequest,
  BatchBudgetStats,
  RateLimitDenialReason,
  RateLimiterStats,
  RateLimitTicket,
} from './llm-rate-limiter.js';
export { estimateCallCost, estimateCallTokens, costOfUsage, INPUT_TOKEN_SHARE } from './cost-model.js';
export type { CostModel } from './cost-model.js';

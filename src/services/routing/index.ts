export { QualityRouter } from './quality-router.js';
export type { RoutingContext } from './quality-router.js';
export {
  scoreBoundary,
  scoreSize,
  scoreComplexity,
  complexityPenalty,
  BOUNDARY_PENALTIES,
  COMPLEXITY_PENALTIES,
} from './signals.js';
export type { BoundaryPosition, BoundarySignal, SizeBounds } from './signals.js';

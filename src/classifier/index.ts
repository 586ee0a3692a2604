export type {
  Batch,
  BatchFailure,
  BatchResult,
  EvaluateOptions,
  EvaluationRun,
} from './evaluation.js';
export { evaluateBatches } from './evaluation.js';
export type { ClassifierOptions, ProbabilityRows } from './tracker.js';
export { ClassificationTracker } from './tracker.js';

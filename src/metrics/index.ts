export type { AUCMetricsInit } from './auc.js';
export {
  AUCMetrics,
  bisectLeft,
  bisectRight,
  DEFAULT_DECIMAL_PLACES,
  mergeSortedUnique,
  SENTINEL_THRESHOLD,
} from './auc.js';
export { AverageMetric } from './average.js';
export { Metric, mergeAll } from './base.js';
export {
  ClassificationF1Metric,
  ConfusionMatrixMetric,
  PrecisionMetric,
  RecallMetric,
} from './confusion-matrix.js';
export { WeightedF1Metric } from './weighted-f1.js';

/**
 * classifier-metrics: mergeable classification metrics for sharded evaluation.
 *
 * @example
 * ```ts
 * import { ClassificationTracker, evaluateBatches } from 'classifier-metrics';
 *
 * const tracker = new ClassificationTracker({
 *   classes: ['spam', 'ham'],
 *   areaUnderCurve: true,
 * });
 *
 * const run = await evaluateBatches(
 *   tracker,
 *   [{ name: 'week-1', inputs: messages, labels: ['spam', 'ham', 'ham'] }],
 *   (batch) => model.probabilities(batch),
 * );
 * run.print();
 * ```
 */

// Classifier
export type {
  Batch,
  BatchFailure,
  BatchResult,
  ClassifierOptions,
  EvaluateOptions,
  EvaluationRun,
  ProbabilityRows,
} from './classifier/index.js';
export { ClassificationTracker, evaluateBatches } from './classifier/index.js';
// Step context
export { inStepRun, recordLocalMetric, withStepRun } from './context.js';
// Errors
export {
  ConfigError,
  DegenerateMetricError,
  MetricContractError,
  MetricMergeError,
  UnknownLabelError,
} from './errors.js';
// Metrics
export type { AUCMetricsInit } from './metrics/index.js';
export {
  AUCMetrics,
  AverageMetric,
  ClassificationF1Metric,
  ConfusionMatrixMetric,
  Metric,
  mergeAll,
  PrecisionMetric,
  RecallMetric,
  WeightedF1Metric,
} from './metrics/index.js';
// Reporting
export type { MetricReport, RendererOptions } from './reporting/index.js';
export {
  aggregateShardReports,
  MetricRegistry,
  renderMetricsTable,
  renderMetricValue,
  roundSigfigs,
} from './reporting/index.js';
export type { FileFormat, LoadOptions, RegistryState } from './serialization/index.js';
// Serialization
export {
  classifierConfigSchema,
  deserializeMetric,
  deserializeRegistry,
  loadClassifierConfigFromFile,
  loadClassifierConfigFromObject,
  loadRegistryFromFile,
  loadRegistryFromText,
  metricStateSchema,
  registryStateSchema,
  saveRegistryToFile,
  serializeMetric,
  serializeRegistry,
} from './serialization/index.js';
// Core types
export type {
  AUCState,
  AverageState,
  ConfusionCounts,
  ConfusionMatrixState,
  Label,
  MetricKind,
  MetricState,
  RocBucket,
  RocPoint,
  WeightedF1State,
} from './types.js';
export { isLabel } from './types.js';

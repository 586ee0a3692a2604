/**
 * Core type definitions shared by the metric accumulators.
 */

/**
 * A class identifier. Labels are opaque: they are only ever compared with `===`.
 */
export type Label = string | number;

/**
 * Discriminant carried by every metric. Merges compare kinds, never classes.
 */
export type MetricKind = 'precision' | 'recall' | 'f1' | 'weighted_f1' | 'auc' | 'average';

/**
 * The four tallies of a binary confusion matrix. Counts may be fractional weights.
 */
export interface ConfusionCounts {
  truePositives: number;
  trueNegatives: number;
  falsePositives: number;
  falseNegatives: number;
}

/**
 * Cumulative counts at one threshold: samples whose probability is at least
 * the threshold, split by class membership.
 */
export type RocBucket = readonly [falsePositives: number, truePositives: number];

export interface RocPoint {
  threshold: number;
  falsePositiveRate: number;
  truePositiveRate: number;
}

// -- Serializable metric state --

export interface ConfusionMatrixState extends ConfusionCounts {
  kind: 'precision' | 'recall' | 'f1';
}

export interface WeightedF1State {
  kind: 'weighted_f1';
  classes: ({ label: Label } & ConfusionCounts)[];
}

export interface AUCState {
  kind: 'auc';
  classLabel: Label;
  /** Ascending, distinct. */
  thresholds: readonly number[];
  /** `buckets[i]` holds the counts for `thresholds[i]`. */
  buckets: readonly RocBucket[];
  positiveCount: number;
  negativeCount: number;
}

export interface AverageState {
  kind: 'average';
  numer: number;
  denom: number;
}

/**
 * Plain-data form of any metric, suitable for JSON/YAML and for shipping
 * shard accumulators between processes.
 */
export type MetricState = ConfusionMatrixState | WeightedF1State | AUCState | AverageState;

/**
 * Helper to check if a value is a usable label.
 */
export function isLabel(v: unknown): v is Label {
  return typeof v === 'string' || (typeof v === 'number' && Number.isFinite(v));
}

/**
 * Exact ROC-AUC over a quantized threshold grid, mergeable across shards.
 */

import { DegenerateMetricError, MetricContractError, MetricMergeError } from '../errors.js';
import { type AUCState, isLabel, type Label, type RocBucket, type RocPoint } from '../types.js';
import { Metric } from './base.js';

/** A threshold no probability can reach, so "predict nothing" is on every curve. */
export const SENTINEL_THRESHOLD = 1.5;

export const DEFAULT_DECIMAL_PLACES = 3;

const EMPTY_BUCKET: RocBucket = Object.freeze([0, 0] as const);

export type AUCMetricsInit = Omit<AUCState, 'kind'>;

/**
 * Cumulative (false positive, true positive) counts on a sorted threshold grid.
 *
 * `bucket(t)` counts the samples whose predicted probability is at least `t`,
 * split by whether their true label is `classLabel`. Counts never increase as
 * the threshold rises.
 */
export class AUCMetrics extends Metric {
  readonly kind = 'auc';
  readonly classLabel: Label;
  readonly positiveCount: number;
  readonly negativeCount: number;
  private readonly sortedThresholds: readonly number[];
  private readonly buckets: readonly RocBucket[];

  constructor(state: AUCMetricsInit) {
    super();
    const problem = findAucStateProblem(state);
    if (problem !== null) {
      throw new MetricContractError(problem);
    }

    this.classLabel = state.classLabel;
    this.positiveCount = state.positiveCount;
    this.negativeCount = state.negativeCount;
    this.sortedThresholds = Object.freeze([...state.thresholds]);
    this.buckets = Object.freeze(
      state.buckets.map(([fp, tp]): RocBucket => Object.freeze([fp, tp] as const)),
    );
  }

  get macroAverage(): boolean {
    return false;
  }

  get thresholds(): readonly number[] {
    return this.sortedThresholds;
  }

  /** True for the accumulator built from no data; it is the merge identity. */
  get isEmpty(): boolean {
    return this.sortedThresholds.length === 0;
  }

  /**
   * Build the accumulator for one batch of (label, probability) pairs.
   *
   * Every probability contributes both grid points of the cell it falls in,
   * at `decimalPlaces` precision, so any boundary between two distinct
   * quantized probabilities is a threshold.
   */
  static rawDataToAuc(
    trueLabels: readonly Label[],
    classProbabilities: readonly number[],
    classLabel: Label,
    decimalPlaces = DEFAULT_DECIMAL_PLACES,
  ): AUCMetrics {
    if (trueLabels.length !== classProbabilities.length) {
      throw new MetricContractError(
        `Got ${classProbabilities.length} probabilities for ${trueLabels.length} labels`,
      );
    }
    if (!Number.isInteger(decimalPlaces) || decimalPlaces < 0) {
      throw new MetricContractError(
        `decimalPlaces must be a non-negative integer, got ${decimalPlaces}`,
      );
    }
    if (!isLabel(classLabel) || !trueLabels.every(isLabel)) {
      throw new MetricContractError('Labels must be strings or finite numbers');
    }
    for (const p of classProbabilities) {
      if (!Number.isFinite(p) || p < 0 || p > 1) {
        throw new MetricContractError(`Probabilities must lie in [0, 1], got ${p}`);
      }
    }

    if (classProbabilities.length === 0) {
      return new AUCMetrics({
        classLabel,
        thresholds: [],
        buckets: [],
        positiveCount: 0,
        negativeCount: 0,
      });
    }

    const scale = 10 ** decimalPlaces;
    const grid = new Set<number>([SENTINEL_THRESHOLD]);
    for (const p of classProbabilities) {
      grid.add(Math.floor(p * scale) / scale);
      grid.add(Math.ceil(p * scale) / scale);
    }
    const thresholds = [...grid].sort((a, b) => a - b);

    // cutoffs[k]: samples that clear exactly the first k thresholds
    const fpCutoffs = new Array<number>(thresholds.length + 1).fill(0);
    const tpCutoffs = new Array<number>(thresholds.length + 1).fill(0);
    let positiveCount = 0;

    trueLabels.forEach((label, i) => {
      const p = classProbabilities[i] ?? 0;
      let cut = bisectLeft(thresholds, p);
      if (thresholds[cut] === p) cut += 1;

      if (label === classLabel) {
        positiveCount += 1;
        tpCutoffs[cut] = (tpCutoffs[cut] ?? 0) + 1;
      } else {
        fpCutoffs[cut] = (fpCutoffs[cut] ?? 0) + 1;
      }
    });

    const buckets: RocBucket[] = new Array<RocBucket>(thresholds.length);
    let fp = 0;
    let tp = 0;
    for (let j = thresholds.length - 1; j >= 0; j--) {
      fp += fpCutoffs[j + 1] ?? 0;
      tp += tpCutoffs[j + 1] ?? 0;
      buckets[j] = [fp, tp];
    }

    return new AUCMetrics({
      classLabel,
      thresholds,
      buckets,
      positiveCount,
      negativeCount: trueLabels.length - positiveCount,
    });
  }

  /**
   * Counts at an arbitrary threshold.
   *
   * An exact grid point answers directly. Otherwise the counts are constant up
   * to the next grid point, so the smallest grid threshold strictly above
   * `threshold` answers, clamped to the last one.
   */
  bucket(threshold: number): RocBucket {
    const n = this.sortedThresholds.length;
    if (n === 0) return EMPTY_BUCKET;

    const exact = bisectLeft(this.sortedThresholds, threshold);
    if (this.sortedThresholds[exact] === threshold) {
      return this.buckets[exact] ?? EMPTY_BUCKET;
    }
    const next = Math.min(bisectRight(this.sortedThresholds, threshold), n - 1);
    return this.buckets[next] ?? EMPTY_BUCKET;
  }

  merge(other?: AUCMetrics | null): AUCMetrics {
    if (other == null) return this;
    this.assertSameKind(other);
    if (other.classLabel !== this.classLabel) {
      throw new MetricMergeError(
        `Cannot merge ROC curves for class '${String(this.classLabel)}' and class '${String(other.classLabel)}'`,
      );
    }

    const thresholds = mergeSortedUnique(this.sortedThresholds, other.sortedThresholds);
    const buckets = thresholds.map((t): RocBucket => {
      const [selfFp, selfTp] = this.bucket(t);
      const [otherFp, otherTp] = other.bucket(t);
      return [selfFp + otherFp, selfTp + otherTp];
    });

    return new AUCMetrics({
      classLabel: this.classLabel,
      thresholds,
      buckets,
      positiveCount: this.positiveCount + other.positiveCount,
      negativeCount: this.negativeCount + other.negativeCount,
    });
  }

  /**
   * ROC points in ascending threshold order, i.e. from (1, 1) down to (0, 0).
   */
  rocCurve(): RocPoint[] {
    if (this.positiveCount === 0 || this.negativeCount === 0) {
      throw new DegenerateMetricError(
        `ROC is undefined with ${this.positiveCount} positive and ${this.negativeCount} negative samples`,
      );
    }
    return this.sortedThresholds.map((threshold, i) => {
      const [fp, tp] = this.buckets[i] ?? EMPTY_BUCKET;
      return {
        threshold,
        falsePositiveRate: fp / this.negativeCount,
        truePositiveRate: tp / this.positiveCount,
      };
    });
  }

  /**
   * Area under the ROC curve.
   *
   * The points run right to left, so the trapezoids are taken along the
   * true-positive axis; that area lies above the curve and the AUC is its
   * complement.
   */
  value(): number {
    const curve = this.rocCurve();
    let area = 0;
    for (let i = 1; i < curve.length; i++) {
      const prev = curve[i - 1];
      const cur = curve[i];
      if (!prev || !cur) continue;
      area +=
        ((prev.truePositiveRate - cur.truePositiveRate) *
          (prev.falsePositiveRate + cur.falsePositiveRate)) /
        2;
    }
    return 1 - area;
  }

  state(): AUCState {
    return {
      kind: this.kind,
      classLabel: this.classLabel,
      thresholds: [...this.sortedThresholds],
      buckets: this.buckets.map(([fp, tp]): RocBucket => [fp, tp]),
      positiveCount: this.positiveCount,
      negativeCount: this.negativeCount,
    };
  }

  override toString(): string {
    return `auc(class=${String(this.classLabel)}, positives=${this.positiveCount}, negatives=${this.negativeCount}, thresholds=${this.sortedThresholds.length})`;
  }
}

/**
 * Why `state` cannot describe a ROC accumulator, or null when it can.
 *
 * Counts are finite and non-negative, thresholds strictly ascending, and each
 * bucket is bounded by the class totals and no larger than the one before it.
 */
export function findAucStateProblem(state: AUCMetricsInit): string | null {
  const { thresholds, buckets, positiveCount, negativeCount } = state;
  if (!isCount(positiveCount) || !isCount(negativeCount)) {
    return `Class totals must be non-negative numbers, got ${positiveCount} positive and ${negativeCount} negative`;
  }
  if (thresholds.length !== buckets.length) {
    return `Got ${buckets.length} buckets for ${thresholds.length} thresholds`;
  }

  let prevThreshold = Number.NEGATIVE_INFINITY;
  let prevFp = negativeCount;
  let prevTp = positiveCount;
  for (let i = 0; i < thresholds.length; i++) {
    const threshold = thresholds[i] ?? Number.NaN;
    const [fp, tp] = buckets[i] ?? EMPTY_BUCKET;
    if (!(threshold > prevThreshold)) {
      return 'Thresholds must be strictly ascending';
    }
    if (!isCount(fp) || !isCount(tp)) {
      return `Bucket counts must be non-negative numbers, got [${fp}, ${tp}] at threshold ${threshold}`;
    }
    if (fp > prevFp || tp > prevTp) {
      return `Bucket counts must not exceed the class totals or increase with the threshold, got [${fp}, ${tp}] at threshold ${threshold}`;
    }
    prevThreshold = threshold;
    prevFp = fp;
    prevTp = tp;
  }
  return null;
}

function isCount(n: number): boolean {
  return Number.isFinite(n) && n >= 0;
}

// -- Sorted-array helpers --

/** Index of the first element >= `x`. */
export function bisectLeft(sorted: readonly number[], x: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((sorted[mid] ?? Number.POSITIVE_INFINITY) < x) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Index of the first element > `x`. */
export function bisectRight(sorted: readonly number[], x: number): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((sorted[mid] ?? Number.POSITIVE_INFINITY) <= x) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/**
 * Union of two ascending, duplicate-free arrays, in one linear pass.
 */
export function mergeSortedUnique(a: readonly number[], b: readonly number[]): number[] {
  const out: number[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const x = a[i] ?? 0;
    const y = b[j] ?? 0;
    if (x < y) {
      out.push(x);
      i++;
    } else if (y < x) {
      out.push(y);
      j++;
    } else {
      out.push(x);
      i++;
      j++;
    }
  }
  return out.concat(a.slice(i), b.slice(j));
}

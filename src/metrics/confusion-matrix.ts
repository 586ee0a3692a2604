/**
 * Confusion-matrix accumulators: precision, recall and F1 over shared TP/TN/FP/FN counts.
 */

import { MetricContractError } from '../errors.js';
import { type ConfusionCounts, type ConfusionMatrixState, isLabel, type Label } from '../types.js';
import { Metric } from './base.js';

const COUNT_FIELDS = ['truePositives', 'trueNegatives', 'falsePositives', 'falseNegatives'] as const;

const EMPTY_COUNTS: ConfusionCounts = {
  truePositives: 0,
  trueNegatives: 0,
  falsePositives: 0,
  falseNegatives: 0,
};

/**
 * Keeps the counts of a binary confusion matrix.
 *
 * The concrete variants differ only in how `value()` reads the counts; merging
 * adds the counts element-wise and keeps the variant of the receiver.
 */
export abstract class ConfusionMatrixMetric extends Metric {
  abstract override readonly kind: 'precision' | 'recall' | 'f1';

  readonly truePositives: number;
  readonly trueNegatives: number;
  readonly falsePositives: number;
  readonly falseNegatives: number;

  constructor(counts: Partial<ConfusionCounts> = {}) {
    super();
    const full = { ...EMPTY_COUNTS, ...counts };
    for (const field of COUNT_FIELDS) {
      const n = full[field];
      if (!Number.isFinite(n) || n < 0) {
        throw new MetricContractError(`${field} must be a non-negative number, got ${n}`);
      }
    }
    this.truePositives = full.truePositives;
    this.trueNegatives = full.trueNegatives;
    this.falsePositives = full.falsePositives;
    this.falseNegatives = full.falseNegatives;
  }

  get macroAverage(): boolean {
    return true;
  }

  counts(): ConfusionCounts {
    return {
      truePositives: this.truePositives,
      trueNegatives: this.trueNegatives,
      falsePositives: this.falsePositives,
      falseNegatives: this.falseNegatives,
    };
  }

  state(): ConfusionMatrixState {
    return { kind: this.kind, ...this.counts() };
  }

  /** Total number (or weight) of examples judged. */
  get total(): number {
    return this.truePositives + this.trueNegatives + this.falsePositives + this.falseNegatives;
  }

  abstract override merge(other?: ConfusionMatrixMetric | null): ConfusionMatrixMetric;

  protected sumCounts(other: ConfusionMatrixMetric): ConfusionCounts {
    this.assertSameKind(other);
    return {
      truePositives: this.truePositives + other.truePositives,
      trueNegatives: this.trueNegatives + other.trueNegatives,
      falsePositives: this.falsePositives + other.falsePositives,
      falseNegatives: this.falseNegatives + other.falseNegatives,
    };
  }

  /**
   * Build the three derived views from one count tuple.
   */
  static computeMany(
    truePositives = 0,
    trueNegatives = 0,
    falsePositives = 0,
    falseNegatives = 0,
  ): [PrecisionMetric, RecallMetric, ClassificationF1Metric] {
    const counts = { truePositives, trueNegatives, falsePositives, falseNegatives };
    return [new PrecisionMetric(counts), new RecallMetric(counts), new ClassificationF1Metric(counts)];
  }

  /**
   * Score every (prediction, gold) pair on its own against `positiveClass`.
   *
   * One metric triple is produced per example so that a recording layer can
   * merge them with metrics from elsewhere.
   */
  static computeMetrics(
    predictions: readonly Label[],
    goldLabels: readonly Label[],
    positiveClass: Label,
  ): [PrecisionMetric[], RecallMetric[], ClassificationF1Metric[]] {
    if (predictions.length !== goldLabels.length) {
      throw new MetricContractError(
        `Got ${predictions.length} predictions for ${goldLabels.length} gold labels`,
      );
    }
    if (!isLabel(positiveClass) || !predictions.every(isLabel) || !goldLabels.every(isLabel)) {
      throw new MetricContractError('Labels must be strings or finite numbers');
    }

    const precisions: PrecisionMetric[] = [];
    const recalls: RecallMetric[] = [];
    const f1s: ClassificationF1Metric[] = [];

    predictions.forEach((predicted, i) => {
      const predictedPositive = predicted === positiveClass;
      const goldPositive = goldLabels[i] === positiveClass;
      const [precision, recall, f1] = ConfusionMatrixMetric.computeMany(
        Number(predictedPositive && goldPositive),
        Number(!predictedPositive && !goldPositive),
        Number(predictedPositive && !goldPositive),
        Number(!predictedPositive && goldPositive),
      );
      precisions.push(precision);
      recalls.push(recall);
      f1s.push(f1);
    });

    return [precisions, recalls, f1s];
  }
}

/**
 * TP / (TP + FP); 0 when there are no true positives.
 */
export class PrecisionMetric extends ConfusionMatrixMetric {
  readonly kind = 'precision';

  value(): number {
    if (this.truePositives === 0) return 0;
    return this.truePositives / (this.truePositives + this.falsePositives);
  }

  merge(other?: PrecisionMetric | null): PrecisionMetric {
    if (other == null) return this;
    return new PrecisionMetric(this.sumCounts(other));
  }
}

/**
 * TP / (TP + FN); 0 when there are no true positives.
 */
export class RecallMetric extends ConfusionMatrixMetric {
  readonly kind = 'recall';

  value(): number {
    if (this.truePositives === 0) return 0;
    return this.truePositives / (this.truePositives + this.falseNegatives);
  }

  merge(other?: RecallMetric | null): RecallMetric {
    if (other == null) return this;
    return new RecallMetric(this.sumCounts(other));
  }
}

/**
 * 2TP / (2TP + FP + FN); 0 when there are no true positives.
 */
export class ClassificationF1Metric extends ConfusionMatrixMetric {
  readonly kind = 'f1';

  value(): number {
    if (this.truePositives === 0) return 0;
    const numer = 2 * this.truePositives;
    return numer / (numer + this.falseNegatives + this.falsePositives);
  }

  merge(other?: ClassificationF1Metric | null): ClassificationF1Metric {
    if (other == null) return this;
    return new ClassificationF1Metric(this.sumCounts(other));
  }
}

import { describe, expect, it } from 'vitest';
import { MetricContractError, MetricMergeError } from '../src/errors.js';
import { AverageMetric } from '../src/metrics/average.js';
import { type Metric, mergeAll } from '../src/metrics/base.js';
import { ClassificationF1Metric, ConfusionMatrixMetric } from '../src/metrics/confusion-matrix.js';
import { WeightedF1Metric } from '../src/metrics/weighted-f1.js';

describe('WeightedF1Metric', () => {
  it('weights each class F1 by its support', () => {
    const metric = new WeightedF1Metric([
      ['A', new ClassificationF1Metric({ truePositives: 1, trueNegatives: 1 })],
      ['B', new ClassificationF1Metric({ trueNegatives: 1, falseNegatives: 1 })],
    ]);
    expect(metric.value()).toBe(0.5);
  });

  it('is 0 when no class is present', () => {
    expect(new WeightedF1Metric().value()).toBe(0);
    expect(new WeightedF1Metric([]).toString()).toBe('weighted_f1(0)');
  });

  it('zips per-class sequences by example index', () => {
    const predicted = ['A', 'B', 'B', 'A'];
    const gold = ['A', 'A', 'B', 'B'];
    const perClass = new Map(
      ['A', 'B'].map((c): [string, ClassificationF1Metric[]] => [
        c,
        ConfusionMatrixMetric.computeMetrics(predicted, gold, c)[2],
      ]),
    );

    const perExample = WeightedF1Metric.computeMany(perClass);
    expect(perExample).toHaveLength(4);
    expect(perExample[0]?.classes().map(([label]) => label)).toEqual(['A', 'B']);

    // A: TP, FN, TN, FP; B: TN, FP, TP, FN
    expect(mergeAll(perExample)?.value()).toBe(0.5);
  });

  it('weights a majority class more heavily', () => {
    const predicted = ['A', 'A', 'A', 'A'];
    const gold = ['A', 'A', 'A', 'B'];
    const perClass = new Map(
      ['A', 'B'].map((c): [string, ClassificationF1Metric[]] => [
        c,
        ConfusionMatrixMetric.computeMetrics(predicted, gold, c)[2],
      ]),
    );
    // F1(A) = 6/7 with support 3/4; F1(B) = 0
    expect(mergeAll(WeightedF1Metric.computeMany(perClass))?.value()).toBeCloseTo((6 / 7) * 0.75, 12);
  });

  it('returns no metrics for empty sequences', () => {
    expect(WeightedF1Metric.computeMany(new Map([['A', []]]))).toEqual([]);
    expect(WeightedF1Metric.computeMany(new Map())).toEqual([]);
  });

  it('rejects sequences of different lengths', () => {
    const perClass = new Map([
      ['A', [new ClassificationF1Metric(), new ClassificationF1Metric()]],
      ['B', [new ClassificationF1Metric()]],
    ]);
    expect(() => WeightedF1Metric.computeMany(perClass)).toThrow(MetricContractError);
  });

  it('merges by key union without touching either operand', () => {
    const a = new WeightedF1Metric([['A', new ClassificationF1Metric({ truePositives: 1 })]]);
    const b = new WeightedF1Metric([
      ['A', new ClassificationF1Metric({ falsePositives: 1 })],
      ['B', new ClassificationF1Metric({ trueNegatives: 1 })],
    ]);

    const merged = a.merge(b);
    expect(merged.classes().map(([label]) => label)).toEqual(['A', 'B']);
    expect(merged.get('A')?.counts()).toEqual({
      truePositives: 1,
      trueNegatives: 0,
      falsePositives: 1,
      falseNegatives: 0,
    });
    expect(merged.get('B')?.trueNegatives).toBe(1);
    expect(a.classes()).toHaveLength(1);
    expect(a.get('A')?.falsePositives).toBe(0);
  });

  it('treats an absent operand as identity', () => {
    const a = new WeightedF1Metric([['A', new ClassificationF1Metric({ truePositives: 1 })]]);
    expect(a.merge(null)).toBe(a);
  });

  it('rejects merging with another kind', () => {
    const metric: Metric = new WeightedF1Metric();
    expect(() => metric.merge(new AverageMetric(1))).toThrow(MetricMergeError);
  });
});

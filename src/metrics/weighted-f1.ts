import { MetricContractError } from '../errors.js';
import type { Label, WeightedF1State } from '../types.js';
import { Metric } from './base.js';
import type { ClassificationF1Metric } from './confusion-matrix.js';

/**
 * F1 averaged over classes, each class weighted by its support (TP + FN).
 *
 * Holds one F1 accumulator per class. Every example is judged against every
 * class, so all classes share the same total example count.
 */
export class WeightedF1Metric extends Metric {
  readonly kind = 'weighted_f1';
  private readonly perClass: ReadonlyMap<Label, ClassificationF1Metric>;

  constructor(perClass: Iterable<readonly [Label, ClassificationF1Metric]> = []) {
    super();
    this.perClass = new Map(perClass);
  }

  get macroAverage(): boolean {
    return true;
  }

  /** The per-class F1 accumulators, in insertion order. */
  classes(): [Label, ClassificationF1Metric][] {
    return [...this.perClass];
  }

  get(label: Label): ClassificationF1Metric | undefined {
    return this.perClass.get(label);
  }

  merge(other?: WeightedF1Metric | null): WeightedF1Metric {
    if (other == null) return this;
    this.assertSameKind(other);

    const merged = new Map(this.perClass);
    for (const [label, f1] of other.perClass) {
      const existing = merged.get(label);
      merged.set(label, existing ? existing.merge(f1) : f1);
    }
    return new WeightedF1Metric(merged);
  }

  value(): number {
    let weightedF1 = 0;
    const first = this.perClass.values().next();
    if (first.done) return weightedF1;

    // Any class carries the shared total; non-empty implies it is positive.
    const totalExamples = first.value.total;
    for (const f1 of this.perClass.values()) {
      const actualPositive = f1.truePositives + f1.falseNegatives;
      weightedF1 += f1.value() * (actualPositive / totalExamples);
    }
    return weightedF1;
  }

  state(): WeightedF1State {
    return {
      kind: this.kind,
      classes: [...this.perClass].map(([label, f1]) => ({ label, ...f1.counts() })),
    };
  }

  /**
   * Zip per-class F1 sequences positionally into one metric per example.
   *
   * Index `i` of every sequence must describe the same example.
   */
  static computeMany(
    perClass: ReadonlyMap<Label, readonly ClassificationF1Metric[]>,
  ): WeightedF1Metric[] {
    const lengths = new Set([...perClass.values()].map((seq) => seq.length));
    if (lengths.size > 1) {
      throw new MetricContractError(
        `Per-class F1 sequences must have equal lengths, got ${[...lengths].join(', ')}`,
      );
    }

    const [n = 0] = lengths;
    return Array.from({ length: n }, (_, i) => {
      const row: [Label, ClassificationF1Metric][] = [];
      for (const [label, seq] of perClass) {
        const f1 = seq[i];
        if (f1) row.push([label, f1]);
      }
      return new WeightedF1Metric(row);
    });
  }
}

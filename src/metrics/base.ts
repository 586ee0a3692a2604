/**
 * Shared contract for every mergeable accumulator.
 */

import { MetricMergeError } from '../errors.js';
import type { MetricKind, MetricState } from '../types.js';

/**
 * Base class for immutable, mergeable metric accumulators.
 *
 * Accumulators are built per step or per shard and combined with `merge`,
 * which is associative and commutative and treats an absent operand as the
 * identity. The scalar is only read at reporting time through `value()`.
 *
 * Example:
 * ```ts
 * const total = shards.reduce<PrecisionMetric | null>((acc, m) => m.merge(acc), null);
 * total?.value();
 * ```
 */
export abstract class Metric {
  /** Discriminant; merges are only defined between metrics of the same kind. */
  abstract readonly kind: MetricKind;

  /**
   * Whether this metric should be macro-averaged when reported across shards.
   * When false, shard accumulators are merged first and `value()` is read once.
   */
  abstract get macroAverage(): boolean;

  abstract value(): number;

  /**
   * Combine with another accumulator of the same kind into a new instance.
   * Returns the receiver when `other` is absent.
   */
  abstract merge(other?: Metric | null): Metric;

  /** Plain-data snapshot from which an equal metric can be rebuilt. */
  abstract state(): MetricState;

  /**
   * Throws unless `other` carries the same kind tag as this metric.
   */
  protected assertSameKind(other: Metric): void {
    if (other.kind !== this.kind) {
      throw new MetricMergeError(`Cannot merge '${this.kind}' metric with '${other.kind}' metric`);
    }
  }

  toString(): string {
    return `${this.kind}(${this.value()})`;
  }
}

/**
 * Fold a sequence of accumulators with `merge`. Returns null for an empty sequence.
 */
export function mergeAll<T extends { merge(other?: T | null): T }>(metrics: Iterable<T>): T | null {
  let total: T | null = null;
  for (const m of metrics) {
    total = total === null ? m : total.merge(m);
  }
  return total;
}

import { MetricContractError } from '../errors.js';
import type { AverageState } from '../types.js';
import { Metric } from './base.js';

/**
 * A running mean, e.g. of a per-example loss. Merges sum numerators and denominators.
 */
export class AverageMetric extends Metric {
  readonly kind = 'average';
  readonly numer: number;
  readonly denom: number;

  constructor(numer: number, denom = 1) {
    super();
    if (!Number.isFinite(numer) || !Number.isFinite(denom)) {
      throw new MetricContractError(`Average needs finite terms, got ${numer}/${denom}`);
    }
    this.numer = numer;
    this.denom = denom;
  }

  get macroAverage(): boolean {
    return false;
  }

  value(): number {
    if (this.denom === 0) return 0;
    return this.numer / this.denom;
  }

  merge(other?: AverageMetric | null): AverageMetric {
    if (other == null) return this;
    this.assertSameKind(other);
    return new AverageMetric(this.numer + other.numer, this.denom + other.denom);
  }

  state(): AverageState {
    return { kind: this.kind, numer: this.numer, denom: this.denom };
  }

  /**
   * One average per example. Denominators default to 1.
   */
  static many(numers: readonly number[], denoms?: readonly number[]): AverageMetric[] {
    if (denoms !== undefined && denoms.length !== numers.length) {
      throw new MetricContractError(
        `Got ${denoms.length} denominators for ${numers.length} numerators`,
      );
    }
    return numers.map((n, i) => new AverageMetric(n, denoms?.[i] ?? 1));
  }
}

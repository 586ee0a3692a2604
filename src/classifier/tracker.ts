/**
 * ClassificationTracker: turns per-step labels and class probabilities into
 * recorded classification metrics for a fixed class vocabulary.
 */

import { readFileSync } from 'node:fs';
import { ConfigError, MetricContractError, UnknownLabelError } from '../errors.js';
import { warnOnce } from '../logging.js';
import { AUCMetrics, DEFAULT_DECIMAL_PLACES } from '../metrics/auc.js';
import type { ClassificationF1Metric } from '../metrics/confusion-matrix.js';
import { ConfusionMatrixMetric } from '../metrics/confusion-matrix.js';
import { WeightedF1Metric } from '../metrics/weighted-f1.js';
import { type MetricReport, MetricRegistry } from '../reporting/registry.js';
import { roundSigfigs } from '../reporting/render-numbers.js';
import type { Label } from '../types.js';

const DEFAULT_THRESHOLD = 0.5;

/**
 * One row per example; column `i` is the probability of `classList[i]`.
 */
export type ProbabilityRows = readonly (readonly number[])[];

export interface ClassifierOptions {
  /** The class vocabulary. */
  classes?: readonly string[] | null;
  /** Newline-separated class list; takes precedence over `classes`. */
  classesFromFile?: string | null;
  /** Class used for the binary threshold and for AUC. Defaults to the first class. */
  refClass?: string | null;
  /** Binary only: predict `refClass` iff its probability exceeds this value. */
  threshold?: number;
  /** Binary only: accumulate ROC-AUC for `refClass`. */
  areaUnderCurve?: boolean;
  aucDecimalPlaces?: number;
}

/**
 * Records per-class precision, recall and F1, support-weighted F1 and,
 * for binary problems, AUC into a MetricRegistry.
 */
export class ClassificationTracker {
  /** The class vocabulary, reference class first. */
  readonly classList: readonly string[];
  readonly refClass: string;
  /** Decision threshold on P(refClass), or null to predict by argmax. */
  readonly threshold: number | null;
  readonly calcAuc: boolean;
  readonly aucDecimalPlaces: number;

  private readonly classIndexes: ReadonlyMap<string, number>;
  private registry = new MetricRegistry();

  constructor(opts: ClassifierOptions) {
    const classes = resolveClasses(opts);

    const requestedRef = opts.refClass;
    const refIdx = requestedRef == null ? -1 : classes.indexOf(requestedRef);
    if (refIdx > 0) {
      classes.unshift(...classes.splice(refIdx, 1));
    }

    const threshold = opts.threshold ?? DEFAULT_THRESHOLD;
    if (!(threshold >= 0 && threshold <= 1)) {
      throw new ConfigError(`threshold must lie in [0, 1], got ${threshold}`);
    }

    this.classList = Object.freeze(classes);
    this.refClass = classes[0] ?? '';
    this.classIndexes = new Map(classes.map((c, i): [string, number] => [c, i]));
    this.threshold = classes.length === 2 && threshold !== DEFAULT_THRESHOLD ? threshold : null;
    this.calcAuc = classes.length === 2 && (opts.areaUnderCurve ?? false);
    this.aucDecimalPlaces = opts.aucDecimalPlaces ?? DEFAULT_DECIMAL_PLACES;
  }

  /** Metrics recorded so far. */
  get metrics(): MetricRegistry {
    return this.registry;
  }

  /**
   * Index of `label` in `classList`.
   * Throws UnknownLabelError for labels outside the vocabulary.
   */
  classIndex(label: Label): number {
    const idx = typeof label === 'string' ? this.classIndexes.get(label) : undefined;
    if (idx === undefined) {
      warnOnce('One of your labels is not in the class list.');
      throw new UnknownLabelError(label, this.classList);
    }
    return idx;
  }

  /**
   * Pick a class per probability row: argmax, or the threshold rule on the
   * reference class when one is configured.
   */
  predict(rows: ProbabilityRows): string[] {
    return rows.map((row) => {
      this.assertRowWidth(row);
      const idx = this.threshold === null ? argmax(row) : (row[0] ?? 0) > this.threshold ? 0 : 1;
      return this.classList[idx] ?? this.refClass;
    });
  }

  /**
   * Build the metrics of one step without recording them.
   *
   * `auc` is included when enabled and `rows` are given.
   */
  computeStepMetrics(
    labels: readonly Label[],
    predictions: readonly Label[],
    rows?: ProbabilityRows,
  ): MetricRegistry {
    if (labels.length !== predictions.length) {
      throw new MetricContractError(
        `Got ${predictions.length} predictions for ${labels.length} labels`,
      );
    }
    for (const label of [...labels, ...predictions]) {
      this.classIndex(label);
    }

    const step = new MetricRegistry();
    const f1ByClass = new Map<Label, ClassificationF1Metric[]>();
    for (const className of this.classList) {
      const [precision, recall, f1] = ConfusionMatrixMetric.computeMetrics(
        predictions,
        labels,
        className,
      );
      f1ByClass.set(className, f1);
      step.record(`class_${className}_prec`, precision);
      step.record(`class_${className}_recall`, recall);
      step.record(`class_${className}_f1`, f1);
    }
    step.record('weighted_f1', WeightedF1Metric.computeMany(f1ByClass));

    if (this.calcAuc && rows !== undefined) {
      if (rows.length !== labels.length) {
        throw new MetricContractError(
          `Got ${rows.length} probability rows for ${labels.length} labels`,
        );
      }
      const refProbs = rows.map((row) => {
        this.assertRowWidth(row);
        return row[0] ?? 0;
      });
      step.record(
        'auc',
        AUCMetrics.rawDataToAuc(labels, refProbs, this.refClass, this.aucDecimalPlaces),
      );
    }

    return step;
  }

  /**
   * Record metrics for predictions made elsewhere.
   */
  observePredictions(labels: readonly Label[], predictions: readonly Label[]): void {
    this.absorb(this.computeStepMetrics(labels, predictions));
  }

  /**
   * Predict from probability rows, record the step's metrics and return the predictions.
   */
  observe(labels: readonly Label[], rows: ProbabilityRows): string[] {
    const predictions = this.predict(rows);
    this.absorb(this.computeStepMetrics(labels, predictions, rows));
    return predictions;
  }

  /**
   * Merge a registry built elsewhere (another step, worker or process) into this one.
   */
  absorb(step: MetricRegistry): void {
    this.registry = this.registry.merge(step);
  }

  report(): MetricReport {
    return this.registry.report();
  }

  reset(): void {
    this.registry = new MetricRegistry();
  }

  /**
   * Human-readable predictions with the probability of the chosen class.
   */
  formatPredictions(rows: ProbabilityRows, predictions: readonly string[]): string[] {
    return predictions.map((predicted, i) => {
      const prob = rows[i]?.[this.classIndex(predicted)] ?? 0;
      return `Predicted class: ${predicted}\nwith probability: ${roundSigfigs(prob, 4)}`;
    });
  }

  private assertRowWidth(row: readonly number[]): void {
    if (row.length !== this.classList.length) {
      throw new MetricContractError(
        `Expected ${this.classList.length} class probabilities per row, got ${row.length}`,
      );
    }
  }
}

function resolveClasses(opts: ClassifierOptions): string[] {
  let classes: string[];
  if (opts.classesFromFile != null) {
    classes = readFileSync(opts.classesFromFile, 'utf-8')
      .split(/\r?\n/)
      .filter((line) => line.trim().length > 0);
  } else if (opts.classes != null) {
    classes = [...opts.classes];
  } else {
    throw new ConfigError('Must specify classes or classesFromFile');
  }

  if (classes.length === 0) {
    throw new ConfigError('The class list is empty');
  }
  const duplicate = classes.find((c, i) => classes.indexOf(c) !== i);
  if (duplicate !== undefined) {
    throw new ConfigError(`Duplicate class name: '${duplicate}'`);
  }
  return classes;
}

function argmax(row: readonly number[]): number {
  let best = 0;
  row.forEach((p, i) => {
    if (p > (row[best] ?? Number.NEGATIVE_INFINITY)) best = i;
  });
  return best;
}

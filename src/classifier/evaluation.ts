/**
 * Run a scoring function over labelled batches and collect classification metrics.
 */

import pLimit from 'p-limit';
import { withStepRun } from '../context.js';
import type { MetricReport } from '../reporting/registry.js';
import { MetricRegistry } from '../reporting/registry.js';
import { type RendererOptions, renderMetricsTable } from '../reporting/renderer.js';
import type { ClassificationTracker, ProbabilityRows } from './tracker.js';

export interface Batch<TInputs = unknown> {
  name?: string | null;
  inputs: TInputs;
  /** Gold labels, one per example. Batches without labels are only predicted. */
  labels?: readonly string[] | null;
}

export interface EvaluateOptions {
  /** Name of the run. Defaults to the scoring function's name. */
  name?: string;
  /** Maximum number of batches scored at once. Unbounded by default. */
  maxConcurrency?: number;
}

export interface BatchResult {
  name: string;
  predictions: string[];
  probabilities: ProbabilityRows;
  /** Metrics recorded for this batch, including those recorded by the scorer. */
  metrics: MetricRegistry;
  /** Scoring time in seconds. */
  duration: number;
}

export interface BatchFailure {
  name: string;
  errorMessage: string;
  errorStacktrace: string;
}

export interface EvaluationRun {
  name: string;
  results: BatchResult[];
  failures: BatchFailure[];
  /** Metrics of this run alone; the tracker keeps accumulating across runs. */
  metrics: MetricRegistry;

  report(): MetricReport;
  /** Render the run's metrics as a formatted string. */
  render(opts?: RendererOptions): string;
  /** Print the run's metrics to the console. */
  print(opts?: RendererOptions): void;
}

/**
 * Score every batch, record its metrics on the tracker and return the run.
 */
export async function evaluateBatches<TInputs>(
  tracker: ClassificationTracker,
  batches: readonly Batch<TInputs>[],
  score: (inputs: TInputs) => ProbabilityRows | Promise<ProbabilityRows>,
  opts?: EvaluateOptions,
): Promise<EvaluationRun> {
  const runName = opts?.name ?? (score.name || 'score');
  const maxConcurrency = opts?.maxConcurrency;
  const limit = maxConcurrency ? pLimit(maxConcurrency) : pLimit(Infinity);

  const outcomes = await Promise.all(
    batches.map((batch, i) =>
      limit(() => runBatch(tracker, batch, batch.name ?? `Batch ${i + 1}`, score)),
    ),
  );

  const results: BatchResult[] = [];
  const failures: BatchFailure[] = [];
  for (const item of outcomes) {
    if ('predictions' in item) {
      results.push(item);
    } else {
      failures.push(item);
    }
  }

  let metrics = new MetricRegistry();
  for (const result of results) {
    metrics = metrics.merge(result.metrics);
  }
  tracker.absorb(metrics);

  const run: EvaluationRun = {
    name: runName,
    results,
    failures,
    metrics,

    report() {
      return metrics.report();
    },

    render(renderOpts) {
      return renderMetricsTable(run.report(), { title: run.name, ...renderOpts });
    },

    print(renderOpts) {
      // eslint-disable-next-line no-console
      console.log(run.render(renderOpts));
    },
  };

  return run;
}

async function runBatch<TInputs>(
  tracker: ClassificationTracker,
  batch: Batch<TInputs>,
  name: string,
  score: (inputs: TInputs) => ProbabilityRows | Promise<ProbabilityRows>,
): Promise<BatchResult | BatchFailure> {
  try {
    const t0 = performance.now();
    const { result: probabilities, metrics: local } = await withStepRun(async () => {
      return await score(batch.inputs);
    });
    const duration = (performance.now() - t0) / 1000;

    const predictions = tracker.predict(probabilities);
    const metrics =
      batch.labels == null
        ? local
        : local.merge(tracker.computeStepMetrics(batch.labels, predictions, probabilities));

    return { name, predictions, probabilities, metrics, duration };
  } catch (e) {
    const error = e instanceof Error ? e : new Error(String(e));
    return {
      name,
      errorMessage: `${error.name}: ${error.message}`,
      errorStacktrace: error.stack ?? '',
    };
  }
}

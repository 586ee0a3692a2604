/**
 * Conversion between metric accumulators and their plain-data state.
 */

import { AUCMetrics } from '../metrics/auc.js';
import { AverageMetric } from '../metrics/average.js';
import type { Metric } from '../metrics/base.js';
import {
  ClassificationF1Metric,
  type ConfusionMatrixMetric,
  PrecisionMetric,
  RecallMetric,
} from '../metrics/confusion-matrix.js';
import { WeightedF1Metric } from '../metrics/weighted-f1.js';
import { MetricRegistry } from '../reporting/registry.js';
import type { ConfusionMatrixState, Label, MetricState } from '../types.js';
import { metricStateSchema, registryStateSchema } from './schema.js';

export const REGISTRY_SCHEMA_ID = 'classifier-metrics/registry@1';

/**
 * A registry snapshot: metric state keyed by metric name.
 */
export interface RegistryState {
  $schema?: string;
  metrics: Record<string, MetricState>;
}

export function serializeMetric(metric: Metric): MetricState {
  return metric.state();
}

/**
 * Rebuild a metric from its state. Throws a ZodError if `data` is not a valid state.
 */
export function deserializeMetric(data: unknown): Metric {
  return metricFromState(metricStateSchema.parse(data));
}

function metricFromState(state: MetricState): Metric {
  switch (state.kind) {
    case 'precision':
    case 'recall':
    case 'f1':
      return confusionMatrixFromState(state);
    case 'weighted_f1':
      return new WeightedF1Metric(
        state.classes.map(({ label, ...counts }): [Label, ClassificationF1Metric] => [
          label,
          new ClassificationF1Metric(counts),
        ]),
      );
    case 'auc':
      return new AUCMetrics(state);
    case 'average':
      return new AverageMetric(state.numer, state.denom);
  }
}

function confusionMatrixFromState({ kind, ...counts }: ConfusionMatrixState): ConfusionMatrixMetric {
  switch (kind) {
    case 'precision':
      return new PrecisionMetric(counts);
    case 'recall':
      return new RecallMetric(counts);
    case 'f1':
      return new ClassificationF1Metric(counts);
  }
}

export function serializeRegistry(registry: MetricRegistry): RegistryState {
  const metrics: Record<string, MetricState> = {};
  for (const [name, metric] of registry.entries()) {
    metrics[name] = serializeMetric(metric);
  }
  return { $schema: REGISTRY_SCHEMA_ID, metrics };
}

export function deserializeRegistry(data: unknown): MetricRegistry {
  const parsed = registryStateSchema.parse(data);
  const registry = new MetricRegistry();
  for (const [name, state] of Object.entries(parsed.metrics)) {
    registry.record(name, metricFromState(state));
  }
  return registry;
}

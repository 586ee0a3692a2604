/**
 * AsyncLocalStorage-based context for evaluation steps.
 *
 * Code running inside a step (typically the scoring function) can record its
 * own metrics, such as a loss, with `recordLocalMetric()`; they end up next to
 * the classification metrics of that step.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { Metric } from './metrics/base.js';
import { MetricRegistry } from './reporting/registry.js';

interface StepRun {
  metrics: MetricRegistry;
}

const stepRunStorage = new AsyncLocalStorage<StepRun>();

/**
 * Run a function within a new step context.
 * Returns the result along with the metrics recorded during the step.
 */
export async function withStepRun<T>(
  fn: () => Promise<T>,
): Promise<{ result: T; metrics: MetricRegistry }> {
  const stepRun: StepRun = { metrics: new MetricRegistry() };
  const result = await stepRunStorage.run(stepRun, fn);
  return { result, metrics: stepRun.metrics };
}

/**
 * Record a metric on the current step.
 * No-op if called outside of a step.
 */
export function recordLocalMetric(name: string, metric: Metric | readonly Metric[]): void {
  stepRunStorage.getStore()?.metrics.record(name, metric);
}

/**
 * Whether the caller is running inside a step.
 */
export function inStepRun(): boolean {
  return stepRunStorage.getStore() !== undefined;
}

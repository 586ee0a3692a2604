/**
 * MetricRegistry: named metric accumulators, and aggregation across shards.
 */

import { DegenerateMetricError } from '../errors.js';
import { Metric, mergeAll } from '../metrics/base.js';

/**
 * Scalar values keyed by metric name.
 */
export type MetricReport = Record<string, number>;

/**
 * Records metrics by name, folding every new accumulator into the stored one.
 *
 * The registry itself is a mutable recorder; the accumulators it holds are
 * immutable and are replaced, never modified, on each `record`.
 */
export class MetricRegistry {
  private readonly metrics = new Map<string, Metric>();

  constructor(entries: Iterable<readonly [string, Metric]> = []) {
    for (const [name, metric] of entries) {
      this.record(name, metric);
    }
  }

  /**
   * Record one accumulator, or one per example, under `name`.
   */
  record(name: string, metric: Metric | readonly Metric[]): void {
    const incoming = metric instanceof Metric ? [metric] : metric;
    for (const m of incoming) {
      const existing = this.metrics.get(name);
      this.metrics.set(name, existing ? existing.merge(m) : m);
    }
  }

  get(name: string): Metric | undefined {
    return this.metrics.get(name);
  }

  has(name: string): boolean {
    return this.metrics.has(name);
  }

  /** Recorded names, sorted. */
  names(): string[] {
    return [...this.metrics.keys()].sort();
  }

  /** Recorded (name, metric) pairs, sorted by name. */
  entries(): [string, Metric][] {
    const result: [string, Metric][] = [];
    for (const name of this.names()) {
      const metric = this.metrics.get(name);
      if (metric) result.push([name, metric]);
    }
    return result;
  }

  get size(): number {
    return this.metrics.size;
  }

  clear(): void {
    this.metrics.clear();
  }

  /**
   * A new registry holding both registries' metrics, merged name by name.
   */
  merge(other: MetricRegistry): MetricRegistry {
    const merged = new MetricRegistry(this.metrics);
    for (const [name, metric] of other.metrics) {
      merged.record(name, metric);
    }
    return merged;
  }

  /**
   * Read every metric's value, keyed by name in sorted order.
   * Metrics whose value is undefined for the data seen report NaN.
   */
  report(): MetricReport {
    const result: MetricReport = {};
    for (const [name, metric] of this.entries()) {
      result[name] = readValue(metric);
    }
    return result;
  }
}

/**
 * Combine the registries of several shards (workers, tasks) into one report.
 *
 * Macro-averaged metrics report the unweighted mean of the shards' values;
 * the others are merged across shards and read once. With more than one
 * shard, each shard's own values are also reported as `<shard>/<name>`.
 */
export function aggregateShardReports(shards: ReadonlyMap<string, MetricRegistry>): MetricReport {
  const byName = new Map<string, Metric[]>();
  const perShard: MetricReport = {};

  for (const [shardName, registry] of shards) {
    for (const [name, metric] of registry.entries()) {
      const list = byName.get(name) ?? [];
      list.push(metric);
      byName.set(name, list);
      if (shards.size > 1) {
        perShard[`${shardName}/${name}`] = readValue(metric);
      }
    }
  }

  const combined: MetricReport = { ...perShard };
  for (const [name, metrics] of byName) {
    // Merging also rejects metrics of different kinds recorded under one name
    const merged = mergeAll(metrics);
    if (merged === null) continue;
    if (merged.macroAverage) {
      combined[name] = metrics.reduce((sum, m) => sum + readValue(m), 0) / metrics.length;
    } else {
      combined[name] = readValue(merged);
    }
  }

  const sorted: MetricReport = {};
  for (const key of Object.keys(combined).sort()) {
    sorted[key] = combined[key] ?? 0;
  }
  return sorted;
}

function readValue(metric: Metric): number {
  try {
    return metric.value();
  } catch (e) {
    if (e instanceof DegenerateMetricError) return Number.NaN;
    throw e;
  }
}

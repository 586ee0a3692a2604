export type { MetricReport } from './registry.js';
export { aggregateShardReports, MetricRegistry } from './registry.js';
export { renderMetricValue, roundSigfigs } from './render-numbers.js';
export type { RendererOptions } from './renderer.js';
export { renderMetricsTable } from './renderer.js';

/**
 * Terminal table rendering with chalk + cli-table3.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { MetricReport } from './registry.js';
import { renderMetricValue } from './render-numbers.js';

export interface RendererOptions {
  /** Heading printed above the tables. */
  title?: string;
  /** Split `class_<name>_<stat>` entries into a per-class table. Defaults to true. */
  groupClasses?: boolean;
}

const CLASS_METRIC = /^class_(.+)_(prec|recall|f1)$/;
const CLASS_STATS = ['prec', 'recall', 'f1'] as const;

/**
 * Render a metric report as formatted tables.
 */
export function renderMetricsTable(report: MetricReport, opts?: RendererOptions): string {
  const groupClasses = opts?.groupClasses ?? true;

  const perClass = new Map<string, Record<string, number>>();
  const overall: [string, number][] = [];

  for (const [name, value] of Object.entries(report)) {
    const match = groupClasses ? CLASS_METRIC.exec(name) : null;
    const className = match?.[1];
    const stat = match?.[2];
    if (className !== undefined && stat !== undefined) {
      const row = perClass.get(className) ?? {};
      row[stat] = value;
      perClass.set(className, row);
    } else {
      overall.push([name, value]);
    }
  }

  const sections: string[] = [];
  if (opts?.title) sections.push(chalk.bold(opts.title));

  if (perClass.size > 0) {
    const table = new Table({
      head: [chalk.bold('Class'), ...CLASS_STATS.map((s) => chalk.bold(s))],
      style: { head: [], border: [] },
    });
    for (const [className, stats] of perClass) {
      table.push([
        className,
        ...CLASS_STATS.map((s) => {
          const v = stats[s];
          return v === undefined ? '-' : renderMetricValue(v);
        }),
      ]);
    }
    sections.push(table.toString());
  }

  if (overall.length > 0) {
    const table = new Table({
      head: [chalk.bold('Metric'), chalk.bold('Value')],
      style: { head: [], border: [] },
    });
    for (const [name, value] of overall) {
      table.push([name, renderMetricValue(value)]);
    }
    sections.push(table.toString());
  }

  return sections.join('\n');
}

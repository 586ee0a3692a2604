import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { ClassificationTracker } from '../src/classifier/tracker.js';
import { ConfigError } from '../src/errors.js';
import { AUCMetrics } from '../src/metrics/auc.js';
import { AverageMetric } from '../src/metrics/average.js';
import type { Metric } from '../src/metrics/base.js';
import {
  ClassificationF1Metric,
  PrecisionMetric,
  RecallMetric,
} from '../src/metrics/confusion-matrix.js';
import { WeightedF1Metric } from '../src/metrics/weighted-f1.js';
import { MetricRegistry } from '../src/reporting/registry.js';
import {
  loadClassifierConfigFromFile,
  loadClassifierConfigFromObject,
  loadRegistryFromFile,
  loadRegistryFromText,
  saveRegistryToFile,
} from '../src/serialization/loader.js';
import {
  deserializeMetric,
  deserializeRegistry,
  REGISTRY_SCHEMA_ID,
  serializeMetric,
  serializeRegistry,
} from '../src/serialization/state.js';
import { isLabel } from '../src/types.js';

function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'metrics-'));
}

function sampleRegistry(): MetricRegistry {
  return new MetricRegistry([
    ['class_pos_prec', new PrecisionMetric({ truePositives: 3, falsePositives: 1 })],
    ['class_pos_recall', new RecallMetric({ truePositives: 3, falseNegatives: 3 })],
    [
      'weighted_f1',
      new WeightedF1Metric([
        ['pos', new ClassificationF1Metric({ truePositives: 1, trueNegatives: 1 })],
        ['neg', new ClassificationF1Metric({ trueNegatives: 1, falseNegatives: 1 })],
      ]),
    ],
    ['auc', AUCMetrics.rawDataToAuc(['pos', 'pos', 'neg', 'neg'], [0.8, 0.4, 0.6, 0.2], 'pos')],
    ['loss', new AverageMetric(1.25, 5)],
  ]);
}

// ============ Metric state ============

describe('metric state', () => {
  const metrics: Metric[] = sampleRegistry()
    .entries()
    .map(([, metric]) => metric);

  it.each(metrics.map((m): [string, Metric] => [m.kind, m]))('round-trips %s', (_kind, metric) => {
    const restored = deserializeMetric(JSON.parse(JSON.stringify(serializeMetric(metric))));
    expect(restored.kind).toBe(metric.kind);
    expect(restored.constructor).toBe(metric.constructor);
    expect(restored.state()).toEqual(metric.state());
    expect(restored.value()).toBe(metric.value());
  });

  it('keeps numeric class labels', () => {
    const metric = new WeightedF1Metric([[7, new ClassificationF1Metric({ truePositives: 1 })]]);
    const restored = deserializeMetric(serializeMetric(metric));
    expect(restored.state()).toEqual({
      kind: 'weighted_f1',
      classes: [{ label: 7, truePositives: 1, trueNegatives: 0, falsePositives: 0, falseNegatives: 0 }],
    });
  });

  it('rejects invalid state', () => {
    expect(() =>
      deserializeMetric({
        kind: 'precision',
        truePositives: -1,
        trueNegatives: 0,
        falsePositives: 0,
        falseNegatives: 0,
      }),
    ).toThrow(ZodError);
    expect(() => deserializeMetric({ kind: 'median', values: [] })).toThrow(ZodError);
    expect(() =>
      deserializeMetric({
        kind: 'auc',
        classLabel: 'pos',
        thresholds: [0.5, 0.2],
        buckets: [
          [0, 0],
          [0, 0],
        ],
        positiveCount: 0,
        negativeCount: 0,
      }),
    ).toThrow(ZodError);
    expect(() =>
      deserializeMetric({
        kind: 'auc',
        classLabel: 'pos',
        thresholds: [0.5],
        buckets: [],
        positiveCount: 0,
        negativeCount: 0,
      }),
    ).toThrow(ZodError);
  });

  it('rejects AUC buckets that grow with the threshold or exceed the class totals', () => {
    const increasing = {
      kind: 'auc',
      classLabel: 'pos',
      thresholds: [0.2, 0.5, 1.5],
      buckets: [
        [0, 0],
        [1, 0],
        [1, 1],
      ],
      positiveCount: 1,
      negativeCount: 1,
    };
    expect(() => deserializeMetric(increasing)).toThrow(ZodError);
    expect(() =>
      deserializeMetric({
        ...increasing,
        buckets: [
          [5, 0],
          [0, 0],
          [0, 0],
        ],
      }),
    ).toThrow(ZodError);
  });

  it('rejects a weighted F1 state that lists a class twice', () => {
    const counts = { truePositives: 1, trueNegatives: 0, falsePositives: 0, falseNegatives: 0 };
    expect(() =>
      deserializeMetric({
        kind: 'weighted_f1',
        classes: [
          { label: 'pos', ...counts },
          { label: 'pos', ...counts, falsePositives: 2 },
        ],
      }),
    ).toThrow(ZodError);
    expect(
      deserializeMetric({
        kind: 'weighted_f1',
        classes: [
          { label: 'pos', ...counts },
          { label: 7, ...counts },
        ],
      }).kind,
    ).toBe('weighted_f1');
  });

  it('accepts only string or finite number labels', () => {
    expect(isLabel('pos')).toBe(true);
    expect(isLabel(3)).toBe(true);
    expect(isLabel(Number.NaN)).toBe(false);
    expect(isLabel(null)).toBe(false);
    expect(isLabel(true)).toBe(false);
    expect(() =>
      deserializeMetric({
        kind: 'weighted_f1',
        classes: [
          { label: true, truePositives: 1, trueNegatives: 0, falsePositives: 0, falseNegatives: 0 },
        ],
      }),
    ).toThrow(ZodError);
  });
});

// ============ Registries ============

describe('registry snapshots', () => {
  it('serializes every metric under its name', () => {
    const data = serializeRegistry(new MetricRegistry([['loss', new AverageMetric(2, 4)]]));
    expect(data).toEqual({
      $schema: REGISTRY_SCHEMA_ID,
      metrics: { loss: { kind: 'average', numer: 2, denom: 4 } },
    });
  });

  it('round-trips through YAML and JSON files', () => {
    const dir = tempDir();
    const registry = sampleRegistry();

    for (const file of ['metrics.yaml', 'metrics.json']) {
      const path = join(dir, file);
      saveRegistryToFile(registry, path);
      const loaded = loadRegistryFromFile(path);
      expect(loaded.names()).toEqual(registry.names());
      expect(loaded.report()).toEqual(registry.report());
    }
    expect(JSON.parse(readFileSync(join(dir, 'metrics.json'), 'utf-8')).$schema).toBe(
      REGISTRY_SCHEMA_ID,
    );
  });

  it('lets a reloaded shard merge with live metrics', () => {
    const dir = tempDir();
    const path = join(dir, 'shard.yml');
    saveRegistryToFile(new MetricRegistry([['loss', new AverageMetric(3, 1)]]), path);

    const merged = loadRegistryFromFile(path).merge(
      new MetricRegistry([['loss', new AverageMetric(1, 1)]]),
    );
    expect(merged.report()).toEqual({ loss: 2 });
  });

  it('loads a hand-written YAML snapshot', () => {
    const registry = loadRegistryFromText(
      [
        'metrics:',
        '  accuracy:',
        '    kind: average',
        '    numer: 3',
        '    denom: 4',
        '  class_a_f1:',
        '    kind: f1',
        '    truePositives: 2',
        '    trueNegatives: 0',
        '    falsePositives: 1',
        '    falseNegatives: 1',
        '',
      ].join('\n'),
    );
    expect(registry.report()).toEqual({ accuracy: 0.75, class_a_f1: 4 / 6 });
  });

  it('rejects unknown top-level keys', () => {
    expect(() => deserializeRegistry({ metrics: {}, extra: true })).toThrow(ZodError);
  });

  it('refuses to guess the format of other extensions', () => {
    expect(() => saveRegistryToFile(new MetricRegistry(), join(tempDir(), 'metrics.txt'))).toThrow(
      "Could not infer format for filename 'metrics.txt'",
    );
  });
});

// ============ Classifier config ============

describe('classifier config', () => {
  it('maps file fields onto tracker options with defaults', () => {
    expect(loadClassifierConfigFromObject({ classes: ['pos', 'neg'] })).toEqual({
      classes: ['pos', 'neg'],
      classesFromFile: null,
      refClass: null,
      threshold: 0.5,
      areaUnderCurve: false,
      aucDecimalPlaces: 3,
    });
  });

  it('reads every option', () => {
    const opts = loadClassifierConfigFromObject({
      classes: ['pos', 'neg'],
      ref_class: 'neg',
      threshold: 0.3,
      area_under_curve: true,
      auc_decimal_places: 2,
    });
    const tracker = new ClassificationTracker(opts);
    expect(tracker.classList).toEqual(['neg', 'pos']);
    expect(tracker.threshold).toBe(0.3);
    expect(tracker.calcAuc).toBe(true);
    expect(tracker.aucDecimalPlaces).toBe(2);
  });

  it('requires a class source', () => {
    expect(() => loadClassifierConfigFromObject({ threshold: 0.4 })).toThrow(ConfigError);
  });

  it('reports schema problems as config errors', () => {
    expect(() => loadClassifierConfigFromObject({ classes: ['a'], threshold: 2 })).toThrow(
      ConfigError,
    );
    expect(() => loadClassifierConfigFromObject({ classes: ['a'], colour: 'red' })).toThrow(
      'Invalid classifier config',
    );
  });

  it('resolves the class file next to the config file', () => {
    const dir = tempDir();
    writeFileSync(join(dir, 'classes.txt'), 'spam\nham\n', 'utf-8');
    writeFileSync(
      join(dir, 'classifier.yaml'),
      ['classes_from_file: classes.txt', 'ref_class: ham', 'area_under_curve: true', ''].join('\n'),
      'utf-8',
    );

    const opts = loadClassifierConfigFromFile(join(dir, 'classifier.yaml'));
    expect(opts.classesFromFile).toBe(join(dir, 'classes.txt'));

    const tracker = new ClassificationTracker(opts);
    expect(tracker.classList).toEqual(['ham', 'spam']);
    expect(tracker.calcAuc).toBe(true);
  });

  it('reads JSON config files', () => {
    const dir = tempDir();
    const path = join(dir, 'classifier.json');
    writeFileSync(path, JSON.stringify({ classes: ['x', 'y', 'z'] }), 'utf-8');
    expect(loadClassifierConfigFromFile(path).classes).toEqual(['x', 'y', 'z']);
  });
});

/**
 * YAML/JSON loading and saving for metric registries and classifier configuration.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname, isAbsolute, resolve } from 'node:path';
import YAML from 'yaml';
import type { ClassifierOptions } from '../classifier/tracker.js';
import { ConfigError } from '../errors.js';
import type { MetricRegistry } from '../reporting/registry.js';
import { classifierConfigSchema } from './schema.js';
import { deserializeRegistry, serializeRegistry } from './state.js';

export type FileFormat = 'yaml' | 'json';

export interface LoadOptions {
  /** File format. If not specified, inferred from file extension. */
  fmt?: FileFormat;
}

/**
 * Load a MetricRegistry saved with `saveRegistryToFile`.
 */
export function loadRegistryFromFile(path: string, opts?: LoadOptions): MetricRegistry {
  const fmt = opts?.fmt ?? inferFormat(path);
  const content = readFileSync(path, 'utf-8');
  return loadRegistryFromText(content, { fmt });
}

/**
 * Load a MetricRegistry from a string.
 */
export function loadRegistryFromText(content: string, opts?: LoadOptions): MetricRegistry {
  return deserializeRegistry(parseText(content, opts?.fmt ?? 'yaml'));
}

/**
 * Save a MetricRegistry's accumulator state, so it can be merged with other
 * shards' registries later.
 */
export function saveRegistryToFile(
  registry: MetricRegistry,
  path: string,
  opts?: LoadOptions,
): void {
  const fmt = opts?.fmt ?? inferFormat(path);
  const data = serializeRegistry(registry);

  if (fmt === 'yaml') {
    const content = YAML.stringify(data, { sortMapEntries: false });
    writeFileSync(path, content, 'utf-8');
  } else {
    const content = `${JSON.stringify(data, null, 2)}\n`;
    writeFileSync(path, content, 'utf-8');
  }
}

/**
 * Load classifier options from a YAML/JSON file.
 *
 * A relative `classes_from_file` is resolved against the config file's directory.
 */
export function loadClassifierConfigFromFile(path: string, opts?: LoadOptions): ClassifierOptions {
  const fmt = opts?.fmt ?? inferFormat(path);
  const content = readFileSync(path, 'utf-8');
  return loadClassifierConfigFromObject(parseText(content, fmt), { baseDir: dirname(path) });
}

/**
 * Validate a parsed config object and convert it to ClassifierOptions.
 */
export function loadClassifierConfigFromObject(
  data: unknown,
  opts?: { baseDir?: string },
): ClassifierOptions {
  const parsed = classifierConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid classifier config: ${issues}`);
  }

  const config = parsed.data;
  if (config.classes === undefined && config.classes_from_file === undefined) {
    throw new ConfigError('Invalid classifier config: one of classes or classes_from_file is required');
  }

  let classesFromFile: string | null = null;
  if (config.classes_from_file !== undefined) {
    classesFromFile =
      opts?.baseDir !== undefined && !isAbsolute(config.classes_from_file)
        ? resolve(opts.baseDir, config.classes_from_file)
        : config.classes_from_file;
  }

  return {
    classes: config.classes ?? null,
    classesFromFile,
    refClass: config.ref_class ?? null,
    threshold: config.threshold,
    areaUnderCurve: config.area_under_curve,
    aucDecimalPlaces: config.auc_decimal_places,
  };
}

// -- Utilities --

function parseText(content: string, fmt: FileFormat): unknown {
  const raw: unknown = fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
  return raw;
}

function inferFormat(path: string): FileFormat {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new Error(
    `Could not infer format for filename '${basename(path)}'. Use the fmt option to specify the format.`,
  );
}

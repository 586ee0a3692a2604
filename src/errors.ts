import type { Label } from './types.js';

/**
 * Raised when a caller breaks the input contract of a metric: mismatched
 * sequence lengths, negative counts, probabilities outside [0, 1].
 */
export class MetricContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MetricContractError';
  }
}

/**
 * Raised when two accumulators cannot be merged, e.g. a precision with a recall,
 * or ROC curves built for different positive classes.
 */
export class MetricMergeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MetricMergeError';
  }
}

/**
 * Raised when a value is requested from an accumulator whose value is undefined,
 * such as an AUC over data that contains only one class.
 */
export class DegenerateMetricError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DegenerateMetricError';
  }
}

/**
 * A true or predicted label that is not in the configured class vocabulary.
 */
export class UnknownLabelError extends Error {
  readonly label: Label;

  constructor(label: Label, classes: readonly string[]) {
    super(`Label '${String(label)}' is not in the class list [${classes.join(', ')}]`);
    this.name = 'UnknownLabelError';
    this.label = label;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

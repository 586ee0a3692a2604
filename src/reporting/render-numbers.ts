/**
 * Number formatting for metric reports.
 */

const VALUE_SIG_FIGS = 4;

/**
 * Round to a number of significant figures. Zero and non-finite values pass through.
 */
export function roundSigfigs(value: number, sigFigs = VALUE_SIG_FIGS): number {
  if (value === 0 || !Number.isFinite(value)) {
    return value;
  }
  return Number(value.toPrecision(sigFigs));
}

/**
 * Format a metric value for display.
 *
 * - Integers (counts): formatted with commas
 * - Floats: rounded to 4 significant figures
 */
export function renderMetricValue(value: number): string {
  if (Number.isInteger(value)) {
    return formatWithCommas(value);
  }
  if (!Number.isFinite(value)) {
    return String(value);
  }
  return String(roundSigfigs(value));
}

function formatWithCommas(value: number): string {
  const intPart = Math.abs(value)
    .toFixed(0)
    .replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return `${value < 0 ? '-' : ''}${intPart}`;
}

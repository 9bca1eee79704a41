/**
 * Number, count and duration formatting for evaluation reports.
 */

const METRIC_DECIMALS = 4;
const PERC_DECIMALS = 1;

/**
 * Format a metric in [0, 1] with a fixed number of decimals (4 by default).
 */
export function formatMetric(value: number, decimals = METRIC_DECIMALS): string {
  return value.toFixed(decimals);
}

/**
 * Format a fraction as a percentage.
 */
export function defaultRenderPercentage(value: number): string {
  return `${(value * 100).toFixed(PERC_DECIMALS)}%`;
}

/**
 * Format an integer count with thousands separators.
 */
export function defaultRenderCount(value: number): string {
  return formatWithCommas(value, 0);
}

/**
 * Format a duration given in seconds.
 */
export function defaultRenderDuration(seconds: number): string {
  if (seconds === 0) {
    return '0s';
  }

  const absSeconds = Math.abs(seconds);
  if (absSeconds < 1e-3) {
    return `${formatWithCommas(seconds * 1_000_000, 0)}µs`;
  }
  if (absSeconds < 1) {
    return `${formatWithCommas(seconds * 1_000, 1)}ms`;
  }
  return `${formatWithCommas(seconds, 1)}s`;
}

function formatWithCommas(value: number, decimals: number): string {
  const [intDigits = '0', fraction] = Math.abs(value).toFixed(decimals).split('.');
  const intPart = intDigits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const sign = value < 0 ? '-' : '';
  return fraction ? `${sign}${intPart}.${fraction}` : `${sign}${intPart}`;
}

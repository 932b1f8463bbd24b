/**
 * Number formatting for sweep reports: costs, thresholds, rates and cost differences.
 */

const VALUE_SIG_FIGS = 3;
const DIFF_SIG_FIGS = 3;
const PERC_DECIMALS = 1;
const SMALL_BASE_THRESHOLD = 1e-2;
const MULTIPLIER_DROP_FACTOR = 10;
const MULTIPLIER_ONE_DECIMAL_LIMIT = 100;

/**
 * Format a cost or threshold.
 *
 * Integers get thousands separators; other values keep at least three
 * significant figures and at least one decimal.
 */
export function defaultRenderNumber(value: number): string {
  if (!Number.isFinite(value)) return String(value);
  if (Number.isInteger(value)) return withSeparators(value, 0);

  const magnitude = Math.floor(Math.log10(Math.abs(value)));
  const decimals =
    magnitude >= 0 ? Math.max(1, VALUE_SIG_FIGS - (magnitude + 1)) : VALUE_SIG_FIGS - 1 - magnitude;
  return withSeparators(value, decimals);
}

/**
 * Format a ratio in [0, 1] (precision, recall) as a percentage.
 */
export function defaultRenderPercentage(value: number): string {
  return `${(value * 100).toFixed(PERC_DECIMALS)}%`;
}

/**
 * Format the change from `oldVal` to `newVal`, e.g. optimal cost to calibrated cost.
 * Returns null when the values are equal.
 *
 * - both integers: `+3`
 * - otherwise: `+0.250 / +12.5%`, or a multiplier (`2.5x`) past a 100% change
 */
export function defaultRenderNumberDiff(oldVal: number, newVal: number): string | null {
  if (oldVal === newVal) return null;

  const delta = newVal - oldVal;
  if (Number.isInteger(oldVal) && Number.isInteger(newVal)) {
    return delta > 0 ? `+${delta}` : `${delta}`;
  }

  const absolute = renderSigned(delta);
  const relative = renderRelative(oldVal, newVal);
  return relative === null ? absolute : `${absolute} / ${relative}`;
}

function renderSigned(delta: number): string {
  let digits = Math.abs(delta).toPrecision(DIFF_SIG_FIGS);
  if (!digits.includes('e') && !digits.includes('.')) digits += '.0';
  return `${delta >= 0 ? '+' : '-'}${digits}`;
}

function renderRelative(base: number, newVal: number): string | null {
  if (base === 0) return null;

  const delta = newVal - base;
  // No relative figure against a near-zero base.
  if (
    Math.abs(base) < SMALL_BASE_THRESHOLD &&
    Math.abs(delta) > MULTIPLIER_DROP_FACTOR * Math.abs(base)
  ) {
    return null;
  }

  const change = (delta / base) * 100;
  const perc = `${change >= 0 ? '+' : ''}${change.toFixed(PERC_DECIMALS)}%`;
  if (perc === '+0.0%' || perc === '-0.0%') return null;
  if (Math.abs(delta) <= Math.abs(base)) return perc;

  const multiplier = newVal / base;
  return Math.abs(multiplier) < MULTIPLIER_ONE_DECIMAL_LIMIT
    ? `${multiplier.toFixed(1)}x`
    : `${Math.round(multiplier)}x`;
}

function withSeparators(value: number, decimals: number): string {
  const [intPart = '0', fracPart] = Math.abs(value).toFixed(decimals).split('.');
  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const sign = value < 0 ? '-' : '';
  return fracPart ? `${sign}${grouped}.${fracPart}` : `${sign}${grouped}`;
}

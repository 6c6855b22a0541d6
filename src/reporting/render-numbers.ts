/**
 * Number formatting for snapshot rendering.
 */

const VALUE_SIG_FIGS = 3;
const RATE_DECIMALS = 1;

/**
 * Format a number for display.
 *
 * - Integers: formatted with commas
 * - Floats: at least 1 decimal place and at least 3 significant figures
 */
export function renderNumber(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  if (Number.isInteger(value)) {
    return formatWithCommas(value, 0);
  }

  const absVal = Math.abs(value);
  let decimals: number;
  if (absVal >= 1) {
    const digits = Math.floor(Math.log10(absVal)) + 1;
    decimals = Math.max(1, VALUE_SIG_FIGS - digits);
  } else {
    const exponent = Math.floor(Math.log10(absVal));
    decimals = -exponent + VALUE_SIG_FIGS - 1;
  }

  return formatWithCommas(value, decimals);
}

/**
 * Format a count of examples.
 */
export function renderCount(value: number): string {
  return formatWithCommas(value, 0);
}

/**
 * Format a rate in [0, 1] as a percentage. `null` renders as a dash.
 */
export function renderRate(value: number | null): string {
  if (value === null) return '-';
  return `${(value * 100).toFixed(RATE_DECIMALS)}%`;
}

function formatWithCommas(value: number, decimals: number): string {
  const parts = Math.abs(value).toFixed(decimals).split('.');
  const intPart = (parts[0] ?? '').replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const sign = value < 0 ? '-' : '';
  if (parts.length > 1 && parts[1]) {
    return `${sign}${intPart}.${parts[1]}`;
  }
  return `${sign}${intPart}`;
}

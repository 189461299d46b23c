/**
 * Number parsing for provider values in European notation
 */

const NUMERIC_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Parses European-formatted numbers: "240.937,98" -> 240937.98, "-1,5%" -> -1.5.
 * Plain numbers pass through. Returns null when the value is not numeric.
 */
export function parseEuropeanNumber(value: string | number | null | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (value === null || value === undefined) {
    return 0;
  }

  let cleaned = value.replace(/[%€\s]/g, '');
  if (cleaned.length === 0) {
    return 0;
  }

  const isNegative = cleaned.startsWith('-');
  cleaned = cleaned.replace(/^[+-]/, '');
  // dots group thousands, the comma is the decimal separator
  cleaned = cleaned.replace(/\./g, '').replace(',', '.');

  if (!NUMERIC_PATTERN.test(cleaned)) {
    return null;
  }

  const parsed = Number(cleaned);
  return isNegative ? -parsed : parsed;
}

/**
 * Rounds to two decimals, the precision the provider displays
 */
export function roundToCents(value: number): number {
  const rounded = Math.round(value * 100) / 100;
  // avoid publishing -0
  return rounded === 0 ? 0 : rounded;
}

/* price-parser.ts – turns marketplace price strings into dollar amounts */

export type RawPrice = string | number | null | undefined;

/** Plausible price range for a single record, inclusive (USD). */
export const MIN_PLAUSIBLE_PRICE = 0.1;
export const MAX_PLAUSIBLE_PRICE = 10000;

/**
 * Half-up rounding to cents. 1.005 * 100 is 100.49999999999999 in binary;
 * trimming to 15 significant digits first gives the decimal answer (1.01).
 */
export function roundCurrency(value: number): number {
  return Math.round(Number((value * 100).toPrecision(15))) / 100;
}

/**
 * Normalize a loosely formatted amount ("$1,234.50", "12,99", "12.00 USD").
 * Returns null when nothing numeric survives. Unrounded and unfiltered, so "0.00" is 0.
 * Numbers are taken as-is; only strings are cleaned.
 */
export function normalizeAmount(raw: RawPrice): number | null {
  if (raw === null || raw === undefined || raw === '') return null;
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw !== 'string') {
    throw new TypeError(`Expected a price string or number, got ${typeof raw}`);
  }

  let cleaned = raw.replace(/[^\d.,]/g, '');
  if (!cleaned) return null;

  if (cleaned.includes(',') && cleaned.includes('.')) {
    cleaned = cleaned.replace(/,/g, '');
  } else if (cleaned.includes(',')) {
    // "12,99" is a decimal comma; "1,234" and "1,234,567" are thousands separators
    cleaned = /^\d*,\d{1,2}$/.test(cleaned) ? cleaned.replace(',', '.') : cleaned.replace(/,/g, '');
  }

  cleaned = cleaned.replace(/[^\d.]/g, '');
  if (!/^(\d+\.?\d*|\.\d+)$/.test(cleaned)) return null;

  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse a marketplace price. Values outside [0.10, 10000.00] are treated as absent:
 * they are usually currency codes, ids or quantities that leaked into a price field.
 */
export function parsePrice(raw: RawPrice): number | null {
  const value = normalizeAmount(raw);
  if (value === null) return null;
  if (value < MIN_PLAUSIBLE_PRICE || value > MAX_PLAUSIBLE_PRICE) return null;
  return roundCurrency(value);
}

import { roundCurrency } from './price-parser.js';
import type { Price } from './types.js';

const CHARM_ENDINGS = [0.99, 0.49] as const;
const CHARM_TOLERANCE = 0.001;

export function isCharmPrice(price: Price): boolean {
  const fraction = price - Math.floor(price);
  return CHARM_ENDINGS.some((ending) => Math.abs(fraction - ending) < CHARM_TOLERANCE);
}

/**
 * Round down to the nearest price ending in .49 or .99. Never rounds up.
 *
 *   12.30 → 11.99    12.50 → 12.49    12.99 → 12.99    0 → 0
 *
 * Prices under 0.49 have no charm price below them and become 0.
 */
export function roundDownToCharmPrice(price: Price): Price {
  if (!(price > 0)) return 0;
  if (isCharmPrice(price)) return price;

  const base = Math.floor(price);
  for (const ending of CHARM_ENDINGS) {
    const candidate = roundCurrency(base + ending);
    if (candidate <= price) return candidate;
  }

  return Math.max(0, roundCurrency(base - 1 + 0.99));
}

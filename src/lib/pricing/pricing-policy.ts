/**
 * Store-facing pricing rules.
 *
 * STORE PRICE: walk-in retail, rounded UP to the .99 just above the Discogs median.
 * EBAY SELL-AT: competes with active listings, rounded DOWN to a .49/.99 charm price
 * and never above the Discogs median.
 */

import { roundDownToCharmPrice } from './charm-price.js';
import { roundCurrency } from './price-parser.js';
import type { Price, PricingInputs, PricingOutputs } from './types.js';

function isPositive(value: Price | null | undefined): value is Price {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isPresent(value: Price | null | undefined): value is Price {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * eBay sell-at price.
 *
 * With eBay data: lowest competitor's landed price minus our own flat shipping.
 * An estimate above the Discogs median is treated as an overpriced competitor and
 * the Discogs median is used instead.
 * Without eBay data: the Discogs median, or 0 when that is missing too.
 */
export function computeEbaySellAt(inputs: PricingInputs): Price {
  const { discogsMedian, ebayLowest, ebayLowestShipping, flatShippingCost } = inputs;
  let sellAt = 0;

  if (isPresent(ebayLowest) && isPresent(ebayLowestShipping)) {
    const raw = Math.max(0, roundCurrency(ebayLowest + ebayLowestShipping - flatShippingCost));
    sellAt = isPresent(discogsMedian) && raw > discogsMedian
      ? roundDownToCharmPrice(discogsMedian)
      : roundDownToCharmPrice(raw);
  } else if (isPositive(discogsMedian)) {
    sellAt = roundDownToCharmPrice(discogsMedian);
  }

  return Math.max(0, sellAt);
}

/**
 * Store price: 3.56 → 3.99, 54.00 → 53.99. Absent or non-positive medians give 0.
 * The configured minimum is applied separately by applyStorePriceFloor.
 */
export function computeStorePrice(discogsMedian: Price | null | undefined): Price {
  if (!isPositive(discogsMedian)) return 0;
  return roundCurrency(Math.ceil(discogsMedian) - 0.01);
}

export function applyStorePriceFloor(storePrice: Price, minStorePrice: Price): Price {
  return Math.max(storePrice, minStorePrice);
}

export function computePricingOutputs(inputs: PricingInputs): PricingOutputs {
  return {
    storePrice: applyStorePriceFloor(computeStorePrice(inputs.discogsMedian), inputs.minStorePrice),
    ebaySellAt: computeEbaySellAt(inputs),
  };
}

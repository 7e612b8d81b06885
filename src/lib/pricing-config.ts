/**
 * Pricing Configuration
 *
 * Operator-configured constants that feed the pricing policy. They are passed into
 * every pricing call explicitly; nothing reads them from shared state.
 *
 * PRICING MODEL:
 * 1. eBay sell-at = lowest competitor (item + shipping) - flatShippingCost,
 *    capped at the Discogs median, rounded down to .49/.99
 * 2. Store price = Discogs median rounded up to .99, floored at minStorePrice
 */

import { z } from 'zod';
import { cfg } from '../config.js';

export interface PricingSettings {
  /**
   * Shipping we charge on our own eBay listings (dollars).
   * Competitor landed prices are reduced by this to get a comparable item price.
   * Default: 5.72
   */
  flatShippingCost: number;

  /**
   * Lowest walk-in store price (dollars).
   * Default: 1.99
   */
  minStorePrice: number;
}

export const pricingSettingsSchema = z.object({
  flatShippingCost: z.number().finite().nonnegative(),
  minStorePrice: z.number().finite().nonnegative(),
});

export function getDefaultPricingSettings(): PricingSettings {
  return {
    flatShippingCost: cfg.pricing.flatShippingCost,
    minStorePrice: cfg.pricing.minStorePrice,
  };
}

/**
 * Merge overrides onto the configured defaults.
 * Throws a ZodError when a value is negative or not a number.
 */
export function resolvePricingSettings(overrides: Partial<PricingSettings> = {}): PricingSettings {
  const merged = { ...getDefaultPricingSettings() };
  if (overrides.flatShippingCost !== undefined) merged.flatShippingCost = overrides.flatShippingCost;
  if (overrides.minStorePrice !== undefined) merged.minStorePrice = overrides.minStorePrice;
  return pricingSettingsSchema.parse(merged);
}

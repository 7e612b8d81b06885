/**
 * Shared pricing value types.
 *
 * Every amount is a USD dollar value with two fraction digits (not cents);
 * absent values are null.
 */

export type Price = number;

/** Tier label used when every fallback tier came back empty. */
export const NO_PRICES = 'no_prices';

/**
 * Well-known tier labels. Callers may pass any label to the aggregator;
 * these are the ones the record pricing pipeline uses.
 */
export const SOURCE_KINDS = {
  marketplace: 'marketplace',
  releaseStats: 'release_stats',
  ebayListings: 'ebay_listings',
  noPrices: NO_PRICES,
} as const;

export type SourceKind = string;

export interface AggregatedPricing {
  median: Price | null;
  lowest: Price | null;
  highest: Price | null;
  /** Number of usable prices that went into the statistics */
  sourceCount: number;
  /** Number of entries inspected, including unpriced ones */
  sampleSize: number;
  sourceKind: SourceKind;
}

export type ShippingQuote =
  | { kind: 'calculated' }
  | { kind: 'free' }
  | { kind: 'fixed'; amount: Price };

export interface PricingInputs {
  discogsMedian: Price | null;
  ebayLowest: Price | null;
  ebayLowestShipping: Price | null;
  flatShippingCost: Price;
  minStorePrice: Price;
}

export interface PricingOutputs {
  storePrice: Price;
  ebaySellAt: Price;
}

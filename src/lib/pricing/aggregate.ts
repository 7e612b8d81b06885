/* aggregate.ts – descriptive stats over marketplace prices and the tier fallback chain */

import { roundCurrency } from './price-parser.js';
import { NO_PRICES, type AggregatedPricing, type Price, type SourceKind } from './types.js';

// ── Types ────────────────────────────────────────────────────────────────────

export interface TierYield {
  prices: Price[];
  sampleSize: number;
}

/**
 * One step of a fallback chain. `fetch` may be synchronous (already-fetched data)
 * or async (a client call). An empty result moves on to the next tier; a thrown
 * error or rejection is an infrastructure failure and ends the chain.
 */
export interface FallbackTier {
  label: SourceKind;
  fetch: () => Price[] | TierYield | Promise<Price[] | TierYield>;
}

// ── Statistics ───────────────────────────────────────────────────────────────

function assertPrices(prices: readonly Price[]): void {
  if (!Array.isArray(prices)) {
    throw new TypeError('Expected an array of prices');
  }
  for (const p of prices) {
    if (typeof p !== 'number' || !Number.isFinite(p)) {
      throw new TypeError(`Expected finite numeric prices, got ${String(p)}`);
    }
  }
}

/**
 * Median of a non-empty list. Even counts average the two middle values.
 * Returns null for an empty list.
 */
export function median(prices: readonly Price[]): Price | null {
  if (prices.length === 0) return null;
  const sorted = [...prices].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid];
  return roundCurrency((sorted[mid - 1] + sorted[mid]) / 2);
}

export function emptyAggregation(sampleSize: number): AggregatedPricing {
  return {
    median: null,
    lowest: null,
    highest: null,
    sourceCount: 0,
    sampleSize,
    sourceKind: NO_PRICES,
  };
}

export function aggregate(prices: readonly Price[], sampleSize: number, sourceKind: SourceKind): AggregatedPricing {
  assertPrices(prices);
  if (prices.length === 0) return emptyAggregation(sampleSize);

  return {
    median: median(prices),
    lowest: Math.min(...prices),
    highest: Math.max(...prices),
    sourceCount: prices.length,
    sampleSize,
    sourceKind,
  };
}

// ── Fallback chain ───────────────────────────────────────────────────────────

function toYield(result: Price[] | TierYield): TierYield {
  return Array.isArray(result) ? { prices: result, sampleSize: result.length } : result;
}

/**
 * Walk tiers from most to least specific and aggregate the first one that yields
 * prices. When every tier is empty the result is the "no_prices" aggregation,
 * carrying the first tier's sample size.
 */
export async function resolveWithFallback(tiers: readonly FallbackTier[]): Promise<AggregatedPricing> {
  let firstSampleSize: number | null = null;

  for (const tier of tiers) {
    const { prices, sampleSize } = toYield(await tier.fetch());
    if (firstSampleSize === null) firstSampleSize = sampleSize;

    if (prices.length > 0) {
      console.log(`[pricing-fallback] ${tier.label}: ${prices.length} price(s) from ${sampleSize} sample(s)`);
      return aggregate(prices, sampleSize, tier.label);
    }

    console.log(`[pricing-fallback] ${tier.label}: no prices, trying next tier`);
  }

  return emptyAggregation(firstSampleSize ?? 0);
}

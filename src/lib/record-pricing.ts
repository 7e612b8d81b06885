/**
 * Record pricing pipeline
 *
 * raw marketplace payloads → aggregated prices → posted store / eBay prices
 *
 * Discogs: marketplace listings → release stats → no_prices
 * eBay:    active listings, cheapest competitor by compete value
 *
 * Marketplace outages come back as { ok: false, error }. Missing data is a normal
 * result with null prices and status "no_pricing_data".
 */

import { aggregate, emptyAggregation, resolveWithFallback } from './pricing/aggregate.js';
import { computePricingOutputs } from './pricing/pricing-policy.js';
import { describeShipping } from './pricing/shipping.js';
import { SOURCE_KINDS, type AggregatedPricing, type PricingInputs, type PricingOutputs } from './pricing/types.js';
import { extractListingPrices, extractReleasePrice, type DiscogsSource } from './discogs.js';
import { toCompetitors, type EbayCompetitor, type EbaySource } from './ebay-browse-search.js';
import { FetchError } from './fetch-error.js';
import type { PricingSettings } from './pricing-config.js';

export interface RecordQuery {
  artist: string;
  title: string;
  discogsReleaseId?: string | number | null;
}

export interface RecordPricingSources {
  discogs: Pick<DiscogsSource, 'getMarketplaceListings' | 'getRelease'>;
  ebay: EbaySource;
}

export interface RecordPricingOptions {
  excludeForeign?: boolean;
  homeMarketplaceId?: string;
}

export type RecordPricingStatus = 'priced' | 'no_pricing_data';

export interface RecordPricingResult {
  status: RecordPricingStatus;
  discogs: AggregatedPricing;
  ebay: AggregatedPricing;
  ebayLowestListing: EbayCompetitor | null;
  inputs: PricingInputs;
  outputs: PricingOutputs;
}

export interface EbayPricing {
  pricing: AggregatedPricing;
  lowest: EbayCompetitor | null;
}

export type RecordPricingOutcome =
  | { ok: true; result: RecordPricingResult }
  | { ok: false; error: FetchError };

export async function priceDiscogsRelease(
  discogs: RecordPricingSources['discogs'],
  releaseId: string | number | null | undefined
): Promise<AggregatedPricing> {
  if (releaseId === null || releaseId === undefined || releaseId === '') {
    return emptyAggregation(0);
  }

  return resolveWithFallback([
    {
      label: SOURCE_KINDS.marketplace,
      fetch: async () => {
        const listings = await discogs.getMarketplaceListings(releaseId);
        return { prices: extractListingPrices(listings), sampleSize: listings.length };
      },
    },
    {
      label: SOURCE_KINDS.releaseStats,
      fetch: async () => {
        const release = await discogs.getRelease(releaseId);
        const price = release ? extractReleasePrice(release) : null;
        return price === null ? [] : [price];
      },
    },
  ]);
}

export async function priceEbayListings(
  ebay: EbaySource,
  query: string,
  settings: PricingSettings,
  options: RecordPricingOptions = {}
): Promise<EbayPricing> {
  const items = await ebay.searchItemSummaries(query);
  const competitors = toCompetitors(items, {
    flatShippingCost: settings.flatShippingCost,
    excludeForeign: options.excludeForeign,
    homeMarketplaceId: options.homeMarketplaceId,
  });

  return {
    pricing: aggregate(competitors.map((c) => c.price), items.length, SOURCE_KINDS.ebayListings),
    lowest: competitors[0] ?? null,
  };
}

export async function priceRecord(
  query: RecordQuery,
  sources: RecordPricingSources,
  settings: PricingSettings,
  options: RecordPricingOptions = {}
): Promise<RecordPricingOutcome> {
  const searchText = `${query.artist} ${query.title}`.trim();
  console.log(`[record-pricing] Pricing "${searchText}" (release ${query.discogsReleaseId ?? 'unknown'})`);

  // Only marketplace failures become an outcome; anything else is a bug and propagates
  const fetched = await Promise.all([
    priceDiscogsRelease(sources.discogs, query.discogsReleaseId),
    priceEbayListings(sources.ebay, searchText, settings, options),
  ]).catch((err: unknown) => {
    if (err instanceof FetchError) return err;
    throw err;
  });

  if (fetched instanceof FetchError) {
    console.error(`[record-pricing] ${fetched.source} fetch failed for "${searchText}": ${fetched.message}`);
    return { ok: false, error: fetched };
  }

  const [discogs, ebay] = fetched;
  const lowest = ebay.lowest;
  const inputs: PricingInputs = {
    discogsMedian: discogs.median,
    ebayLowest: lowest ? lowest.price : null,
    ebayLowestShipping: lowest ? lowest.shippingAmount : null,
    flatShippingCost: settings.flatShippingCost,
    minStorePrice: settings.minStorePrice,
  };
  const outputs = computePricingOutputs(inputs);
  const status: RecordPricingStatus =
    discogs.sourceCount === 0 && ebay.pricing.sourceCount === 0 ? 'no_pricing_data' : 'priced';

  const lowestLabel = lowest ? `$${lowest.price.toFixed(2)} + ${describeShipping(lowest.shipping)}` : 'none';
  console.log(
    `[record-pricing] "${searchText}": discogs=${discogs.sourceKind} ebay=${ebay.pricing.sourceCount} comps (lowest ${lowestLabel}) → store $${outputs.storePrice.toFixed(2)}, eBay $${outputs.ebaySellAt.toFixed(2)}`
  );

  return {
    ok: true,
    result: {
      status,
      discogs,
      ebay: ebay.pricing,
      ebayLowestListing: lowest,
      inputs,
      outputs,
    },
  };
}

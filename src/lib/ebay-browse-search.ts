/**
 * eBay Browse API - Active Listings Search
 *
 * Searches eBay for active record listings to get competitor pricing.
 * The bearer token is supplied by the caller; minting it is not handled here.
 */

import { z } from 'zod';
import { fetchJson } from './marketplace-http.js';
import { parsePrice, roundCurrency } from './pricing/price-parser.js';
import { extractShippingCost, shippingAmount } from './pricing/shipping.js';
import type { Price, ShippingQuote } from './pricing/types.js';

// ============================================================================
// Types
// ============================================================================

const rawPriceSchema = z.union([z.string(), z.number()]).nullish();

const moneySchema = z
  .object({
    value: rawPriceSchema,
    __value__: rawPriceSchema,
    currency: z.string().nullish(),
  })
  .passthrough();

export const ebayItemSummarySchema = z
  .object({
    itemId: z.string().optional(),
    title: z.string().nullish(),
    price: moneySchema.nullish(),
    shippingOptions: z
      .array(
        z
          .object({
            shippingCostType: z.string().nullish(),
            shippingCost: moneySchema.nullish(),
          })
          .passthrough()
      )
      .nullish(),
    shippingCostSummary: z
      .object({
        shippingType: z.string().nullish(),
        shippingServiceCost: moneySchema.nullish(),
      })
      .passthrough()
      .nullish(),
    fixedShippingCost: z.union([moneySchema, z.string(), z.number()]).nullish(),
    condition: z.string().nullish(),
    listingMarketplaceId: z.string().nullish(),
    itemWebUrl: z.string().nullish(),
    thumbnailImages: z.array(z.object({ imageUrl: z.string().nullish() }).passthrough()).nullish(),
  })
  .passthrough();

export const ebaySearchResponseSchema = z
  .object({
    total: z.number().optional(),
    itemSummaries: z.array(ebayItemSummarySchema).nullish(),
  })
  .passthrough();

export type EbayItemSummary = z.infer<typeof ebayItemSummarySchema>;

export interface EbayCompetitor {
  itemId: string;
  title: string;
  price: Price;
  shipping: ShippingQuote;
  shippingAmount: Price;
  /** price + shippingAmount: what the buyer pays */
  landed: Price;
  /** landed - our flat shipping: the item price we would have to match */
  compete: Price;
  condition: string;
  url: string;
  thumbnail: string;
}

export interface CompetitorOptions {
  flatShippingCost: Price;
  excludeForeign?: boolean;
  homeMarketplaceId?: string;
}

// ============================================================================
// Extraction
// ============================================================================

/** Browse API uses price.value; older payloads carry price.__value__. */
export function extractItemPrice(item: EbayItemSummary): Price | null {
  if (!item.price) return null;
  return parsePrice(item.price.value ?? item.price.__value__);
}

export function isForeignListing(item: EbayItemSummary, homeMarketplaceId = 'EBAY_US'): boolean {
  return !!item.listingMarketplaceId && item.listingMarketplaceId !== homeMarketplaceId;
}

/**
 * Priced competitors sorted by compete value (cheapest first).
 * Foreign-marketplace listings are skipped unless excludeForeign is false.
 */
export function toCompetitors(items: readonly EbayItemSummary[], options: CompetitorOptions): EbayCompetitor[] {
  const { flatShippingCost, excludeForeign = true, homeMarketplaceId = 'EBAY_US' } = options;
  const competitors: EbayCompetitor[] = [];

  for (const item of items) {
    if (excludeForeign && isForeignListing(item, homeMarketplaceId)) continue;

    const price = extractItemPrice(item);
    if (price === null) continue;

    const shipping = extractShippingCost(item);
    const ship = shippingAmount(shipping, flatShippingCost);
    const landed = roundCurrency(price + ship);

    competitors.push({
      itemId: item.itemId ?? '',
      title: item.title || 'Unknown',
      price,
      shipping,
      shippingAmount: ship,
      landed,
      compete: roundCurrency(landed - flatShippingCost),
      condition: item.condition || 'Unknown',
      url: item.itemWebUrl || (item.itemId ? `https://www.ebay.com/itm/${item.itemId}` : '#'),
      thumbnail: item.thumbnailImages?.[0]?.imageUrl || '',
    });
  }

  // Array.prototype.sort is stable, so equal compete values keep search order
  return competitors.sort((a, b) => a.compete - b.compete);
}

// ============================================================================
// Client
// ============================================================================

export interface EbayClientOptions {
  apiHost: string;
  getAccessToken: () => string | Promise<string>;
  categoryId?: string;
  marketplaceId?: string;
  limit?: number;
}

export interface EbaySource {
  searchItemSummaries(query: string): Promise<EbayItemSummary[]>;
}

export function createEbayClient(options: EbayClientOptions): EbaySource {
  const { apiHost, getAccessToken, categoryId, marketplaceId = 'EBAY_US', limit = 50 } = options;

  return {
    async searchItemSummaries(query) {
      const url = new URL(`${apiHost}/buy/browse/v1/item_summary/search`);
      url.searchParams.set('q', query);
      url.searchParams.set('limit', String(limit));
      if (categoryId) url.searchParams.set('category_ids', categoryId);
      url.searchParams.set('filter', 'conditions:{USED|NEW}');

      const token = await getAccessToken();
      const data = await fetchJson(ebaySearchResponseSchema, {
        source: 'ebay',
        url: url.toString(),
        headers: {
          Authorization: `Bearer ${token}`,
          'X-EBAY-C-MARKETPLACE-ID': marketplaceId,
        },
      });

      const items = data.itemSummaries ?? [];
      console.log(`[ebay-browse] Search "${query}": ${data.total ?? items.length} total, ${items.length} returned`);
      return items;
    },
  };
}

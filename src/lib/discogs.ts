/**
 * Discogs API - Database search, marketplace listings and release stats
 *
 * Pricing tiers for a release, most specific first:
 * 1. Active marketplace listings (per-listing prices)
 * 2. Release stats (lowest_price / estimated_price point estimate)
 *
 * A release that 404s is "no data", not an error.
 */

import { z } from 'zod';
import { fetchJson, fetchJsonOrNull } from './marketplace-http.js';
import { parsePrice } from './pricing/price-parser.js';
import type { Price } from './pricing/types.js';

// ============================================================================
// Payload schemas
// ============================================================================

const rawPriceSchema = z.union([z.string(), z.number()]).nullish();

export const discogsListingSchema = z
  .object({
    id: z.number().optional(),
    price: z
      .object({
        value: rawPriceSchema,
        currency: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    condition: z.string().nullish(),
    sleeve_condition: z.string().nullish(),
  })
  .passthrough();

export const discogsListingsResponseSchema = z
  .object({
    listings: z.array(discogsListingSchema).nullish(),
  })
  .passthrough();

export const discogsReleaseSchema = z
  .object({
    id: z.number().optional(),
    title: z.string().nullish(),
    lowest_price: rawPriceSchema,
    estimated_price: rawPriceSchema,
    num_for_sale: z.number().nullish(),
  })
  .passthrough();

const labelEntrySchema = z.union([
  z.string(),
  z.object({ name: z.string().nullish(), catno: z.string().nullish() }).passthrough(),
]);

export const discogsSearchResultSchema = z
  .object({
    id: z.number().optional(),
    title: z.string().nullish(),
    artist: z.string().nullish(),
    artists: z.array(z.object({ name: z.string().nullish() }).passthrough()).nullish(),
    year: z.union([z.string(), z.number()]).nullish(),
    genre: z.array(z.string()).nullish(),
    catno: z.string().nullish(),
    label: z.union([z.array(labelEntrySchema), z.string()]).nullish(),
    format: z.array(z.string()).nullish(),
    cover_image: z.string().nullish(),
    thumb: z.string().nullish(),
  })
  .passthrough();

export const discogsSearchResponseSchema = z
  .object({
    results: z.array(discogsSearchResultSchema).nullish(),
  })
  .passthrough();

export type DiscogsListing = z.infer<typeof discogsListingSchema>;
export type DiscogsRelease = z.infer<typeof discogsReleaseSchema>;
export type DiscogsSearchResult = z.infer<typeof discogsSearchResultSchema>;

export interface ReleaseCandidate {
  discogsId: number | null;
  artist: string;
  cleanedArtist: string;
  title: string;
  year: string;
  genre: string;
  catalogNumber: string;
  imageUrl: string;
}

// ============================================================================
// Extraction
// ============================================================================

export function extractListingPrices(listings: readonly DiscogsListing[]): Price[] {
  const prices: Price[] = [];
  for (const listing of listings) {
    const price = parsePrice(listing.price?.value);
    if (price !== null) prices.push(price);
  }
  return prices;
}

/** Release-level point estimate: lowest_price, then estimated_price. */
export function extractReleasePrice(release: DiscogsRelease): Price | null {
  for (const raw of [release.lowest_price, release.estimated_price]) {
    const price = parsePrice(raw);
    if (price !== null) return price;
  }
  return null;
}

function firstHttpUrl(candidates: Array<string | null | undefined>): string {
  return candidates.find((c): c is string => typeof c === 'string' && c.startsWith('http')) ?? '';
}

/**
 * Strip Discogs disambiguation from an artist name:
 * "Nirvana (2)" → "Nirvana", "Prince*" → "Prince", "Artist A / Artist B" → "Artist A"
 */
export function cleanArtistName(name: string): string {
  return name
    .replace(/\s*\(\d+\)\s*$/, '')
    .replace(/\s*\*\s*$/, '')
    .replace(/\s*\/.*$/, '')
    .trim();
}

function stripNumberSuffix(name: string): string {
  return name.replace(/\s*\(\d+\)\s*$/, '').trim();
}

function extractArtist(result: DiscogsSearchResult): string {
  const named = result.artists?.find((a) => a.name)?.name;
  if (named) return stripNumberSuffix(named);
  if (result.artist) return stripNumberSuffix(result.artist);
  if (result.title && result.title.includes(' - ')) {
    return stripNumberSuffix(result.title.split(' - ')[0]);
  }
  return 'Unknown Artist';
}

function extractTitle(result: DiscogsSearchResult): string {
  if (!result.title) return 'Unknown Title';
  const sep = result.title.indexOf(' - ');
  return sep >= 0 ? result.title.slice(sep + 3).trim() : result.title;
}

const hasDigit = (s: string) => /\d/.test(s);

function extractCatalogNumber(result: DiscogsSearchResult): string {
  if (result.catno) return result.catno;

  const labels = typeof result.label === 'string' ? [result.label] : result.label ?? [];
  for (const label of labels) {
    if (typeof label === 'string') {
      if (hasDigit(label)) return label;
    } else if (label.catno) {
      return label.catno;
    }
  }

  return result.format?.find(hasDigit) ?? '';
}

export function toReleaseCandidate(result: DiscogsSearchResult): ReleaseCandidate {
  const artist = extractArtist(result);
  return {
    discogsId: result.id ?? null,
    artist,
    cleanedArtist: cleanArtistName(artist),
    title: extractTitle(result),
    year: result.year !== null && result.year !== undefined ? String(result.year) : 'Unknown',
    genre: result.genre && result.genre.length > 0 ? result.genre.join(', ') : 'Unknown',
    catalogNumber: extractCatalogNumber(result),
    imageUrl: firstHttpUrl([result.cover_image, result.thumb]),
  };
}

export function marketplaceUrl(query: string): string {
  return `https://www.discogs.com/sell/list?q=${encodeURIComponent(query)}&currency=USD`;
}

// ============================================================================
// Client
// ============================================================================

export interface DiscogsClientOptions {
  token: string;
  userAgent: string;
  baseUrl?: string;
}

export interface DiscogsSource {
  search(query: string): Promise<DiscogsSearchResult[]>;
  /** [] when the release has no marketplace page */
  getMarketplaceListings(releaseId: string | number): Promise<DiscogsListing[]>;
  /** null when Discogs has no such release */
  getRelease(releaseId: string | number): Promise<DiscogsRelease | null>;
}

export function createDiscogsClient(options: DiscogsClientOptions): DiscogsSource {
  const baseUrl = (options.baseUrl || 'https://api.discogs.com').replace(/\/+$/, '');
  const headers: Record<string, string> = { 'User-Agent': options.userAgent };
  if (options.token) headers.Authorization = `Discogs token=${options.token}`;

  return {
    async search(query) {
      const url = new URL(`${baseUrl}/database/search`);
      url.searchParams.set('q', query);
      url.searchParams.set('type', 'release');
      url.searchParams.set('per_page', '50');
      url.searchParams.set('currency', 'USD');

      const data = await fetchJson(discogsSearchResponseSchema, { source: 'discogs', url: url.toString(), headers });
      const results = data.results ?? [];
      console.log(`[discogs] Search "${query}": ${results.length} result(s)`);
      return results;
    },

    async getMarketplaceListings(releaseId) {
      const url = new URL(`${baseUrl}/marketplace/listings`);
      url.searchParams.set('release_id', String(releaseId));
      url.searchParams.set('per_page', '100');
      url.searchParams.set('currency', 'USD');

      const data = await fetchJsonOrNull(discogsListingsResponseSchema, {
        source: 'discogs',
        url: url.toString(),
        headers,
      });
      return data?.listings ?? [];
    },

    async getRelease(releaseId) {
      const url = `${baseUrl}/releases/${encodeURIComponent(String(releaseId))}`;
      return fetchJsonOrNull(discogsReleaseSchema, { source: 'discogs', url, headers });
    },
  };
}

import 'dotenv/config';

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

const ebayEnv: 'PROD' | 'SANDBOX' =
  (process.env.EBAY_ENV || 'PROD').toUpperCase() === 'SANDBOX' ? 'SANDBOX' : 'PROD';

export const cfg = {
  port: envNumber('PORT', 3000),

  pricing: {
    // What we charge buyers for shipping a single LP
    flatShippingCost: envNumber('FLAT_SHIPPING_COST', 5.72),
    minStorePrice: envNumber('MIN_STORE_PRICE', 1.99),
  },

  discogs: {
    token: process.env.DISCOGS_TOKEN || '',
    userAgent: process.env.DISCOGS_USER_AGENT || 'RecordShopPricing/1.0',
    baseUrl: process.env.DISCOGS_BASE_URL || 'https://api.discogs.com',
  },

  ebay: {
    env: ebayEnv,
    appToken: process.env.EBAY_APP_TOKEN || '',
    categoryId: process.env.EBAY_CATEGORY_ID || '176985', // Music > Vinyl Records
    marketplaceId: process.env.EBAY_MARKETPLACE_ID || 'EBAY_US',
    excludeForeign: (process.env.EBAY_EXCLUDE_FOREIGN ?? 'true') === 'true',
    searchLimit: envNumber('EBAY_SEARCH_LIMIT', 50),
  },
};

export function ebayApiHost(env: 'PROD' | 'SANDBOX'): string {
  return env === 'PROD' ? 'https://api.ebay.com' : 'https://api.sandbox.ebay.com';
}

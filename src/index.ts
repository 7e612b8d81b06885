import { cfg, ebayApiHost } from './config.js';
import { createApp } from './app.js';
import { createDiscogsClient } from './lib/discogs.js';
import { createEbayClient } from './lib/ebay-browse-search.js';

if (!cfg.discogs.token) {
  console.warn('[startup] DISCOGS_TOKEN is not set; Discogs requests will be unauthenticated and rate limited');
}
if (!cfg.ebay.appToken) {
  console.warn('[startup] EBAY_APP_TOKEN is not set; eBay searches will fail');
}

const app = createApp(
  {
    discogs: createDiscogsClient({
      token: cfg.discogs.token,
      userAgent: cfg.discogs.userAgent,
      baseUrl: cfg.discogs.baseUrl,
    }),
    ebay: createEbayClient({
      apiHost: ebayApiHost(cfg.ebay.env),
      getAccessToken: () => cfg.ebay.appToken,
      categoryId: cfg.ebay.categoryId,
      marketplaceId: cfg.ebay.marketplaceId,
      limit: cfg.ebay.searchLimit,
    }),
  },
  {
    excludeForeign: cfg.ebay.excludeForeign,
    homeMarketplaceId: cfg.ebay.marketplaceId,
  }
);

// start
app.listen(cfg.port, () => {
  console.log(`Server running on :${cfg.port}`);
});

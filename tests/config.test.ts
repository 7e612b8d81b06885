// Test config.ts by mocking environment variables
describe('config', () => {
  const originalEnv: Record<string, string | undefined> = {};

  const envKeys = [
    'PORT',
    'FLAT_SHIPPING_COST',
    'MIN_STORE_PRICE',
    'DISCOGS_TOKEN',
    'DISCOGS_USER_AGENT',
    'EBAY_ENV',
    'EBAY_CATEGORY_ID',
    'EBAY_EXCLUDE_FOREIGN',
    'EBAY_SEARCH_LIMIT',
  ];

  beforeAll(() => {
    envKeys.forEach((key) => {
      originalEnv[key] = process.env[key];
    });
  });

  beforeEach(() => {
    jest.resetModules();
    envKeys.forEach((key) => {
      delete process.env[key];
    });
  });

  afterEach(() => {
    envKeys.forEach((key) => {
      if (originalEnv[key] !== undefined) {
        process.env[key] = originalEnv[key];
      } else {
        delete process.env[key];
      }
    });
  });

  describe('cfg', () => {
    it('uses defaults when the environment is empty', () => {
      const { cfg } = require('../src/config');
      expect(cfg.port).toBe(3000);
      expect(cfg.pricing).toEqual({ flatShippingCost: 5.72, minStorePrice: 1.99 });
      expect(cfg.discogs.userAgent).toBe('RecordShopPricing/1.0');
      expect(cfg.ebay.env).toBe('PROD');
      expect(cfg.ebay.categoryId).toBe('176985');
      expect(cfg.ebay.excludeForeign).toBe(true);
      expect(cfg.ebay.searchLimit).toBe(50);
    });

    it('reads pricing settings from env', () => {
      process.env.FLAT_SHIPPING_COST = '6.50';
      process.env.MIN_STORE_PRICE = '2.99';
      const { cfg } = require('../src/config');
      expect(cfg.pricing).toEqual({ flatShippingCost: 6.5, minStorePrice: 2.99 });
    });

    it('falls back to defaults for non-numeric values', () => {
      process.env.PORT = 'eighty';
      process.env.FLAT_SHIPPING_COST = '';
      const { cfg } = require('../src/config');
      expect(cfg.port).toBe(3000);
      expect(cfg.pricing.flatShippingCost).toBe(5.72);
    });

    it('reads eBay settings from env', () => {
      process.env.EBAY_ENV = 'sandbox';
      process.env.EBAY_EXCLUDE_FOREIGN = 'false';
      process.env.EBAY_SEARCH_LIMIT = '100';
      const { cfg } = require('../src/config');
      expect(cfg.ebay.env).toBe('SANDBOX');
      expect(cfg.ebay.excludeForeign).toBe(false);
      expect(cfg.ebay.searchLimit).toBe(100);
    });
  });

  describe('ebayApiHost', () => {
    it('maps the environment to the API host', () => {
      const { ebayApiHost } = require('../src/config');
      expect(ebayApiHost('PROD')).toBe('https://api.ebay.com');
      expect(ebayApiHost('SANDBOX')).toBe('https://api.sandbox.ebay.com');
    });
  });
});

import {
  applyStorePriceFloor,
  computeEbaySellAt,
  computePricingOutputs,
  computeStorePrice,
} from '../../../src/lib/pricing/pricing-policy.js';
import type { PricingInputs } from '../../../src/lib/pricing/types.js';

function inputs(overrides: Partial<PricingInputs> = {}): PricingInputs {
  return {
    discogsMedian: null,
    ebayLowest: null,
    ebayLowestShipping: null,
    flatShippingCost: 5.72,
    minStorePrice: 1.99,
    ...overrides,
  };
}

describe('pricing-policy', () => {
  describe('computeEbaySellAt', () => {
    it('caps an overpriced eBay estimate at the Discogs median', () => {
      // 50 + 10 - 5.72 = 54.28 > 20
      expect(computeEbaySellAt(inputs({ discogsMedian: 20, ebayLowest: 50, ebayLowestShipping: 10 }))).toBe(19.99);
    });

    it('uses the eBay estimate when it is under the median', () => {
      // 12 + 4 - 5.72 = 10.28
      expect(computeEbaySellAt(inputs({ discogsMedian: 20, ebayLowest: 12, ebayLowestShipping: 4 }))).toBe(9.99);
    });

    it('uses the eBay estimate when it equals the median', () => {
      // 15.72 + 0 - 5.72 = 10
      expect(computeEbaySellAt(inputs({ discogsMedian: 10, ebayLowest: 15.72, ebayLowestShipping: 0 }))).toBe(9.99);
    });

    it('uses the eBay estimate without a Discogs median', () => {
      // 30 + 0 - 5.72 = 24.28
      expect(computeEbaySellAt(inputs({ ebayLowest: 30, ebayLowestShipping: 0 }))).toBe(23.99);
    });

    it('clamps a negative estimate to 0', () => {
      expect(computeEbaySellAt(inputs({ ebayLowest: 3, ebayLowestShipping: 0 }))).toBe(0);
    });

    it('falls back to the Discogs median without eBay data', () => {
      expect(computeEbaySellAt(inputs({ discogsMedian: 15 }))).toBe(14.99);
      expect(computeEbaySellAt(inputs({ discogsMedian: 8, ebayLowest: 30 }))).toBe(7.99);
    });

    it('returns 0 with no usable data', () => {
      expect(computeEbaySellAt(inputs())).toBe(0);
      expect(computeEbaySellAt(inputs({ discogsMedian: 0 }))).toBe(0);
      expect(computeEbaySellAt(inputs({ ebayLowest: 30 }))).toBe(0);
    });
  });

  describe('computeStorePrice', () => {
    it('rounds up to the next .99', () => {
      expect(computeStorePrice(3.56)).toBe(3.99);
      expect(computeStorePrice(54)).toBe(53.99);
      expect(computeStorePrice(12.99)).toBe(12.99);
      expect(computeStorePrice(0.2)).toBe(0.99);
    });

    it('returns 0 for absent or non-positive medians', () => {
      expect(computeStorePrice(null)).toBe(0);
      expect(computeStorePrice(undefined)).toBe(0);
      expect(computeStorePrice(0)).toBe(0);
      expect(computeStorePrice(-2)).toBe(0);
    });
  });

  describe('applyStorePriceFloor', () => {
    it('raises prices below the floor', () => {
      expect(applyStorePriceFloor(0, 1.99)).toBe(1.99);
      expect(applyStorePriceFloor(0.99, 1.99)).toBe(1.99);
      expect(applyStorePriceFloor(3.99, 1.99)).toBe(3.99);
    });
  });

  describe('computePricingOutputs', () => {
    it('computes both prices', () => {
      expect(computePricingOutputs(inputs({ discogsMedian: 3.56 }))).toEqual({ storePrice: 3.99, ebaySellAt: 3.49 });
    });

    it('applies the store floor even without data', () => {
      expect(computePricingOutputs(inputs())).toEqual({ storePrice: 1.99, ebaySellAt: 0 });
      expect(computePricingOutputs(inputs({ minStorePrice: 4.99 }))).toEqual({ storePrice: 4.99, ebaySellAt: 0 });
    });
  });
});

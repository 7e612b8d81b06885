import { ZodError } from 'zod';
import { getDefaultPricingSettings, resolvePricingSettings } from '../../src/lib/pricing-config.js';

describe('pricing-config', () => {
  it('defaults to the configured flat shipping and store floor', () => {
    expect(getDefaultPricingSettings()).toEqual({ flatShippingCost: 5.72, minStorePrice: 1.99 });
  });

  it('merges overrides onto the defaults', () => {
    expect(resolvePricingSettings({ flatShippingCost: 4.5 })).toEqual({ flatShippingCost: 4.5, minStorePrice: 1.99 });
    expect(resolvePricingSettings({ minStorePrice: 0 })).toEqual({ flatShippingCost: 5.72, minStorePrice: 0 });
  });

  it('ignores undefined overrides', () => {
    expect(resolvePricingSettings({ flatShippingCost: undefined })).toEqual({
      flatShippingCost: 5.72,
      minStorePrice: 1.99,
    });
  });

  it('rejects negative or non-finite values', () => {
    expect(() => resolvePricingSettings({ flatShippingCost: -1 })).toThrow(ZodError);
    expect(() => resolvePricingSettings({ minStorePrice: Infinity })).toThrow(ZodError);
  });
});

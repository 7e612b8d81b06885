import {
  describeShipping,
  extractShippingCost,
  moneyAmount,
  shippingAmount,
} from '../../../src/lib/pricing/shipping.js';

describe('shipping', () => {
  describe('extractShippingCost', () => {
    it('reads the first shipping option', () => {
      expect(extractShippingCost({ shippingOptions: [{ shippingCostType: 'CALCULATED' }] })).toEqual({
        kind: 'calculated',
      });
      expect(extractShippingCost({ shippingOptions: [{ shippingCostType: 'FREE' }] })).toEqual({ kind: 'free' });
      expect(
        extractShippingCost({
          shippingOptions: [{ shippingCostType: 'FIXED', shippingCost: { value: '4.50', currency: 'USD' } }],
        })
      ).toEqual({ kind: 'fixed', amount: 4.5 });
    });

    it('matches the cost type case-insensitively', () => {
      expect(
        extractShippingCost({ shippingOptions: [{ shippingCostType: 'fixed', shippingCost: { value: '3.00' } }] })
      ).toEqual({ kind: 'fixed', amount: 3 });
    });

    it('treats a fixed cost of zero as free', () => {
      expect(
        extractShippingCost({ shippingOptions: [{ shippingCostType: 'FIXED', shippingCost: { value: '0.00' } }] })
      ).toEqual({ kind: 'free' });
    });

    it('treats a fixed cost without an amount as calculated', () => {
      expect(extractShippingCost({ shippingOptions: [{ shippingCostType: 'FIXED' }] })).toEqual({ kind: 'calculated' });
    });

    it('treats a negative fixed cost as calculated', () => {
      expect(extractShippingCost({ fixedShippingCost: -3 })).toEqual({ kind: 'calculated' });
    });

    it('treats unknown cost types as calculated', () => {
      expect(extractShippingCost({ shippingOptions: [{ shippingCostType: 'NOT_SPECIFIED' }] })).toEqual({
        kind: 'calculated',
      });
    });

    it('prefers shipping options over the cost summary', () => {
      expect(
        extractShippingCost({
          shippingOptions: [{ shippingCostType: 'FREE' }],
          shippingCostSummary: { shippingType: 'Flat', shippingServiceCost: { __value__: '9.00' } },
        })
      ).toEqual({ kind: 'free' });
    });

    it('falls back to the cost summary', () => {
      expect(extractShippingCost({ shippingOptions: [], shippingCostSummary: { shippingType: 'Free' } })).toEqual({
        kind: 'free',
      });
      expect(
        extractShippingCost({
          shippingCostSummary: { shippingType: 'Flat', shippingServiceCost: { __value__: '3.99' } },
        })
      ).toEqual({ kind: 'fixed', amount: 3.99 });
      expect(extractShippingCost({ shippingCostSummary: { shippingServiceCost: { value: '0.0' } } })).toEqual({
        kind: 'free',
      });
    });

    it('falls back to fixedShippingCost', () => {
      expect(extractShippingCost({ fixedShippingCost: '6.00' })).toEqual({ kind: 'fixed', amount: 6 });
      expect(extractShippingCost({ fixedShippingCost: { value: 7.25 } })).toEqual({ kind: 'fixed', amount: 7.25 });
      expect(extractShippingCost({ fixedShippingCost: 0 })).toEqual({ kind: 'free' });
    });

    it('assumes free shipping when no field is present', () => {
      expect(extractShippingCost({})).toEqual({ kind: 'free' });
      expect(extractShippingCost({ shippingOptions: null, shippingCostSummary: null })).toEqual({ kind: 'free' });
    });
  });

  describe('moneyAmount', () => {
    it('reads value, then __value__', () => {
      expect(moneyAmount({ value: '1.00', __value__: '2.00' })).toBe('1.00');
      expect(moneyAmount({ __value__: '2.00' })).toBe('2.00');
      expect(moneyAmount('3.00')).toBe('3.00');
      expect(moneyAmount(null)).toBeNull();
    });
  });

  describe('shippingAmount', () => {
    it('assumes our flat cost for calculated shipping', () => {
      expect(shippingAmount({ kind: 'free' }, 5.72)).toBe(0);
      expect(shippingAmount({ kind: 'fixed', amount: 4.5 }, 5.72)).toBe(4.5);
      expect(shippingAmount({ kind: 'calculated' }, 5.72)).toBe(5.72);
    });
  });

  describe('describeShipping', () => {
    it('renders each kind', () => {
      expect(describeShipping({ kind: 'free' })).toBe('FREE');
      expect(describeShipping({ kind: 'calculated' })).toBe('CALC');
      expect(describeShipping({ kind: 'fixed', amount: 4.5 })).toBe('4.50');
    });
  });
});

/**
 * Shipping normalization for eBay listings.
 *
 * eBay reports "free shipping" three different ways: a FREE cost type, a FIXED cost
 * of 0, or no shipping field at all. Everything downstream works with a single
 * ShippingQuote instead.
 */

import { MAX_PLAUSIBLE_PRICE, normalizeAmount, roundCurrency, type RawPrice } from './price-parser.js';
import type { Price, ShippingQuote } from './types.js';

/** Money as returned by the Browse API ("value") or the older Finding API ("__value__"). */
export interface MoneyValue {
  value?: RawPrice;
  __value__?: RawPrice;
  currency?: string | null;
}

export interface ShippingOption {
  shippingCostType?: string | null;
  shippingCost?: MoneyValue | null;
}

export interface ShippingCostSummary {
  shippingType?: string | null;
  shippingServiceCost?: MoneyValue | null;
}

export interface ShippingFields {
  shippingOptions?: ShippingOption[] | null;
  shippingCostSummary?: ShippingCostSummary | null;
  fixedShippingCost?: MoneyValue | RawPrice;
}

export const FREE_SHIPPING: ShippingQuote = { kind: 'free' };
export const CALCULATED_SHIPPING: ShippingQuote = { kind: 'calculated' };

export function moneyAmount(money: MoneyValue | RawPrice | null | undefined): RawPrice {
  if (money !== null && typeof money === 'object') {
    return money.value ?? money.__value__;
  }
  return money;
}

/** A fixed amount, with 0 meaning free and an unusable amount meaning "ask at checkout". */
function quoteFromAmount(raw: RawPrice): ShippingQuote {
  const amount = normalizeAmount(raw);
  if (amount === null || amount < 0 || amount > MAX_PLAUSIBLE_PRICE) return CALCULATED_SHIPPING;
  const rounded = roundCurrency(amount);
  if (rounded === 0) return FREE_SHIPPING;
  return { kind: 'fixed', amount: rounded };
}

function quoteFromType(type: string | null | undefined, cost: MoneyValue | null | undefined): ShippingQuote {
  switch ((type ?? '').toUpperCase()) {
    case 'FREE':
      return FREE_SHIPPING;
    case 'FIXED':
    case 'FLAT':
      return quoteFromAmount(moneyAmount(cost));
    default:
      // CALCULATED, NOT_SPECIFIED, FREIGHT, ...
      return CALCULATED_SHIPPING;
  }
}

/**
 * Shipping quote for a listing. Sources in priority order:
 * shippingOptions[0] → shippingCostSummary → fixedShippingCost → free.
 */
export function extractShippingCost(listing: ShippingFields): ShippingQuote {
  const option = listing.shippingOptions?.[0];
  if (option) {
    return quoteFromType(option.shippingCostType, option.shippingCost);
  }

  const summary = listing.shippingCostSummary;
  if (summary) {
    if (summary.shippingType) {
      return quoteFromType(summary.shippingType, summary.shippingServiceCost);
    }
    if (summary.shippingServiceCost) {
      return quoteFromAmount(moneyAmount(summary.shippingServiceCost));
    }
  }

  const fixed = moneyAmount(listing.fixedShippingCost);
  if (fixed !== null && fixed !== undefined && fixed !== '') {
    return quoteFromAmount(fixed);
  }

  return FREE_SHIPPING;
}

/**
 * Dollar amount to assume for a quote. Calculated shipping is unknown until checkout
 * and is assumed to cost what we charge ourselves.
 */
export function shippingAmount(quote: ShippingQuote, flatShippingCost: Price): Price {
  switch (quote.kind) {
    case 'free':
      return 0;
    case 'fixed':
      return quote.amount;
    case 'calculated':
      return flatShippingCost;
  }
}

export function describeShipping(quote: ShippingQuote): string {
  switch (quote.kind) {
    case 'free':
      return 'FREE';
    case 'calculated':
      return 'CALC';
    case 'fixed':
      return quote.amount.toFixed(2);
  }
}

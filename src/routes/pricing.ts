import express from 'express';
import { z } from 'zod';
import { resolvePricingSettings } from '../lib/pricing-config.js';
import { computePricingOutputs } from '../lib/pricing/pricing-policy.js';
import { priceRecord, type RecordPricingOptions, type RecordPricingSources } from '../lib/record-pricing.js';

const amount = z.number().finite().nonnegative();

export const quoteRequestSchema = z.object({
  discogsMedian: amount.nullish(),
  ebayLowest: amount.nullish(),
  ebayLowestShipping: amount.nullish(),
  flatShippingCost: amount.optional(),
  minStorePrice: amount.optional(),
});

export const recordRequestSchema = z.object({
  artist: z.string().trim().min(1),
  title: z.string().trim().min(1),
  discogsReleaseId: z.union([z.string().trim().min(1), z.number().int().positive()]).nullish(),
  flatShippingCost: amount.optional(),
  minStorePrice: amount.optional(),
});

export function createPricingRouter(sources: RecordPricingSources, options: RecordPricingOptions = {}) {
  const router = express.Router();

  // Price a record from already-known source prices
  router.post('/pricing/quote', (req, res) => {
    const parsed = quoteRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: 'Invalid quote request', issues: parsed.error.issues });
    }

    const body = parsed.data;
    const settings = resolvePricingSettings({
      flatShippingCost: body.flatShippingCost,
      minStorePrice: body.minStorePrice,
    });
    const outputs = computePricingOutputs({
      discogsMedian: body.discogsMedian ?? null,
      ebayLowest: body.ebayLowest ?? null,
      ebayLowestShipping: body.ebayLowestShipping ?? null,
      ...settings,
    });
    return res.json({ ok: true, outputs });
  });

  // Fetch Discogs + eBay data for a record and price it
  router.post('/pricing/record', async (req, res) => {
    const parsed = recordRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: 'Invalid record request', issues: parsed.error.issues });
    }

    const { artist, title, discogsReleaseId, flatShippingCost, minStorePrice } = parsed.data;
    try {
      const settings = resolvePricingSettings({ flatShippingCost, minStorePrice });
      const outcome = await priceRecord({ artist, title, discogsReleaseId }, sources, settings, options);
      if (!outcome.ok) {
        const { error } = outcome;
        return res.status(502).json({ ok: false, error: error.message, source: error.source, status: error.status ?? null });
      }
      return res.json({ ok: true, result: outcome.result });
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      console.error('[pricing-route] Unexpected failure:', message);
      return res.status(500).json({ ok: false, error: message });
    }
  });

  return router;
}

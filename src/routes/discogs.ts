import express from 'express';
import { z } from 'zod';
import { marketplaceUrl, toReleaseCandidate, type DiscogsSource } from '../lib/discogs.js';
import { isFetchError } from '../lib/fetch-error.js';

export const searchQuerySchema = z.object({
  q: z.string().trim().min(1),
});

export function createDiscogsRouter(discogs: Pick<DiscogsSource, 'search'>) {
  const router = express.Router();

  // Find releases to price; the picked discogsId goes to POST /pricing/record
  router.get('/discogs/search', async (req, res) => {
    const parsed = searchQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: 'Missing search query', issues: parsed.error.issues });
    }

    const { q } = parsed.data;
    try {
      const results = await discogs.search(q);
      const candidates = results.map(toReleaseCandidate).map((candidate) => ({
        ...candidate,
        marketplaceUrl: marketplaceUrl(`${candidate.cleanedArtist} ${candidate.title}`),
      }));
      return res.json({ ok: true, query: q, marketplaceUrl: marketplaceUrl(q), candidates });
    } catch (e) {
      if (isFetchError(e)) {
        return res.status(502).json({ ok: false, error: e.message, source: e.source, status: e.status ?? null });
      }
      const message = e instanceof Error ? e.message : String(e);
      console.error('[discogs-route] Unexpected failure:', message);
      return res.status(500).json({ ok: false, error: message });
    }
  });

  return router;
}

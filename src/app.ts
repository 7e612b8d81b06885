import express from 'express';
import { createDiscogsRouter } from './routes/discogs.js';
import { createPricingRouter } from './routes/pricing.js';
import type { DiscogsSource } from './lib/discogs.js';
import type { RecordPricingOptions, RecordPricingSources } from './lib/record-pricing.js';

export interface AppSources extends RecordPricingSources {
  discogs: DiscogsSource;
}

export function createApp(sources: AppSources, options: RecordPricingOptions = {}) {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  // health
  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.use(createDiscogsRouter(sources.discogs));
  app.use(createPricingRouter(sources, options));

  return app;
}

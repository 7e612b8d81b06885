#!/usr/bin/env node
import { argv } from 'process';
import { request } from 'undici';
import { cfg } from './config.js';

export interface CliRequest {
  artist: string;
  title: string;
  discogsReleaseId?: string;
}

const USAGE = 'Usage: record-pricing <artist> <title> [discogsReleaseId]';

export function parseCliArgs(args: readonly string[]): CliRequest {
  const [artist, title, releaseId] = args.map((a) => a.trim());
  if (!artist || !title) {
    throw new Error(USAGE);
  }
  return releaseId ? { artist, title, discogsReleaseId: releaseId } : { artist, title };
}

export async function main(args: readonly string[] = argv.slice(2)): Promise<void> {
  const body = parseCliArgs(args);
  const baseUrl = process.env.PRICING_URL || `http://localhost:${cfg.port}`;
  const r = await request(`${baseUrl}/pricing/record`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
  const j = await r.body.json();
  console.log(JSON.stringify(j, null, 2));
  if (r.statusCode >= 400) {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch((e) => {
    console.error(e instanceof Error ? e.message : e);
    process.exit(1);
  });
}

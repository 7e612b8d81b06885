/**
 * JSON over fetch for the marketplace clients.
 *
 * Every failure surfaces as a FetchError so callers can tell an outage apart from
 * an empty result. Response bodies are validated against a zod schema before they
 * reach the pricing code.
 */

import type { z } from 'zod';
import { FetchError, FetchErrorCode, type MarketplaceSource } from './fetch-error.js';

export interface JsonRequest {
  source: MarketplaceSource;
  url: string;
  headers?: Record<string, string>;
}

const LOG_TAG: Record<MarketplaceSource, string> = {
  discogs: '[discogs]',
  ebay: '[ebay-browse]',
};

async function send(req: JsonRequest): Promise<Response> {
  const tag = LOG_TAG[req.source];
  console.log(`${tag} GET ${req.url}`);

  try {
    return await fetch(req.url, {
      headers: { Accept: 'application/json', ...req.headers },
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`${tag} Network error: ${message}`);
    throw new FetchError(FetchErrorCode.NETWORK_ERROR, req.source, `${req.source} request failed: ${message}`);
  }
}

async function readBody<S extends z.ZodTypeAny>(schema: S, req: JsonRequest, response: Response): Promise<z.infer<S>> {
  const tag = LOG_TAG[req.source];

  if (!response.ok) {
    const errorText = await response.text().catch(() => '');
    console.error(`${tag} API error ${response.status}: ${errorText.slice(0, 200)}`);
    throw new FetchError(
      FetchErrorCode.HTTP_ERROR,
      req.source,
      `${req.source} API error ${response.status}`,
      response.status
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`${tag} Response was not JSON: ${message}`);
    throw new FetchError(FetchErrorCode.INVALID_RESPONSE, req.source, `${req.source} returned invalid JSON`, response.status);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    console.error(`${tag} Unexpected response shape:`, parsed.error.issues.slice(0, 3));
    throw new FetchError(FetchErrorCode.INVALID_RESPONSE, req.source, `${req.source} returned an unexpected payload`, response.status);
  }
  return parsed.data;
}

export async function fetchJson<S extends z.ZodTypeAny>(schema: S, req: JsonRequest): Promise<z.infer<S>> {
  const response = await send(req);
  return readBody(schema, req, response);
}

/** Same as fetchJson, but a 404 means "no such resource" and resolves to null. */
export async function fetchJsonOrNull<S extends z.ZodTypeAny>(schema: S, req: JsonRequest): Promise<z.infer<S> | null> {
  const response = await send(req);
  if (response.status === 404) {
    console.log(`${LOG_TAG[req.source]} 404 for ${req.url}, treating as no data`);
    return null;
  }
  return readBody(schema, req, response);
}

/**
 * Error types for marketplace fetch failures.
 *
 * "No data" is never a FetchError: a release that 404s or a search with zero hits
 * is returned as null / [] by the clients.
 */
export enum FetchErrorCode {
  HTTP_ERROR = 'HTTP_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
}

export type MarketplaceSource = 'discogs' | 'ebay';

export class FetchError extends Error {
  constructor(
    public code: FetchErrorCode,
    public source: MarketplaceSource,
    message: string,
    public status?: number
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export function isFetchError(err: unknown): err is FetchError {
  return err instanceof FetchError;
}

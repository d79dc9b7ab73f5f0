/**
 * Wiki page source errors
 *
 * @module services/scraper/errors
 */

export type WikiFetchErrorCode = 'PAGE_NOT_FOUND' | 'PAGE_FETCH_TIMEOUT' | 'PAGE_FETCH_FAILED';

export class WikiFetchError extends Error {
  constructor(
    message: string,
    public readonly code: WikiFetchErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'WikiFetchError';
    Error.captureStackTrace?.(this, WikiFetchError);
  }
}

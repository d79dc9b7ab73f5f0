/**
 * Page Source
 *
 * Fetches raw wikitext for a page title. The MediaWiki implementation uses
 * the action API with a bounded timeout and a small retry budget for rate
 * limits and server errors.
 *
 * @module services/scraper/page-source
 */

import { z } from 'zod';
import { WikiFetchError } from './errors.js';

export interface PageSource {
  fetchWikitext(title: string): Promise<string>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface MediaWikiPageSourceOptions {
  apiUrl: string;
  userAgent: string;
  timeoutMs: number;
  retries: number;
  retryBaseDelayMs?: number;
  fetchImpl?: FetchLike;
}

const DEFAULT_RETRY_BASE_DELAY_MS = 1000;

const RevisionsResponseSchema = z.object({
  query: z.object({
    pages: z.array(
      z.object({
        title: z.string(),
        missing: z.boolean().optional(),
        invalid: z.boolean().optional(),
        revisions: z
          .array(
            z.object({
              slots: z.object({ main: z.object({ content: z.string() }) }),
            })
          )
          .optional(),
      })
    ),
  }),
});

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class MediaWikiPageSource implements PageSource {
  private readonly fetchImpl: FetchLike;
  private readonly retryBaseDelayMs: number;

  constructor(private readonly options: MediaWikiPageSourceOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
  }

  buildRequestUrl(title: string): string {
    const params = new URLSearchParams({
      action: 'query',
      prop: 'revisions',
      rvprop: 'content',
      rvslots: 'main',
      redirects: '1',
      format: 'json',
      formatversion: '2',
      titles: title,
    });
    return `${this.options.apiUrl}?${params.toString()}`;
  }

  async fetchWikitext(title: string): Promise<string> {
    const body = await this.requestWithRetry(title);
    const parsed = RevisionsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new WikiFetchError(`Unexpected API response for "${title}"`, 'PAGE_FETCH_FAILED', {
        title,
        issues: parsed.error.errors.map((e) => e.message),
      });
    }

    const page = parsed.data.query.pages[0];
    const content = page?.revisions?.[0]?.slots.main.content;
    if (page === undefined || page.missing === true || page.invalid === true || content === undefined) {
      throw new WikiFetchError(`Page not found: ${title}`, 'PAGE_NOT_FOUND', { title });
    }
    return content;
  }

  private async requestWithRetry(title: string): Promise<unknown> {
    const url = this.buildRequestUrl(title);
    const attempts = this.options.retries + 1;
    let lastError: WikiFetchError | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (attempt > 1) {
        const delay = this.retryBaseDelayMs * Math.pow(2, attempt - 2);
        console.error(`[WikiSource] Retrying "${title}" in ${delay}ms (attempt ${attempt}/${attempts})`);
        await sleep(delay);
      }

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          headers: { 'User-Agent': this.options.userAgent, Accept: 'application/json' },
          signal: AbortSignal.timeout(this.options.timeoutMs),
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        lastError = isTimeout(error)
          ? new WikiFetchError(`Timed out fetching "${title}" after ${this.options.timeoutMs}ms`, 'PAGE_FETCH_TIMEOUT', { title })
          : new WikiFetchError(`Failed to fetch "${title}": ${message}`, 'PAGE_FETCH_FAILED', { title });
        continue;
      }

      if (response.ok) {
        return response.json();
      }

      lastError = new WikiFetchError(
        `HTTP ${response.status} fetching "${title}"`,
        'PAGE_FETCH_FAILED',
        { title, status: response.status }
      );
      if (!isRetryableStatus(response.status)) break;
    }

    throw lastError ?? new WikiFetchError(`Failed to fetch "${title}"`, 'PAGE_FETCH_FAILED', { title });
  }
}

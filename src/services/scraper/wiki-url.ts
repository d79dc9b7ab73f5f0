/**
 * Wiki page URL construction
 *
 * @module services/scraper/wiki-url
 */

export const DEFAULT_WIKI_BASE = 'https://en.wikipedia.org/';

/**
 * Article URL for a page title: whitespace runs become underscores
 */
export function buildWikiUrl(title: string, base: string = DEFAULT_WIKI_BASE): string {
  const root = base.endsWith('/') ? base : `${base}/`;
  return `${root}wiki/${title.trim().replace(/\s+/g, '_')}`;
}

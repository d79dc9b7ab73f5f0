/**
 * Wikitext scraping pipeline
 *
 * @module services/scraper
 */

export { WikiFetchError, type WikiFetchErrorCode } from './errors.js';
export { buildWikiUrl, DEFAULT_WIKI_BASE } from './wiki-url.js';
export {
  buildNamedReferenceTable,
  lookupNamedReference,
  parseCitation,
  parseReference,
  type NamedReferenceLookup,
  type NamedReferenceTable,
} from './reference-parser.js';
export {
  ScrapeAccumulator,
  scrapeContinent,
  scrapeCountry,
  scrapeNodes,
  trailingCountry,
  type DiscoverCallback,
  type ScrapeOptions,
  type ScraperState,
} from './page-scraper.js';
export {
  MediaWikiPageSource,
  type FetchLike,
  type MediaWikiPageSourceOptions,
  type PageSource,
} from './page-source.js';
export {
  CrawlFrontier,
  DEFAULT_ROOT_PAGE,
  DEFAULT_SKIP_COUNTRIES,
  classifySeedLinks,
  getCountryName,
  type CrawlEntry,
  type CrawlFailure,
  type CrawlFrontierOptions,
  type CrawlReport,
  type CrawlResult,
  type CrawlSkip,
  type SeedClassification,
} from './crawl-frontier.js';

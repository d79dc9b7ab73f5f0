/**
 * Crawl Frontier
 *
 * Discovers listing pages from the root index, then drains continent pages
 * before country pages. Fetches run one at a time; a failing page is logged
 * and recorded in the report, and the crawl moves on.
 *
 * @module services/scraper/crawl-frontier
 */

import type { City, SourceType } from '../../models/twin-cities.js';
import { tokenizeWikitext, type WikiNode } from '../wikitext/tokenizer.js';
import { scrapeContinent, scrapeCountry } from './page-scraper.js';
import type { PageSource } from './page-source.js';
import { DEFAULT_WIKI_BASE } from './wiki-url.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** A listing page title and the text it was linked with */
export interface CrawlEntry {
  title: string;
  text: string | null;
}

export interface CrawlFailure {
  title: string;
  sourceType: SourceType;
  message: string;
}

export interface CrawlSkip {
  title: string;
  reason: string;
}

export interface CrawlReport {
  continentsScraped: string[];
  countriesScraped: string[];
  skipped: CrawlSkip[];
  failures: CrawlFailure[];
}

export interface CrawlResult {
  cities: City[];
  report: CrawlReport;
}

export interface SeedClassification {
  continents: CrawlEntry[];
  countries: CrawlEntry[];
}

export interface CrawlFrontierOptions {
  rootPage?: string;
  skipCountries?: readonly string[];
  wikiBase?: string;
}

export const DEFAULT_ROOT_PAGE = 'Lists of twin towns and sister cities';
export const DEFAULT_SKIP_COUNTRIES: readonly string[] = ['Metro Manila'];

const LISTING_PREFIX = 'List of ';

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Country named by a listing label such as "List of twin towns in the Netherlands".
 * Returns null when the label has no " in ".
 */
export function getCountryName(label: string): string | null {
  const match = /\sin\s(.+)/.exec(label);
  if (!match) return null;
  return match[1].trim().replace(/^the\s+/, '');
}

/**
 * Split the root index links into continent and country pages.
 * A listing link preceded by exactly one list item since the previous listing
 * link is a continent page; every other listing link is a country page.
 */
export function classifySeedLinks(nodes: readonly WikiNode[]): SeedClassification {
  const continents: CrawlEntry[] = [];
  const countries: CrawlEntry[] = [];
  let listItems = 0;

  for (const node of nodes) {
    if (node.kind === 'list-item') {
      listItems++;
    } else if (node.kind === 'link' && node.title.startsWith(LISTING_PREFIX)) {
      const entry = { title: node.title, text: node.text };
      (listItems === 1 ? continents : countries).push(entry);
      listItems = 0;
    }
  }
  return { continents, countries };
}

function entryKey(entry: CrawlEntry): string {
  return JSON.stringify([entry.title, entry.text]);
}

// ═══════════════════════════════════════════════════════════════════════════════
// FRONTIER
// ═══════════════════════════════════════════════════════════════════════════════

export class CrawlFrontier {
  private readonly continents: CrawlEntry[] = [];
  private readonly countries: CrawlEntry[] = [];
  private readonly queued = new Set<string>();
  private readonly visited = new Set<string>();
  private readonly rootPage: string;
  private readonly skipCountries: ReadonlySet<string>;
  private readonly wikiBase: string;

  constructor(
    private readonly source: PageSource,
    options: CrawlFrontierOptions = {}
  ) {
    this.rootPage = options.rootPage ?? DEFAULT_ROOT_PAGE;
    this.skipCountries = new Set(options.skipCountries ?? DEFAULT_SKIP_COUNTRIES);
    this.wikiBase = options.wikiBase ?? DEFAULT_WIKI_BASE;
  }

  get pendingContinents(): number {
    return this.continents.length;
  }

  get pendingCountries(): number {
    return this.countries.length;
  }

  enqueueContinent(entry: CrawlEntry): boolean {
    return this.enqueue(this.continents, entry);
  }

  enqueueCountry(entry: CrawlEntry): boolean {
    return this.enqueue(this.countries, entry);
  }

  /** Queue the listing pages linked from the root index */
  seed(wikitext: string): SeedClassification {
    const seeds = classifySeedLinks(tokenizeWikitext(wikitext));
    seeds.continents.forEach((entry) => this.enqueueContinent(entry));
    seeds.countries.forEach((entry) => this.enqueueCountry(entry));
    return seeds;
  }

  /**
   * Fetch the root index and scrape every listing page reachable from it.
   * A failure to fetch the root index is thrown; page failures are reported.
   */
  async run(): Promise<CrawlResult> {
    const rootText = await this.source.fetchWikitext(this.rootPage);
    const seeds = this.seed(rootText);
    console.error(
      `[Crawl] Seeded ${seeds.continents.length} continent and ${seeds.countries.length} country pages from "${this.rootPage}"`
    );
    return this.drain();
  }

  /** Scrape everything already queued, continents first */
  async drain(): Promise<CrawlResult> {
    const cities: City[] = [];
    const report: CrawlReport = { continentsScraped: [], countriesScraped: [], skipped: [], failures: [] };

    let continent = this.continents.shift();
    while (continent !== undefined) {
      const scraped = await this.scrapeEntry(continent, 'continent', null, report);
      cities.push(...scraped);
      continent = this.continents.shift();
    }

    let country = this.countries.shift();
    while (country !== undefined) {
      const name = getCountryName(country.text ?? country.title);
      if (name === null) {
        console.error(`[Crawl] No country in listing label "${country.text ?? country.title}", skipping`);
        report.skipped.push({ title: country.title, reason: 'no country in label' });
      } else if (this.skipCountries.has(name)) {
        report.skipped.push({ title: country.title, reason: `country "${name}" is skip-listed` });
      } else {
        const scraped = await this.scrapeEntry(country, 'country', name, report);
        cities.push(...scraped);
      }
      country = this.countries.shift();
    }

    console.error(
      `[Crawl] Finished: ${cities.length} cities from ${report.continentsScraped.length} continent and ` +
        `${report.countriesScraped.length} country pages, ${report.failures.length} failures`
    );
    return { cities, report };
  }

  private enqueue(queue: CrawlEntry[], entry: CrawlEntry): boolean {
    const key = entryKey(entry);
    if (this.queued.has(key)) return false;
    this.queued.add(key);
    queue.push(entry);
    return true;
  }

  private async scrapeEntry(
    entry: CrawlEntry,
    sourceType: SourceType,
    country: string | null,
    report: CrawlReport
  ): Promise<City[]> {
    if (this.visited.has(entry.title)) {
      report.skipped.push({ title: entry.title, reason: 'already scraped' });
      return [];
    }
    this.visited.add(entry.title);

    try {
      const wikitext = await this.source.fetchWikitext(entry.title);
      const cities =
        sourceType === 'continent' || country === null
          ? scrapeContinent(wikitext, (title) => this.enqueueCountry({ title, text: null }), this.wikiBase)
          : scrapeCountry(wikitext, country, undefined, this.wikiBase);

      for (const city of cities) {
        city.sourcePage = entry.title;
        city.sourceType = sourceType;
      }
      (sourceType === 'continent' ? report.continentsScraped : report.countriesScraped).push(entry.title);
      console.error(`[Crawl] ${entry.title}: ${cities.length} cities`);
      return cities;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Crawl] Failed to scrape "${entry.title}": ${message}`);
      report.failures.push({ title: entry.title, sourceType, message });
      return [];
    }
  }
}

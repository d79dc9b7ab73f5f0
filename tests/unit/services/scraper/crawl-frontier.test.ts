/**
 * Unit tests for the crawl frontier
 *
 * Uses an in-memory page source; no network.
 *
 * @module tests/unit/services/scraper/crawl-frontier
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  CrawlFrontier,
  classifySeedLinks,
  getCountryName,
} from '../../../../src/services/scraper/crawl-frontier.js';
import { WikiFetchError } from '../../../../src/services/scraper/errors.js';
import type { PageSource } from '../../../../src/services/scraper/page-source.js';
import { tokenizeWikitext } from '../../../../src/services/wikitext/tokenizer.js';

class InMemoryPageSource implements PageSource {
  readonly requested: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetchWikitext(title: string): Promise<string> {
    this.requested.push(title);
    const page = this.pages[title];
    if (page === undefined) {
      throw new WikiFetchError(`Page not found: ${title}`, 'PAGE_NOT_FOUND', { title });
    }
    return page;
  }
}

const ROOT = 'Lists of twin towns and sister cities';
const EUROPE = 'List of twin towns and sister cities in Europe';
const ASIA = 'List of twin towns and sister cities in Asia';
const FRANCE = 'List of twin towns and sister cities in France';
const POLAND = 'List of twin towns and sister cities in Poland';
const MANILA = 'List of twin towns and sister cities in Metro Manila';
const NOWHERE = 'List of twin towns in Nowhere';

const PAGES: Record<string, string> = {
  [ROOT]: [
    `*[[${EUROPE}]]`,
    `**[[${FRANCE}]]`,
    `**[[${MANILA}]]`,
    `**[[${NOWHERE}]]`,
    `*[[${ASIA}]]`,
  ].join('\n'),
  [EUROPE]: `== Poland ==\n{{main|${POLAND}}}\n[[Radom]]\n*[[Kielce]], Poland`,
  [ASIA]: '== Japan ==\n[[Kyoto]]\n*[[Paris]], France',
  [FRANCE]: '[[Lyon]]\n*[[Montreal]], Canada',
  [POLAND]: '[[Krakow]]\n*[[Nuremberg]], Germany',
  [MANILA]: '[[Makati]]\n*[[Los Angeles]], United States',
};

describe('getCountryName', () => {
  it('should return the text after " in " without a leading article', () => {
    expect(getCountryName('List of twin towns in the Netherlands')).toBe('Netherlands');
    expect(getCountryName('List of twin towns and sister cities in Poland')).toBe('Poland');
  });

  it('should return null when the label names no country', () => {
    expect(getCountryName('Twin towns of Poland')).toBeNull();
  });
});

describe('classifySeedLinks', () => {
  it('should classify singly listed pages as continents and nested ones as countries', () => {
    const seeds = classifySeedLinks(tokenizeWikitext(PAGES[ROOT]));

    expect(seeds.continents.map((entry) => entry.title)).toEqual([EUROPE, ASIA]);
    expect(seeds.countries.map((entry) => entry.title)).toEqual([FRANCE, MANILA, NOWHERE]);
  });

  it('should ignore links that are not listing pages', () => {
    const seeds = classifySeedLinks(tokenizeWikitext('[[Town twinning]]\n*[[List of sister cities in Oceania|Oceania]]'));

    expect(seeds.continents).toEqual([{ title: 'List of sister cities in Oceania', text: 'Oceania' }]);
    expect(seeds.countries).toEqual([]);
  });
});

describe('CrawlFrontier', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should scrape continents first, then seeded and discovered countries', async () => {
    const source = new InMemoryPageSource(PAGES);
    const { cities, report } = await new CrawlFrontier(source).run();

    expect(cities.map((city) => city.name)).toEqual(['Radom', 'Kyoto', 'Lyon', 'Krakow']);
    expect(source.requested).toEqual([ROOT, EUROPE, ASIA, FRANCE, NOWHERE, POLAND]);
    expect(report.continentsScraped).toEqual([EUROPE, ASIA]);
    expect(report.countriesScraped).toEqual([FRANCE, POLAND]);
  });

  it('should stamp every city with its source page and type', async () => {
    const { cities } = await new CrawlFrontier(new InMemoryPageSource(PAGES)).run();

    expect(cities[0].sourcePage).toBe(EUROPE);
    expect(cities[0].sourceType).toBe('continent');
    expect(cities[2].sourcePage).toBe(FRANCE);
    expect(cities[2].sourceType).toBe('country');
    expect(cities[2].country).toBe('France');
  });

  it('should skip listed countries and record failed pages without stopping', async () => {
    const { report } = await new CrawlFrontier(new InMemoryPageSource(PAGES)).run();

    expect(report.skipped).toEqual([{ title: MANILA, reason: 'country "Metro Manila" is skip-listed' }]);
    expect(report.failures).toEqual([
      { title: NOWHERE, sourceType: 'country', message: `Page not found: ${NOWHERE}` },
    ]);
  });

  it('should honour a custom skip list', async () => {
    const { cities, report } = await new CrawlFrontier(new InMemoryPageSource(PAGES), {
      skipCountries: ['France'],
    }).run();

    expect(cities.map((city) => city.name)).toEqual(['Radom', 'Kyoto', 'Makati', 'Krakow']);
    expect(report.skipped).toEqual([{ title: FRANCE, reason: 'country "France" is skip-listed' }]);
  });

  it('should reject when the root page cannot be fetched', async () => {
    const frontier = new CrawlFrontier(new InMemoryPageSource({}), { rootPage: 'Missing root' });
    await expect(frontier.run()).rejects.toBeInstanceOf(WikiFetchError);
  });

  it('should not queue the same entry twice', () => {
    const frontier = new CrawlFrontier(new InMemoryPageSource({}));

    expect(frontier.enqueueCountry({ title: FRANCE, text: null })).toBe(true);
    expect(frontier.enqueueCountry({ title: FRANCE, text: null })).toBe(false);
    expect(frontier.pendingCountries).toBe(1);
  });

  it('should scrape a page once even when queued under two labels', async () => {
    const source = new InMemoryPageSource(PAGES);
    const frontier = new CrawlFrontier(source);
    frontier.enqueueCountry({ title: FRANCE, text: null });
    frontier.enqueueCountry({ title: FRANCE, text: 'Twin towns in France' });

    const { cities, report } = await frontier.drain();

    expect(cities.map((city) => city.name)).toEqual(['Lyon']);
    expect(report.skipped).toEqual([{ title: FRANCE, reason: 'already scraped' }]);
    expect(source.requested).toEqual([FRANCE]);
  });

  it('should skip country labels without a country', async () => {
    const frontier = new CrawlFrontier(new InMemoryPageSource(PAGES));
    frontier.enqueueCountry({ title: FRANCE, text: 'France' });

    const { cities, report } = await frontier.drain();

    expect(cities).toEqual([]);
    expect(report.skipped).toEqual([{ title: FRANCE, reason: 'no country in label' }]);
  });
});

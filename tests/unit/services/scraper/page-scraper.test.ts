/**
 * Unit tests for the page scraper
 *
 * Country pages, continent pages with headings, and the accumulator
 * transitions between no context, city and twin.
 *
 * @module tests/unit/services/scraper/page-scraper
 */

import { describe, it, expect } from 'vitest';
import { createReference } from '../../../../src/models/twin-cities.js';
import {
  ScrapeAccumulator,
  scrapeContinent,
  scrapeCountry,
  trailingCountry,
} from '../../../../src/services/scraper/page-scraper.js';
import { tokenizeWikitext, type LinkNode } from '../../../../src/services/wikitext/tokenizer.js';

function link(title: string, line: number, text: string | null = null): LinkNode {
  return { kind: 'link', title, text, line, depth: 0 };
}

// ═══════════════════════════════════════════════════════════════════════════════
// COUNTRY PAGES
// ═══════════════════════════════════════════════════════════════════════════════

describe('scrapeCountry', () => {
  it('should read a city with its reference and a twin with its country', () => {
    const cities = scrapeCountry(
      "'''[[Radom]]'''<ref>{{cite web|url=http://x|title=T}}</ref>\n*[[Kielce]], Poland",
      'Poland'
    );

    expect(cities).toEqual([
      {
        name: 'Radom',
        country: 'Poland',
        wikiUrl: 'https://en.wikipedia.org/wiki/Radom',
        wikiText: 'Radom',
        sourcePage: null,
        sourceType: 'country',
        references: [createReference({ url: 'http://x', title: 'T' })],
        twinCities: [
          {
            secondCity: 'Kielce',
            secondCountry: 'Poland',
            wikiUrl: 'https://en.wikipedia.org/wiki/Kielce',
            wikiText: 'Kielce',
            references: [],
          },
        ],
      },
    ]);
  });

  it('should read several twins and start a new city on an unmarked line', () => {
    const cities = scrapeCountry(
      '[[Radom]]\n*[[Kielce]], Poland\n*[[Lviv|City of Lviv]], Ukraine\n[[Nowa Huta]]\n*[[Lyon]], France',
      'Poland'
    );

    expect(cities.map((city) => city.name)).toEqual(['Radom', 'Nowa Huta']);
    expect(cities[0].twinCities.map((twin) => [twin.secondCity, twin.secondCountry, twin.wikiUrl])).toEqual([
      ['Kielce', 'Poland', 'https://en.wikipedia.org/wiki/Kielce'],
      ['City of Lviv', 'Ukraine', 'https://en.wikipedia.org/wiki/Lviv'],
    ]);
    expect(cities[1].wikiUrl).toBe('https://en.wikipedia.org/wiki/Nowa_Huta');
    expect(cities[1].twinCities.map((twin) => twin.secondCity)).toEqual(['Lyon']);
  });

  it('should take the country from a following link and ignore it as a twin', () => {
    const cities = scrapeCountry('[[Radom]]\n*[[Kielce]], [[Poland]]', 'Poland');

    expect(cities[0].twinCities).toHaveLength(1);
    expect(cities[0].twinCities[0].secondCountry).toBe('Poland');
  });

  it('should skip links that are never cities', () => {
    const cities = scrapeCountry(
      '[[Radom]]\n*[[Town twinning|town twinning]] with [[Kielce]], Poland',
      'Poland'
    );
    expect(cities[0].twinCities.map((twin) => twin.secondCity)).toEqual(['Kielce']);
  });

  it('should attach twin refs to the twin they follow', () => {
    const cities = scrapeCountry(
      '[[Radom]]\n*[[Kielce]], Poland<ref>{{cite web|url=http://b.example|title=B}}</ref>',
      'Poland'
    );

    expect(cities[0].references).toEqual([]);
    expect(cities[0].twinCities[0].references).toEqual([createReference({ url: 'http://b.example', title: 'B' })]);
  });

  it('should list twins before any city under a placeholder named after the country', () => {
    const cities = scrapeCountry('*[[Nice]], France', 'Monaco');

    expect(cities).toHaveLength(1);
    expect(cities[0].name).toBe('Monaco');
    expect(cities[0].country).toBe('Monaco');
    expect(cities[0].wikiUrl).toBe('https://en.wikipedia.org/wiki/Monaco');
    expect(cities[0].twinCities.map((twin) => twin.secondCity)).toEqual(['Nice']);
  });

  it('should stop at end matter headings', () => {
    const cities = scrapeCountry('[[Radom]]\n*[[Kielce]], Poland\n== See also ==\n[[Elsewhere]]', 'Poland');
    expect(cities.map((city) => city.name)).toEqual(['Radom']);
  });

  it('should build URLs against a custom wiki base', () => {
    const cities = scrapeCountry('[[Radom]]', 'Poland', undefined, 'https://wiki.example');
    expect(cities[0].wikiUrl).toBe('https://wiki.example/wiki/Radom');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONTINENT PAGES
// ═══════════════════════════════════════════════════════════════════════════════

describe('scrapeContinent', () => {
  const page = [
    '== Poland ==',
    '{{main|List of twin towns in Poland}}',
    "'''[[Radom]]'''",
    '*[[Kielce]], Poland',
    '*[[Lviv]] {{flagicon|UKR}} Ukraine<ref>{{cite web|url=http://b.example|title=B}}</ref>',
    '== Japan ==',
    '[[Kyoto]]',
    '*[[Paris]], France',
    '== References ==',
    '[[Ignored]]',
  ].join('\n');

  it('should take countries from headings', () => {
    const cities = scrapeContinent(page);

    expect(cities.map((city) => [city.name, city.country, city.sourceType])).toEqual([
      ['Radom', 'Poland', 'continent'],
      ['Kyoto', 'Japan', 'continent'],
    ]);
    expect(cities[0].twinCities.map((twin) => [twin.secondCity, twin.secondCountry])).toEqual([
      ['Kielce', 'Poland'],
      ['Lviv', 'Ukraine'],
    ]);
    expect(cities[0].twinCities[1].references).toEqual([createReference({ url: 'http://b.example', title: 'B' })]);
  });

  it('should report pages named by main templates', () => {
    const discovered: string[] = [];
    scrapeContinent(page, (title) => discovered.push(title));
    expect(discovered).toEqual(['List of twin towns in Poland']);
  });

  it('should ignore links before the first heading', () => {
    expect(scrapeContinent('[[Radom]]\n*[[Kielce]], Poland')).toEqual([]);
  });
});

describe('trailingCountry', () => {
  it('should read text after the link up to the end of the line', () => {
    const nodes = tokenizeWikitext('*[[Kielce]] (Poland)\n*[[Other]], Spain');
    expect(trailingCountry(nodes, 1)).toBe('(Poland)');
  });

  it('should return an empty string when nothing follows', () => {
    const nodes = tokenizeWikitext('*[[Kielce]]');
    expect(trailingCountry(nodes, 1)).toBe('');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// ACCUMULATOR TRANSITIONS
// ═══════════════════════════════════════════════════════════════════════════════

describe('ScrapeAccumulator', () => {
  it('should move from no context to city to twin and back', () => {
    const accumulator = new ScrapeAccumulator({ mode: 'country', country: 'Poland' }, new Map());
    expect(accumulator.state).toBe('no_context');

    accumulator.onLink(link('Radom', 0), '');
    expect(accumulator.state).toBe('in_city');

    accumulator.onListItem();
    expect(accumulator.state).toBe('in_twin');

    accumulator.onLink(link('Kielce', 1), 'Poland');
    expect(accumulator.state).toBe('in_twin');

    accumulator.onHeading({ kind: 'heading', title: 'History', level: 2, line: 2, depth: 0 });
    expect(accumulator.state).toBe('no_context');
    expect(accumulator.isFinished).toBe(false);
    expect(accumulator.result().map((city) => city.twinCities.length)).toEqual([1]);
  });

  it('should finish on a references heading', () => {
    const accumulator = new ScrapeAccumulator({ mode: 'country', country: 'Poland' }, new Map());
    accumulator.onHeading({ kind: 'heading', title: 'References', level: 2, line: 0, depth: 0 });
    expect(accumulator.isFinished).toBe(true);
  });

  it('should set the country from headings only in continent mode', () => {
    const continent = new ScrapeAccumulator({ mode: 'continent', country: null }, new Map());
    continent.onHeading({ kind: 'heading', title: 'Japan', level: 2, line: 0, depth: 0 });
    expect(continent.currentCountry).toBe('Japan');

    const country = new ScrapeAccumulator({ mode: 'country', country: 'Poland' }, new Map());
    country.onHeading({ kind: 'heading', title: 'Masovian Voivodeship', level: 2, line: 0, depth: 0 });
    expect(country.currentCountry).toBe('Poland');
  });

  it('should not report main templates on country pages', () => {
    const discovered: string[] = [];
    const accumulator = new ScrapeAccumulator(
      { mode: 'country', country: 'Poland', discover: (title) => discovered.push(title) },
      new Map()
    );
    accumulator.onTemplate({
      kind: 'template',
      name: 'Main',
      params: [{ name: '1', value: 'Elsewhere' }],
      line: 0,
      depth: 0,
    });
    expect(discovered).toEqual([]);
  });
});

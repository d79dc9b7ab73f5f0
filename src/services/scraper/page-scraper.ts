/**
 * Page Scraper
 *
 * Walks the node stream of one listing page and accumulates City records.
 * Continent pages use headings as country names; country pages receive the
 * country from the caller.
 *
 * The split between a new city and another twin rests on list depth: a link
 * with no list marker since the last city opens a city, a deeper link is a
 * twin. A link that starts a new line at the same depth as the previous twin
 * is read as the next city. That heuristic is best-effort; pages that nest
 * cities inside lists can still be misread.
 *
 * @module services/scraper/page-scraper
 */

import {
  createCity,
  type City,
  type SourceType,
  type TwinCitiesAgreement,
} from '../../models/twin-cities.js';
import { stripMarkup, trimListNoise } from '../wikitext/markup.js';
import {
  tokenizeWikitext,
  type HeadingNode,
  type LinkNode,
  type RefNode,
  type TemplateNode,
  type WikiNode,
} from '../wikitext/tokenizer.js';
import { buildNamedReferenceTable, parseReference, type NamedReferenceTable } from './reference-parser.js';
import { buildWikiUrl, DEFAULT_WIKI_BASE } from './wiki-url.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES & CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

export type ScraperState = 'no_context' | 'in_city' | 'in_twin';

/** Called with the title of another listing page referenced from this one */
export type DiscoverCallback = (title: string) => void;

export interface ScrapeOptions {
  mode: SourceType;
  /** Fixed country for country pages; continent pages read it from headings */
  country: string | null;
  discover?: DiscoverCallback;
  wikiBase?: string;
}

/** Headings after which a page holds no more list data */
const END_MATTER_HEADINGS = new Set([
  'references',
  'see also',
  'notes',
  'external links',
  'further reading',
]);

/** Link texts that appear in list prose but are never cities */
const IGNORED_LINK_TEXTS = new Set(['town twinning', 'European Union']);

// ═══════════════════════════════════════════════════════════════════════════════
// ACCUMULATOR
// ═══════════════════════════════════════════════════════════════════════════════

export class ScrapeAccumulator {
  private readonly cities: City[] = [];
  private readonly wikiBase: string;
  private country: string | null;
  private city: City | null = null;
  private cityEmitted = false;
  private twin: TwinCitiesAgreement | null = null;
  private depth = 0;
  private lastTwinDepth = -1;
  private lastTwinLine = -1;
  private finished = false;

  constructor(
    private readonly options: ScrapeOptions,
    private readonly references: NamedReferenceTable
  ) {
    this.country = options.mode === 'country' ? options.country : null;
    this.wikiBase = options.wikiBase ?? DEFAULT_WIKI_BASE;
  }

  get state(): ScraperState {
    if (this.city === null) return 'no_context';
    return this.depth === 0 ? 'in_city' : 'in_twin';
  }

  get isFinished(): boolean {
    return this.finished;
  }

  get currentCountry(): string | null {
    return this.country;
  }

  onHeading(node: HeadingNode): void {
    if (END_MATTER_HEADINGS.has(node.title.toLowerCase())) {
      this.finished = true;
      return;
    }
    if (this.options.mode === 'continent') {
      this.country = node.title;
    }
    this.closeCity();
  }

  onListItem(): void {
    this.depth++;
    if (this.city === null && this.country !== null) {
      this.city = createCity({
        name: this.country,
        country: this.country,
        wikiUrl: buildWikiUrl(this.country, this.wikiBase),
        wikiText: this.country,
        sourceType: this.options.mode,
      });
      this.cityEmitted = false;
    }
  }

  /**
   * @param twinCountry - text following the link on its line, already cleaned
   */
  onLink(node: LinkNode, twinCountry: string): void {
    if (this.country === null) return;

    const name = linkName(node);
    if (IGNORED_LINK_TEXTS.has(name)) return;

    if (this.city !== null && this.depth > 0) {
      if (node.line === this.lastTwinLine) return;
      if (this.depth !== this.lastTwinDepth) {
        this.addTwin(node, name, twinCountry);
        return;
      }
    }
    this.openCity(node, name);
  }

  onRef(node: RefNode): void {
    const reference = parseReference(node, this.references);
    if (reference === null) return;

    if (this.state === 'in_city' && this.city !== null) {
      this.city.references.push(reference);
    } else if (this.state === 'in_twin' && this.twin !== null) {
      this.twin.references.push(reference);
    }
  }

  onTemplate(node: TemplateNode): void {
    if (this.options.mode !== 'continent' || this.options.discover === undefined) return;
    if (!isMainTemplate(node.name)) return;

    const target = node.params.find((param) => param.name === '1');
    if (target !== undefined && target.value.length > 0) {
      this.options.discover(stripMarkup(target.value));
    }
  }

  result(): City[] {
    return this.cities;
  }

  private openCity(node: LinkNode, name: string): void {
    this.city = createCity({
      name,
      country: this.country ?? name,
      wikiUrl: buildWikiUrl(node.title, this.wikiBase),
      wikiText: node.title,
      sourceType: this.options.mode,
    });
    this.cities.push(this.city);
    this.cityEmitted = true;
    this.twin = null;
    this.depth = 0;
    this.lastTwinDepth = -1;
    this.lastTwinLine = -1;
  }

  private addTwin(node: LinkNode, name: string, twinCountry: string): void {
    if (this.city === null) return;

    this.twin = {
      secondCity: name,
      secondCountry: twinCountry,
      wikiUrl: buildWikiUrl(node.title, this.wikiBase),
      wikiText: node.title,
      references: [],
    };
    this.city.twinCities.push(this.twin);
    if (!this.cityEmitted) {
      this.cities.push(this.city);
      this.cityEmitted = true;
    }
    this.lastTwinDepth = this.depth;
    this.lastTwinLine = node.line;
  }

  private closeCity(): void {
    this.city = null;
    this.cityEmitted = false;
    this.twin = null;
    this.depth = 0;
    this.lastTwinDepth = -1;
    this.lastTwinLine = -1;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// NODE HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function linkName(node: LinkNode): string {
  if (node.text === null) return node.title;
  const visible = stripMarkup(node.text);
  return visible.length > 0 ? visible : node.title;
}

function isMainTemplate(name: string): boolean {
  return name.length > 0 && name[0].toLowerCase() + name.slice(1) === 'main';
}

/**
 * Country of a twin: the text after the link on the same line, with refs and
 * templates left out. Falls back to the next link on that line.
 */
export function trailingCountry(nodes: readonly WikiNode[], index: number): string {
  const link = nodes[index];
  let text = '';
  let fallback: string | null = null;

  for (let i = index + 1; i < nodes.length; i++) {
    const node = nodes[i];
    if (node.depth > link.depth) continue;
    if (node.depth < link.depth || node.line !== link.line) break;

    if (node.kind === 'text') {
      const newline = node.value.indexOf('\n');
      if (newline === -1) {
        text += node.value;
        continue;
      }
      text += node.value.slice(0, newline);
      break;
    }
    if (node.kind === 'link') {
      fallback = linkName(node);
      break;
    }
    if (node.kind === 'ref' || node.kind === 'template' || node.kind === 'external-link') continue;
    break;
  }

  const country = trimListNoise(stripMarkup(text));
  if (country.length > 0) return country;
  return fallback === null ? '' : trimListNoise(fallback);
}

// ═══════════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Scrape a tokenized page. The reference table is built from the whole page,
 * end matter included.
 */
export function scrapeNodes(nodes: readonly WikiNode[], options: ScrapeOptions): City[] {
  const accumulator = new ScrapeAccumulator(options, buildNamedReferenceTable(nodes));

  for (let i = 0; i < nodes.length && !accumulator.isFinished; i++) {
    const node = nodes[i];
    switch (node.kind) {
      case 'heading':
        accumulator.onHeading(node);
        break;
      case 'list-item':
        accumulator.onListItem();
        break;
      case 'link':
        accumulator.onLink(node, trailingCountry(nodes, i));
        break;
      case 'ref':
        accumulator.onRef(node);
        break;
      case 'template':
        accumulator.onTemplate(node);
        break;
      default:
        break;
    }
  }
  return accumulator.result();
}

export function scrapeContinent(wikitext: string, discover?: DiscoverCallback, wikiBase?: string): City[] {
  return scrapeNodes(tokenizeWikitext(wikitext), { mode: 'continent', country: null, discover, wikiBase });
}

export function scrapeCountry(
  wikitext: string,
  country: string,
  discover?: DiscoverCallback,
  wikiBase?: string
): City[] {
  return scrapeNodes(tokenizeWikitext(wikitext), { mode: 'country', country, discover, wikiBase });
}

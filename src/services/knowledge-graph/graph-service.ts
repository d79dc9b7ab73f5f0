/**
 * Twin Cities Graph
 *
 * Accumulates scraped City records into a triple graph backed by SQLite.
 * Twin links are written in both directions. Each twin relationship gets a
 * city-pair node; references are deduplicated by identity and scoped to the
 * pairs they were cited for, so a reference cited for one twin of a city is
 * not reported for its other twins.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/knowledge-graph/graph-service
 */

import {
  createReference,
  referenceIdentity,
  type City,
  type CitySummary,
  type Reference,
  type SourceType,
  type TwinSummary,
} from '../../models/twin-cities.js';
import { compareStrings } from '../comparison/alignment.js';
import { DatabaseService, type Triple } from '../storage/database/index.js';
import { readNTriplesFile, serializeNTriples, writeNTriplesFile } from './export-service.js';
import { RDF_TYPE, RDFS_LABEL, TC, cityPairIri, referenceIri } from './vocabulary.js';

// ============================================================
// Types
// ============================================================

export interface GraphStats {
  triples: number;
  cities: number;
  citiesWithTwins: number;
  references: number;
  cityPairs: number;
}

export interface IngestResult {
  cities: number;
  twinLinks: number;
  triplesAdded: number;
}

interface CityNode {
  url: string;
  name: string;
  country: string;
  wikiText: string;
  sourcePage: string | null;
  sourceType: SourceType | null;
}

/** Single-valued reference properties; accessDate is multi-valued */
const REFERENCE_FIELDS = [
  ['url', TC.url],
  ['website', TC.website],
  ['title', TC.title],
  ['publisher', TC.publisher],
  ['language', TC.language],
  ['date', TC.date],
] as const;

function byNameThenUrl(a: { name: string; url: string }, b: { name: string; url: string }): number {
  return compareStrings(a.name, b.name) || compareStrings(a.url, b.url);
}

function toSourceType(value: string | null): SourceType | null {
  return value === 'continent' || value === 'country' ? value : null;
}

// ============================================================
// Graph
// ============================================================

export class TwinCitiesGraph {
  private triplesAdded = 0;

  constructor(private readonly store: DatabaseService) {}

  /** Graph over a private in-memory database */
  static inMemory(): TwinCitiesGraph {
    return new TwinCitiesGraph(DatabaseService.inMemory('twin_cities'));
  }

  get database(): DatabaseService {
    return this.store;
  }

  close(): void {
    this.store.close();
  }

  // ----------------------------------------------------------
  // Ingestion
  // ----------------------------------------------------------

  /**
   * Add cities, their twins and references. Runs in one transaction;
   * re-adding the same data writes nothing new.
   */
  addCities(cities: readonly City[]): IngestResult {
    return this.store.transaction(() => {
      this.triplesAdded = 0;
      let twinLinks = 0;

      for (const city of cities) {
        this.upsertCity({
          url: city.wikiUrl,
          name: city.name,
          country: city.country,
          wikiText: city.wikiText,
          sourcePage: city.sourcePage,
          sourceType: city.sourceType,
        });

        for (const twin of city.twinCities) {
          this.upsertCity({
            url: twin.wikiUrl,
            name: twin.secondCity,
            country: twin.secondCountry,
            wikiText: twin.wikiText,
            sourcePage: city.sourcePage,
            sourceType: city.sourceType,
          });
          this.addIri(city.wikiUrl, TC.twin, twin.wikiUrl);
          this.addIri(twin.wikiUrl, TC.twin, city.wikiUrl);
          twinLinks++;

          const pair = cityPairIri(city.wikiUrl, twin.wikiUrl);
          this.addIri(pair, RDF_TYPE, TC.CityPair);
          this.addIri(pair, TC.member, city.wikiUrl);
          this.addIri(pair, TC.member, twin.wikiUrl);

          for (const reference of [...city.references, ...twin.references]) {
            this.addReference(reference, pair, city.wikiUrl, twin.wikiUrl);
          }
        }
      }

      if (this.triplesAdded > 0) this.store.touch();
      return { cities: cities.length, twinLinks, triplesAdded: this.triplesAdded };
    });
  }

  /** Insert raw triples, e.g. from a loaded file. Returns the number added. */
  importTriples(triples: readonly Triple[]): number {
    return this.store.transaction(() => {
      let added = 0;
      for (const triple of triples) {
        if (this.store.insertTriple(triple)) added++;
      }
      if (added > 0) this.store.touch();
      return added;
    });
  }

  private addIri(subject: string, predicate: string, object: string): void {
    if (this.store.insertTriple({ subject, predicate, object, objectKind: 'iri' })) {
      this.triplesAdded++;
    }
  }

  private addLiteral(subject: string, predicate: string, value: string | null): void {
    if (value === null || value.length === 0) return;
    if (this.store.insertTriple({ subject, predicate, object: value, objectKind: 'literal' })) {
      this.triplesAdded++;
    }
  }

  /** Write a single-valued literal only when the subject has none yet */
  private backfill(subject: string, predicate: string, value: string | null): void {
    if (value === null || value.length === 0) return;
    if (this.store.hasProperty(subject, predicate)) return;
    this.addLiteral(subject, predicate, value);
  }

  private upsertCity(node: CityNode): void {
    this.addIri(node.url, RDF_TYPE, TC.City);
    this.backfill(node.url, RDFS_LABEL, node.name);
    this.backfill(node.url, TC.country, node.country);
    this.backfill(node.url, TC.wikiText, node.wikiText);
    this.backfill(node.url, TC.sourcePage, node.sourcePage);
    this.backfill(node.url, TC.sourceType, node.sourceType);
  }

  private addReference(reference: Reference, pair: string, cityUrl: string, twinUrl: string): void {
    const node = referenceIri(referenceIdentity(reference));
    this.addIri(node, RDF_TYPE, TC.Reference);
    for (const [field, predicate] of REFERENCE_FIELDS) {
      this.backfill(node, predicate, reference[field]);
    }
    this.addLiteral(node, TC.accessDate, reference.accessDate);

    this.addIri(node, TC.pair, pair);
    this.addIri(cityUrl, TC.reference, node);
    this.addIri(twinUrl, TC.reference, node);
  }

  // ----------------------------------------------------------
  // Queries
  // ----------------------------------------------------------

  /** Cities with at least one twin, sorted by name then URL */
  getCities(): CitySummary[] {
    return this.store
      .getSubjectsWithPredicate(TC.twin)
      .map((url) => ({
        url,
        name: this.store.getFirstObject(url, RDFS_LABEL) ?? url,
        country: this.store.getFirstObject(url, TC.country) ?? '',
      }))
      .sort(byNameThenUrl);
  }

  getTwins(cityUrl: string): TwinSummary[] {
    return this.store
      .getObjects(cityUrl, TC.twin)
      .map((url) => ({
        url,
        name: this.store.getFirstObject(url, RDFS_LABEL) ?? url,
        country: this.store.getFirstObject(url, TC.country) ?? '',
        sourcePage: this.store.getFirstObject(url, TC.sourcePage),
        sourceType: toSourceType(this.store.getFirstObject(url, TC.sourceType)),
        wikiText: this.store.getFirstObject(url, TC.wikiText),
      }))
      .sort(byNameThenUrl);
  }

  /**
   * References cited for the relationship between two cities, deduplicated
   * by URL and sorted by identity. Several access dates are joined by a space.
   */
  getReferences(cityUrl: string, twinUrl: string): Reference[] {
    const pair = cityPairIri(cityUrl, twinUrl);
    const candidates = new Set([
      ...this.store.getObjects(cityUrl, TC.reference),
      ...this.store.getObjects(twinUrl, TC.reference),
    ]);

    const byUrl = new Map<string, Reference>();
    for (const node of candidates) {
      if (!this.store.hasTriple({ subject: node, predicate: TC.pair, object: pair, objectKind: 'iri' })) {
        continue;
      }
      const reference = this.readReference(node);
      const key = reference.url ?? referenceIdentity(reference);
      const existing = byUrl.get(key);
      byUrl.set(key, existing === undefined ? reference : mergeAccessDates(existing, reference));
    }

    return [...byUrl.values()].sort((a, b) => compareStrings(referenceIdentity(a), referenceIdentity(b)));
  }

  private readReference(node: string): Reference {
    const accessDates = this.store.getObjects(node, TC.accessDate);
    return createReference({
      url: this.store.getFirstObject(node, TC.url),
      website: this.store.getFirstObject(node, TC.website),
      title: this.store.getFirstObject(node, TC.title),
      publisher: this.store.getFirstObject(node, TC.publisher),
      language: this.store.getFirstObject(node, TC.language),
      accessDate: accessDates.length > 0 ? accessDates.join(' ') : null,
      date: this.store.getFirstObject(node, TC.date),
    });
  }

  getStats(): GraphStats {
    return {
      triples: this.store.countTriples(),
      cities: this.store.countSubjectsOfType(RDF_TYPE, TC.City),
      citiesWithTwins: this.store.countDistinctSubjects(TC.twin),
      references: this.store.countSubjectsOfType(RDF_TYPE, TC.Reference),
      cityPairs: this.store.countSubjectsOfType(RDF_TYPE, TC.CityPair),
    };
  }

  // ----------------------------------------------------------
  // Persistence
  // ----------------------------------------------------------

  serialize(): string {
    return serializeNTriples(this.store.listTriples());
  }

  /** Write the whole graph as N-Triples. Returns the triple count. */
  save(path: string): number {
    const triples = this.store.listTriples();
    writeNTriplesFile(path, triples);
    console.error(`[Graph] Saved ${triples.length} triples to ${path}`);
    return triples.length;
  }

  /** Merge an N-Triples file into the graph. Returns the number of new triples. */
  load(path: string): number {
    const triples = readNTriplesFile(path);
    const added = this.importTriples(triples);
    console.error(`[Graph] Loaded ${triples.length} triples from ${path} (${added} new)`);
    return added;
  }
}

function mergeAccessDates(first: Reference, second: Reference): Reference {
  const dates = [first.accessDate, second.accessDate]
    .filter((value): value is string => value !== null)
    .flatMap((value) => value.split(' '));
  const unique = [...new Set(dates)];
  return { ...first, accessDate: unique.length > 0 ? unique.join(' ') : null };
}

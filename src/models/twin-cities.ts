/**
 * Twin Cities Data Models
 *
 * Records produced by the wikitext scraper and consumed by the graph store.
 * Optional values are explicit nulls, never missing keys.
 *
 * @module models/twin-cities
 */

/** Where a scraped city record was found */
export type SourceType = 'continent' | 'country';

/**
 * A citation attached to a city or a twin relationship.
 * accessDate may contain several dates joined by a single space.
 */
export interface Reference {
  url: string | null;
  website: string | null;
  title: string | null;
  publisher: string | null;
  language: string | null;
  accessDate: string | null;
  date: string | null;
}

/** Identity used when no identifying field is present */
export const UNKNOWN_REFERENCE_IDENTITY = 'unknown';

/** Field order that decides reference identity */
const IDENTITY_FIELDS = ['url', 'website', 'title', 'publisher'] as const;

export interface TwinCitiesAgreement {
  secondCity: string;
  secondCountry: string;
  wikiUrl: string;
  wikiText: string;
  references: Reference[];
}

export interface City {
  name: string;
  country: string;
  wikiUrl: string;
  wikiText: string;
  sourcePage: string | null;
  sourceType: SourceType;
  references: Reference[];
  twinCities: TwinCitiesAgreement[];
}

/** City row returned by graph listing queries */
export interface CitySummary {
  url: string;
  name: string;
  country: string;
}

/** Twin row returned by graph twin queries */
export interface TwinSummary {
  url: string;
  name: string;
  country: string;
  sourcePage: string | null;
  sourceType: SourceType | null;
  wikiText: string | null;
}

/**
 * Build a reference, defaulting every absent field to null
 */
export function createReference(fields: Partial<Reference> = {}): Reference {
  return {
    url: fields.url ?? null,
    website: fields.website ?? null,
    title: fields.title ?? null,
    publisher: fields.publisher ?? null,
    language: fields.language ?? null,
    accessDate: fields.accessDate ?? null,
    date: fields.date ?? null,
  };
}

/**
 * Deduplication key of a reference: first non-null of url, website, title, publisher.
 */
export function referenceIdentity(reference: Reference): string {
  for (const field of IDENTITY_FIELDS) {
    const value = reference[field];
    if (value !== null) return value;
  }
  return UNKNOWN_REFERENCE_IDENTITY;
}

export function createCity(
  fields: Pick<City, 'name' | 'country' | 'wikiUrl' | 'wikiText'> & Partial<City>,
): City {
  return {
    name: fields.name,
    country: fields.country,
    wikiUrl: fields.wikiUrl,
    wikiText: fields.wikiText,
    sourcePage: fields.sourcePage ?? null,
    sourceType: fields.sourceType ?? 'country',
    references: fields.references ?? [],
    twinCities: fields.twinCities ?? [],
  };
}

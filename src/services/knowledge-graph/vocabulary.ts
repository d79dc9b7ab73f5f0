/**
 * Graph vocabulary
 *
 * City nodes are identified by their wiki URL. Reference and city-pair
 * nodes get hash-based IRIs under the project namespace.
 *
 * @module services/knowledge-graph/vocabulary
 */

import { computeHash, extractHashHex } from '../../utils/hash.js';

export const TWIN_CITIES_NS = 'urn:twin-cities:';

export const RDF_TYPE = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#type';
export const RDFS_LABEL = 'http://www.w3.org/2000/01/rdf-schema#label';

export const TC = {
  City: `${TWIN_CITIES_NS}City`,
  Reference: `${TWIN_CITIES_NS}Reference`,
  CityPair: `${TWIN_CITIES_NS}CityPair`,

  country: `${TWIN_CITIES_NS}country`,
  wikiText: `${TWIN_CITIES_NS}wikiText`,
  sourcePage: `${TWIN_CITIES_NS}sourcePage`,
  sourceType: `${TWIN_CITIES_NS}sourceType`,
  twin: `${TWIN_CITIES_NS}twin`,
  reference: `${TWIN_CITIES_NS}reference`,

  url: `${TWIN_CITIES_NS}url`,
  website: `${TWIN_CITIES_NS}website`,
  title: `${TWIN_CITIES_NS}title`,
  publisher: `${TWIN_CITIES_NS}publisher`,
  language: `${TWIN_CITIES_NS}language`,
  accessDate: `${TWIN_CITIES_NS}accessDate`,
  date: `${TWIN_CITIES_NS}date`,

  /** reference -> pair it applies to */
  pair: `${TWIN_CITIES_NS}pair`,
  /** pair -> one of its two cities */
  member: `${TWIN_CITIES_NS}member`,
} as const;

function hashSuffix(content: string): string {
  return extractHashHex(computeHash(content));
}

/** Pair identity: hash of the two city URLs in sorted order */
export function cityPairIri(firstUrl: string, secondUrl: string): string {
  const [a, b] = [firstUrl, secondUrl].sort();
  return `${TWIN_CITIES_NS}pair:${hashSuffix(`${a}\n${b}`)}`;
}

export function referenceIri(identity: string): string {
  return `${TWIN_CITIES_NS}reference:${hashSuffix(identity)}`;
}

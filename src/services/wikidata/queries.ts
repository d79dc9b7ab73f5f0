/**
 * SPARQL query templates
 *
 * Templates carry a {{CITY_URL}} placeholder for the English wiki article
 * of the city being looked up.
 *
 * @module services/wikidata/queries
 */

import { z } from 'zod';
import { validateInput } from '../../utils/validation.js';

export const CITY_URL_PLACEHOLDER = '{{CITY_URL}}';

/** Base of the entity URLs the query service returns */
export const ENTITY_BASE = 'http://www.wikidata.org/entity/';

/**
 * Twin-town statements (P190) of the entity whose article is {{CITY_URL}},
 * with qualifiers and reference fields. One row per statement and reference
 * combination.
 */
export const TWIN_DATA_QUERY = `PREFIX wikibase: <http://wikiba.se/ontology#>
PREFIX bd: <http://www.bigdata.com/rdf#>
PREFIX p: <http://www.wikidata.org/prop/>
PREFIX ps: <http://www.wikidata.org/prop/statement/>
PREFIX pq: <http://www.wikidata.org/prop/qualifier/>
PREFIX pr: <http://www.wikidata.org/prop/reference/>
PREFIX rdfs: <http://www.w3.org/2000/01/rdf-schema#>
PREFIX schema: <http://schema.org/>
PREFIX prov: <http://www.w3.org/ns/prov#>

SELECT ("{{CITY_URL}}" AS ?sourceUrl)
  ?sourceId ?targetId ?targetUrl ?targetLabel ?starttime ?endtime
  ?retrieved ?referenceUrl ?referencePublisher ?referenceName
WHERE {
  ?sourceId ^schema:about <{{CITY_URL}}> .
  ?sourceId p:P190 ?statement .
  ?statement ps:P190 ?targetId .

  OPTIONAL {
    ?targetId ^schema:about ?targetUrl .
    FILTER (REGEX(STR(?targetUrl), "://en.wikipedia"))
  }
  OPTIONAL { ?statement pq:P580 ?starttime . }
  OPTIONAL { ?statement pq:P582 ?endtime . }
  OPTIONAL { ?statement prov:wasDerivedFrom ?refnode . ?refnode pr:P813 ?retrieved . }
  OPTIONAL { ?statement prov:wasDerivedFrom ?refnode . ?refnode pr:P854 ?referenceUrl . }
  OPTIONAL { ?statement prov:wasDerivedFrom ?refnode . ?refnode pr:P123 ?referencePublisher . }
  OPTIONAL { ?statement prov:wasDerivedFrom ?refnode . ?refnode pr:P1476 ?referenceName . }

  SERVICE wikibase:label {
    bd:serviceParam wikibase:language "en" .
    ?targetId rdfs:label ?targetLabel .
  }
}`;

/** Entities whose article is {{CITY_URL}} */
export const ENTITY_ID_QUERY = `PREFIX schema: <http://schema.org/>

SELECT ?id
WHERE {
  ?id ^schema:about <{{CITY_URL}}> .
}`;

// Characters that would break out of the IRI or string the URL is placed in
const CityUrlSchema = z
  .string()
  .url('City URL must be an absolute URL')
  .refine((value) => !/[\s<>"{}|^`\\]/.test(value), 'City URL contains characters not allowed in an IRI');

/**
 * Substitute the city URL into a template.
 * @throws ValidationError when the URL is not a plain absolute IRI
 */
export function fillQuery(template: string, cityUrl: string): string {
  const url = validateInput(CityUrlSchema, cityUrl);
  return template.split(CITY_URL_PLACEHOLDER).join(url);
}

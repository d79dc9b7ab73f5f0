/**
 * Structured knowledge base access
 *
 * @module services/wikidata
 */

export { KnowledgeBaseError, type KnowledgeBaseErrorCode } from './errors.js';
export { CITY_URL_PLACEHOLDER, ENTITY_BASE, ENTITY_ID_QUERY, TWIN_DATA_QUERY, fillQuery } from './queries.js';
export {
  KnowledgeBaseQueryClient,
  entityIdFromUrl,
  groupTwinRows,
  type KnowledgeBaseQueryClientOptions,
  type SparqlRow,
} from './query-client.js';
export {
  DAY_PRECISION,
  ReconciliationService,
  STATEMENT_PROPERTIES,
  buildReconciliationPayload,
  parseAccessDate,
  selectReferenceFields,
  toStatementReference,
  type IdentifierLookup,
  type KnowledgeBaseWriter,
  type PayloadInput,
} from './reconciliation.js';

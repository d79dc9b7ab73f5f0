/**
 * Session construction
 *
 * @module server/state
 */

import { TwinCitiesGraph } from '../services/knowledge-graph/graph-service.js';
import type { FetchLike } from '../services/scraper/page-source.js';
import { DatabaseService } from '../services/storage/database/index.js';
import { KnowledgeBaseQueryClient } from '../services/wikidata/query-client.js';
import type { KnowledgeBaseWriter } from '../services/wikidata/reconciliation.js';
import type { TwinCitiesConfig } from './config.js';
import type { SessionContext } from './types.js';

export interface SessionOptions {
  /** Use this graph instead of opening the configured database */
  graph?: TwinCitiesGraph;
  writer?: KnowledgeBaseWriter | null;
  fetchImpl?: FetchLike;
}

/**
 * Open the configured graph database (created on first use) and wire the
 * knowledge base client.
 */
export function createSession(config: TwinCitiesConfig, options: SessionOptions = {}): SessionContext {
  const graph =
    options.graph ?? new TwinCitiesGraph(DatabaseService.openOrCreate(config.graphName, config.storagePath));

  const queryClient = new KnowledgeBaseQueryClient({
    endpoint: config.sparqlEndpoint,
    userAgent: config.userAgent,
    timeoutMs: config.fetchTimeoutMs,
    fetchImpl: options.fetchImpl,
  });

  console.error(`[Server] Session open on graph "${graph.database.getName()}"`);
  return { config, graph, queryClient, writer: options.writer ?? null };
}

export function closeSession(session: SessionContext): void {
  session.graph.close();
}

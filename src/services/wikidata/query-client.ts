/**
 * Knowledge Base Query Client
 *
 * Runs SPARQL against the query service and folds the flat result rows
 * into one record per twin relationship.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/wikidata/query-client
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { KnowledgeBaseTwin, ReferenceRecord } from '../../models/comparison.js';
import { compareStrings } from '../comparison/alignment.js';
import type { FetchLike } from '../scraper/page-source.js';
import { KnowledgeBaseError } from './errors.js';
import { ENTITY_BASE, ENTITY_ID_QUERY, TWIN_DATA_QUERY, fillQuery } from './queries.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** One result row: variable name to bound value. Unbound variables are absent. */
export type SparqlRow = Record<string, string>;

export interface KnowledgeBaseQueryClientOptions {
  endpoint: string;
  userAgent: string;
  timeoutMs: number;
  /** Let the query service answer from its cache (default false) */
  cache?: boolean;
  fetchImpl?: FetchLike;
}

const SparqlResponseSchema = z.object({
  results: z.object({
    bindings: z.array(z.record(z.object({ value: z.string() }))),
  }),
});

// ═══════════════════════════════════════════════════════════════════════════════
// ROW GROUPING
// ═══════════════════════════════════════════════════════════════════════════════

function decodeUrl(url: string): string {
  try {
    return decodeURIComponent(url);
  } catch (error) {
    if (error instanceof URIError) return url;
    throw error;
  }
}

/** xsd:dateTime values come back as 2019-09-21T00:00:00Z; keep the date */
function toDate(value: string | undefined): string | null {
  if (value === undefined) return null;
  const match = /^(\d{4}-\d{2}-\d{2})T/.exec(value);
  return match ? match[1] : value;
}

function rowReference(row: SparqlRow): ReferenceRecord | null {
  const url = row.referenceUrl;
  if (url === undefined) return null;
  return {
    url,
    name: row.referenceName ?? null,
    website: null,
    publisher: row.referencePublisher ?? null,
    language: null,
    accessDate: toDate(row.retrieved),
    date: null,
  };
}

function mergeReference(into: ReferenceRecord, from: ReferenceRecord): void {
  into.name ??= from.name;
  into.publisher ??= from.publisher;
  into.accessDate ??= from.accessDate;
}

/**
 * Fold twin-data rows into one record per target entity, sorted by id.
 * Rows without an English article for the target are dropped.
 */
export function groupTwinRows(rows: readonly SparqlRow[], cityUrl: string): KnowledgeBaseTwin[] {
  const byId = new Map<string, KnowledgeBaseTwin>();

  for (const row of rows) {
    const targetUrl = row.targetUrl;
    if (targetUrl === undefined) continue;

    const id = row.targetId ?? '';
    let twin = byId.get(id);
    if (twin === undefined) {
      twin = {
        id,
        url: decodeUrl(targetUrl),
        name: row.targetLabel ?? id,
        sourceUrl: row.sourceUrl ?? cityUrl,
        sourceId: row.sourceId ?? null,
        startTime: toDate(row.starttime),
        endTime: toDate(row.endtime),
        references: [],
      };
      byId.set(id, twin);
    }

    const reference = rowReference(row);
    if (reference === null) continue;
    const existing = twin.references.find((candidate) => candidate.url === reference.url);
    if (existing === undefined) {
      twin.references.push(reference);
    } else {
      mergeReference(existing, reference);
    }
  }

  return [...byId.values()].sort((a, b) => compareStrings(a.id, b.id));
}

/** Last path segment of an entity URL: http://www.wikidata.org/entity/Q42 gives Q42 */
export function entityIdFromUrl(url: string): string {
  const segments = url.split('/');
  return segments[segments.length - 1];
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

export class KnowledgeBaseQueryClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: KnowledgeBaseQueryClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Run a template for one city. Uncached queries get a random leading
   * comment so the service cannot answer from a stale cache entry.
   */
  async runQuery(template: string, cityUrl: string, cache = this.options.cache ?? false): Promise<SparqlRow[]> {
    let query = fillQuery(template, cityUrl);
    const headers: Record<string, string> = {
      Accept: 'application/sparql-results+json',
      'User-Agent': this.options.userAgent,
    };
    if (!cache) {
      query = `#${uuidv4()}\n${query}`;
      headers['Cache-Control'] = 'no-cache';
    }

    const params = new URLSearchParams({ query, format: 'json' });
    const start = Date.now();
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.options.endpoint}?${params.toString()}`, {
        headers,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new KnowledgeBaseError(`SPARQL request failed: ${message}`, 'QUERY_FAILED', { cityUrl });
    }

    if (!response.ok) {
      throw new KnowledgeBaseError(`SPARQL endpoint returned HTTP ${response.status}`, 'QUERY_FAILED', {
        cityUrl,
        status: response.status,
      });
    }

    const parsed = SparqlResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new KnowledgeBaseError('Unexpected SPARQL response shape', 'QUERY_FAILED', {
        cityUrl,
        issues: parsed.error.errors.map((e) => e.message),
      });
    }

    const rows = parsed.data.results.bindings.map((binding) => {
      const row: SparqlRow = {};
      for (const [name, term] of Object.entries(binding)) {
        row[name] = term.value;
      }
      return row;
    });
    console.error(`[KB] ${rows.length} rows for ${cityUrl} in ${Date.now() - start}ms`);
    return rows;
  }

  /** Twin relationships recorded for the city whose article is `cityUrl` */
  async getTwinData(cityUrl: string): Promise<KnowledgeBaseTwin[]> {
    return groupTwinRows(await this.runQuery(TWIN_DATA_QUERY, cityUrl), cityUrl);
  }

  /** Ids (Q-numbers) of the entities whose article is `url` */
  async extractIdsFromUrl(url: string): Promise<string[]> {
    const rows = await this.runQuery(ENTITY_ID_QUERY, url);
    return rows.flatMap((row) => (row.id === undefined ? [] : [entityIdFromUrl(row.id)]));
  }

  /** Entity URL of the last matching entity, or "" when there is none */
  async getIdByUrl(url: string): Promise<string> {
    if (url.length === 0) return '';
    const ids = await this.extractIdsFromUrl(url);
    return ids.length === 0 ? '' : `${ENTITY_BASE}${ids[ids.length - 1]}`;
  }
}

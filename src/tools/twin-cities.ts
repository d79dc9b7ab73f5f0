/**
 * Twin Cities Tools
 *
 * MCP tools over the scraped graph and the knowledge base: browsing cities,
 * twins and references, comparing the two sources and publishing wiki
 * findings back.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module tools/twin-cities
 */

import { existsSync } from 'fs';
import type { KnowledgeBaseTwin, ReferenceRecord } from '../models/comparison.js';
import type { TwinSummary } from '../models/twin-cities.js';
import { pathNotFoundError, writerNotConfiguredError } from '../server/errors.js';
import { successResult, type CityOption, type SessionContext } from '../server/types.js';
import {
  compareReferences,
  compareTwins,
  resolveWikiTwins,
  twinDisplayName,
  type ReferenceComparison,
} from '../services/comparison/index.js';
import {
  ReconciliationService,
  buildReconciliationPayload,
} from '../services/wikidata/reconciliation.js';
import {
  CitySearchInput,
  CityTwinsInput,
  CompareReferencesFields,
  CompareReferencesInput,
  CompareTwinsInput,
  GraphImportInput,
  GraphStatsInput,
  ReconcileInput,
  TwinReferencesInput,
  validateInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function searchCityOptions(session: SessionContext, query: string, limit: number): CityOption[] {
  const needle = query.toLowerCase();
  const options: CityOption[] = [];
  for (const city of session.graph.getCities()) {
    const label = `${city.name}, ${city.country}`;
    if (!label.toLowerCase().includes(needle)) continue;
    options.push({ label, value: city.url });
    if (options.length >= limit) break;
  }
  return options;
}

interface TwinReferenceContext {
  knowledgeBaseTwins: KnowledgeBaseTwin[];
  knowledgeBaseTwin: KnowledgeBaseTwin | undefined;
  wikiTwin: TwinSummary | undefined;
  comparison: ReferenceComparison;
}

/**
 * Both sides of one twin relationship with its references aligned.
 * The knowledge base twin is matched by entity URL, resolved from the wiki
 * URL when not given, so a twin stored under another article URL is still
 * found. Its article URL is only a fallback.
 */
async function loadTwinReferences(
  session: SessionContext,
  cityUrl: string,
  twinUrl: string | undefined,
  twinId: string | undefined
): Promise<TwinReferenceContext> {
  const knowledgeBaseTwins = await session.queryClient.getTwinData(cityUrl);
  const entityId = twinId ?? (twinUrl === undefined ? '' : await session.queryClient.getIdByUrl(twinUrl));
  const knowledgeBaseTwin =
    (entityId === '' ? undefined : knowledgeBaseTwins.find((twin) => twin.id === entityId)) ??
    (twinUrl === undefined ? undefined : knowledgeBaseTwins.find((twin) => twin.url === twinUrl));

  const wikiUrl = twinUrl ?? knowledgeBaseTwin?.url;
  const wikiTwin =
    wikiUrl === undefined ? undefined : session.graph.getTwins(cityUrl).find((twin) => twin.url === wikiUrl);
  const wikiReferences = wikiTwin === undefined ? [] : session.graph.getReferences(cityUrl, wikiTwin.url);
  const knowledgeBaseReferences: ReferenceRecord[] = knowledgeBaseTwin?.references ?? [];

  return {
    knowledgeBaseTwins,
    knowledgeBaseTwin,
    wikiTwin,
    comparison: compareReferences(knowledgeBaseReferences, wikiReferences),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL FACTORY
// ═══════════════════════════════════════════════════════════════════════════════

export function createTwinCitiesTools(session: SessionContext): Record<string, ToolDefinition> {
  async function handleGraphStats(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      validateInput(GraphStatsInput, params);
      const metadata = session.graph.database.getMetadata();
      return formatResponse(
        successResult({
          graph_name: session.graph.database.getName(),
          last_modified_at: metadata?.last_modified_at ?? null,
          ...session.graph.getStats(),
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleGraphImport(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(GraphImportInput, params);
      if (!existsSync(input.path)) {
        throw pathNotFoundError(input.path);
      }
      const added = session.graph.load(input.path);
      return formatResponse(successResult({ path: input.path, triples_added: added, ...session.graph.getStats() }));
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleCitySearch(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(CitySearchInput, params);
      const options = searchCityOptions(session, input.query, input.limit);
      return formatResponse(successResult({ query: input.query, total: options.length, options }));
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleCityTwins(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(CityTwinsInput, params);
      const twins = session.graph.getTwins(input.city_url);
      return formatResponse(successResult({ city_url: input.city_url, total: twins.length, twins }));
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleTwinReferences(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(TwinReferencesInput, params);
      const references = session.graph.getReferences(input.city_url, input.twin_url);
      return formatResponse(
        successResult({ city_url: input.city_url, twin_url: input.twin_url, total: references.length, references })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleCompareTwins(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(CompareTwinsInput, params);
      const knowledgeBase = await session.queryClient.getTwinData(input.city_url);
      const wiki = await resolveWikiTwins(session.graph.getTwins(input.city_url), (url) =>
        session.queryClient.getIdByUrl(url)
      );
      const rows = compareTwins(knowledgeBase, wiki, { hideKnown: input.hide_known });

      return formatResponse(
        successResult({
          city_url: input.city_url,
          total: rows.length,
          rows: rows.map((row) => ({
            name: twinDisplayName(row),
            wiki_name: row.right?.name ?? null,
            knowledge_base_name: row.left?.name ?? null,
            knowledge_base: row.left ?? null,
            wiki: row.right ?? null,
          })),
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleCompareReferences(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(CompareReferencesInput, params);
      const context = await loadTwinReferences(session, input.city_url, input.twin_url, input.twin_id);

      return formatResponse(
        successResult({
          city_url: input.city_url,
          twin_url: context.wikiTwin?.url ?? context.knowledgeBaseTwin?.url ?? null,
          twin_id: context.knowledgeBaseTwin?.id ?? null,
          reference_count: context.comparison.references.length,
          rows: context.comparison.rows,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleReconcile(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(ReconcileInput, params);
      if (session.writer === null) {
        throw writerNotConfiguredError();
      }

      const context = await loadTwinReferences(session, input.city_url, input.twin_url, input.twin_id);
      const payload = buildReconciliationPayload({
        cityUrl: input.city_url,
        knowledgeBaseTwins: context.knowledgeBaseTwins,
        wikiTwin: context.wikiTwin,
        references: context.comparison.references,
        selections: input.selections.map((selection) => ({
          referenceIndex: selection.reference_index,
          property: selection.property,
        })),
      });

      const service = new ReconciliationService(session.queryClient, session.writer);
      const result = await service.reconcile(payload, input.two_sided);
      return formatResponse(successResult({ ...result, payload }));
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    twin_graph_stats: {
      description: 'Counts of triples, cities, twinned cities, references and city pairs in the open graph.',
      inputSchema: GraphStatsInput.shape,
      handler: handleGraphStats,
    },
    twin_graph_import: {
      description: 'Merge an N-Triples file into the open graph. Existing triples are kept; returns the number added.',
      inputSchema: GraphImportInput.shape,
      handler: handleGraphImport,
    },
    twin_cities_search: {
      description:
        'Find cities whose "name, country" label contains the query (at least 3 characters, case-insensitive). Returns label/value options, value being the article URL.',
      inputSchema: CitySearchInput.shape,
      handler: handleCitySearch,
    },
    twin_cities_twins: {
      description: 'Twins of a city as scraped from the wiki, sorted by name.',
      inputSchema: CityTwinsInput.shape,
      handler: handleCityTwins,
    },
    twin_cities_references: {
      description: 'References cited on the wiki for the twinning of two cities.',
      inputSchema: TwinReferencesInput.shape,
      handler: handleTwinReferences,
    },
    twin_cities_compare: {
      description:
        'Align the twins listed on the wiki with those recorded in the knowledge base, ordered by name. Rows carry the knowledge base side, the wiki side, or both.',
      inputSchema: CompareTwinsInput.shape,
      handler: handleCompareTwins,
    },
    twin_cities_compare_references: {
      description:
        'Field-by-field comparison of the references of one twin relationship. Each row has a reference_index and property usable as a selection in twin_cities_reconcile.',
      inputSchema: CompareReferencesFields.shape,
      handler: handleCompareReferences,
    },
    twin_cities_reconcile: {
      description:
        'Write a twin relationship found on the wiki to the knowledge base with the selected reference fields, optionally on both cities. Pass the twin_id returned by twin_cities_compare_references so selections address the same rows.',
      inputSchema: ReconcileInput.shape,
      handler: handleReconcile,
    },
  };
}

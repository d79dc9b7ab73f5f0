/**
 * MCP Server Type Definitions
 *
 * Tool result envelopes and the session context handed to tool handlers.
 *
 * @module server/types
 */

import type { TwinCitiesGraph } from '../services/knowledge-graph/graph-service.js';
import type { KnowledgeBaseQueryClient } from '../services/wikidata/query-client.js';
import type { KnowledgeBaseWriter } from '../services/wikidata/reconciliation.js';
import type { TwinCitiesConfig } from './config.js';
import type { ErrorCategory } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ToolError {
  category: ErrorCategory;
  message: string;
  details?: Record<string, unknown>;
}

export interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

export interface ToolResultFailure {
  success: false;
  error: ToolError;
}

export type ToolResult<T = unknown> = ToolResultSuccess<T> | ToolResultFailure;

export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SESSION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Everything a tool handler works against. The graph is owned by the
 * session and closed with it.
 */
export interface SessionContext {
  config: TwinCitiesConfig;
  graph: TwinCitiesGraph;
  queryClient: KnowledgeBaseQueryClient;
  /** Supplied by the host; null leaves reconciliation unavailable */
  writer: KnowledgeBaseWriter | null;
}

/** Dropdown-style city option */
export interface CityOption {
  label: string;
  value: string;
}

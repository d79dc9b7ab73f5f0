/**
 * SQL Schema Definitions for the Twin Cities graph store
 *
 * The graph is a single triple table. Objects are either IRIs or plain
 * literals; the pair (object, object_kind) keeps the two apart.
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

/**
 * Database configuration pragmas
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
] as const;

/**
 * Schema version table - tracks migration state
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Graph metadata - one row per database
 */
export const CREATE_GRAPH_METADATA_TABLE = `
CREATE TABLE IF NOT EXISTS graph_metadata (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  graph_name TEXT NOT NULL,
  description TEXT,
  created_at TEXT NOT NULL,
  last_modified_at TEXT NOT NULL
)
`;

/**
 * Triples. Insertion order (rowid) decides which value wins when a
 * single-valued property was written more than once.
 */
export const CREATE_TRIPLES_TABLE = `
CREATE TABLE IF NOT EXISTS triples (
  subject TEXT NOT NULL,
  predicate TEXT NOT NULL,
  object TEXT NOT NULL,
  object_kind TEXT NOT NULL CHECK (object_kind IN ('iri', 'literal')),
  PRIMARY KEY (subject, predicate, object, object_kind)
)
`;

/**
 * Table definitions in creation order
 */
export const TABLE_DEFINITIONS = [
  { name: 'graph_metadata', sql: CREATE_GRAPH_METADATA_TABLE },
  { name: 'triples', sql: CREATE_TRIPLES_TABLE },
] as const;

/**
 * Index definitions
 */
export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_triples_predicate_object ON triples(predicate, object)',
  'CREATE INDEX IF NOT EXISTS idx_triples_object ON triples(object)',
] as const;

/**
 * Required tables for schema verification
 */
export const REQUIRED_TABLES = ['schema_version', 'graph_metadata', 'triples'] as const;

/**
 * Required indexes for schema verification
 */
export const REQUIRED_INDEXES = ['idx_triples_predicate_object', 'idx_triples_object'] as const;

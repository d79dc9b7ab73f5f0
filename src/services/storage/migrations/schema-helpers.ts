/**
 * Schema Helper Functions for Database Migrations
 *
 * Contains helper functions for configuring pragmas, creating tables,
 * indexes, and initializing graph metadata.
 *
 * @module migrations/schema-helpers
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import {
  DATABASE_PRAGMAS,
  CREATE_SCHEMA_VERSION_TABLE,
  CREATE_INDEXES,
  TABLE_DEFINITIONS,
  SCHEMA_VERSION,
} from './schema-definitions.js';

/**
 * Configure database pragmas
 * @param db - Database instance
 */
export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    try {
      db.exec(pragma);
    } catch (error) {
      throw new MigrationError(`Failed to set pragma: ${pragma}`, 'pragma', undefined, error);
    }
  }
}

/**
 * Create schema version table and initialize if needed
 * @param db - Database instance
 */
export function initializeSchemaVersion(db: Database.Database): void {
  try {
    db.exec(CREATE_SCHEMA_VERSION_TABLE);

    const now = new Date().toISOString();
    db.prepare(
      `INSERT OR IGNORE INTO schema_version (id, version, created_at, updated_at) VALUES (?, ?, ?, ?)`
    ).run(1, SCHEMA_VERSION, now, now);
  } catch (error) {
    throw new MigrationError(
      'Failed to initialize schema version table',
      'create_table',
      'schema_version',
      error
    );
  }
}

/**
 * Create all tables
 * @param db - Database instance
 */
export function createTables(db: Database.Database): void {
  for (const table of TABLE_DEFINITIONS) {
    try {
      db.exec(table.sql);
    } catch (error) {
      throw new MigrationError(`Failed to create table: ${table.name}`, 'create_table', table.name, error);
    }
  }
}

/**
 * Create all required indexes
 * @param db - Database instance
 */
export function createIndexes(db: Database.Database): void {
  for (const indexSql of CREATE_INDEXES) {
    try {
      db.exec(indexSql);
    } catch (error) {
      const match = /CREATE INDEX IF NOT EXISTS (\w+)/.exec(indexSql);
      const indexName = match ? match[1] : 'unknown';
      throw new MigrationError(`Failed to create index: ${indexName}`, 'create_index', indexName, error);
    }
  }
}

/**
 * Initialize graph metadata with default values
 * @param db - Database instance
 * @param graphName - name recorded for the graph
 */
export function initializeGraphMetadata(db: Database.Database, graphName: string = 'twin_cities'): void {
  try {
    const now = new Date().toISOString();
    db.prepare(
      `INSERT OR IGNORE INTO graph_metadata (id, graph_name, description, created_at, last_modified_at)
       VALUES (?, ?, ?, ?, ?)`
    ).run(1, graphName, null, now, now);
  } catch (error) {
    throw new MigrationError('Failed to initialize graph metadata', 'insert', 'graph_metadata', error);
  }
}

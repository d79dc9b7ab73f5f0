/**
 * Database Migration Operations
 *
 * Contains the main migration functions: initializeDatabase, migrateToLatest,
 * checkSchemaVersion, and getCurrentSchemaVersion.
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import { SCHEMA_VERSION } from './schema-definitions.js';
import {
  configurePragmas,
  initializeSchemaVersion,
  createTables,
  createIndexes,
  initializeGraphMetadata,
} from './schema-helpers.js';

/**
 * Check the current schema version of the database
 * @param db - Database instance
 * @returns Current schema version, or 0 if not initialized
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const tableExists = db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'`)
      .get();

    if (!tableExists) {
      return 0;
    }

    const row = db
      .prepare<[number], { version: number }>('SELECT version FROM schema_version WHERE id = ?')
      .get(1);

    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

/**
 * Get the current schema version constant
 */
export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Initialize the database with all tables, indexes, and configuration.
 * Idempotent: tables are only created when missing.
 *
 * @param db - Database instance from better-sqlite3
 * @param graphName - name recorded in graph_metadata for a fresh database
 * @throws MigrationError if any operation fails
 */
export function initializeDatabase(db: Database.Database, graphName?: string): void {
  // Pragmas cannot run inside a transaction
  configurePragmas(db);

  // Schema version is stamped last so a crash mid-init leaves version 0
  const initTransaction = db.transaction(() => {
    createTables(db);
    createIndexes(db);
    initializeGraphMetadata(db, graphName);
    initializeSchemaVersion(db);
  });

  initTransaction();
}

/**
 * Migrate database to the latest schema version
 *
 * @param db - Database instance from better-sqlite3
 * @throws MigrationError if the database is newer than this build supports
 */
export function migrateToLatest(db: Database.Database): void {
  const currentVersion = checkSchemaVersion(db);

  if (currentVersion === 0) {
    initializeDatabase(db);
    return;
  }

  if (currentVersion > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version (${String(currentVersion)}) is newer than supported version (${String(SCHEMA_VERSION)}). ` +
        'Please update the application.',
      'version_check',
      undefined
    );
  }

  configurePragmas(db);
}

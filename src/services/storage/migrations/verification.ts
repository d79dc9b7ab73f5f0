/**
 * Schema Verification Functions
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_TABLES, REQUIRED_INDEXES } from './schema-definitions.js';

export interface SchemaVerification {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
}

/**
 * Verify all required tables and indexes exist
 * @param db - Database instance
 */
export function verifySchema(db: Database.Database): SchemaVerification {
  const lookup = db.prepare<[string, string], { name: string }>(
    `SELECT name FROM sqlite_master WHERE type = ? AND name = ?`
  );

  const missingTables = REQUIRED_TABLES.filter((name) => lookup.get('table', name) === undefined);
  const missingIndexes = REQUIRED_INDEXES.filter((name) => lookup.get('index', name) === undefined);

  return {
    valid: missingTables.length === 0 && missingIndexes.length === 0,
    missingTables,
    missingIndexes,
  };
}

/**
 * Helper functions for DatabaseService
 *
 * Name validation, path resolution and row conversion.
 */

import { homedir } from 'os';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode, type Triple, type TripleRow } from './types.js';

/**
 * Default storage path for graph databases
 */
export const DEFAULT_STORAGE_PATH = join(homedir(), '.twin-cities');

/**
 * Valid database name pattern: alphanumeric, underscores, hyphens
 */
const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Validate database name format
 */
export function validateName(name: string): void {
  if (!name) {
    throw new DatabaseError('Database name is required', DatabaseErrorCode.INVALID_NAME);
  }
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new DatabaseError(
      `Invalid database name "${name}". Only alphanumeric characters, underscores, and hyphens are allowed.`,
      DatabaseErrorCode.INVALID_NAME
    );
  }
}

/**
 * Get full database path
 */
export function getDatabasePath(name: string, storagePath?: string): string {
  const basePath = storagePath ?? DEFAULT_STORAGE_PATH;
  return join(basePath, `${name}.db`);
}

export function rowToTriple(row: TripleRow): Triple {
  return {
    subject: row.subject,
    predicate: row.predicate,
    object: row.object,
    objectKind: row.object_kind,
  };
}

/**
 * Reject triples with an empty term before they reach SQLite
 */
export function assertValidTriple(triple: Triple): void {
  if (triple.subject.length === 0 || triple.predicate.length === 0) {
    throw new DatabaseError(
      `Invalid triple: subject and predicate are required (${JSON.stringify(triple)})`,
      DatabaseErrorCode.INVALID_TRIPLE
    );
  }
  if (triple.objectKind === 'iri' && triple.object.length === 0) {
    throw new DatabaseError(
      `Invalid triple: IRI object is empty (${triple.subject} ${triple.predicate})`,
      DatabaseErrorCode.INVALID_TRIPLE
    );
  }
}

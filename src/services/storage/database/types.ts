/**
 * Database types and error handling
 *
 * @module storage/database/types
 */

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_ALREADY_EXISTS = 'DATABASE_ALREADY_EXISTS',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INVALID_NAME = 'INVALID_NAME',
  INVALID_TRIPLE = 'INVALID_TRIPLE',
}

/**
 * Custom error class for database operations
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/** Kind of a triple object */
export type ObjectKind = 'iri' | 'literal';

export interface Triple {
  subject: string;
  predicate: string;
  object: string;
  objectKind: ObjectKind;
}

/** Raw triple row as stored */
export interface TripleRow {
  subject: string;
  predicate: string;
  object: string;
  object_kind: ObjectKind;
}

/** Graph metadata row */
export interface MetadataRow {
  graph_name: string;
  description: string | null;
  created_at: string;
  last_modified_at: string;
}

/**
 * Summary of one graph database on disk
 */
export interface DatabaseInfo {
  name: string;
  path: string;
  size_bytes: number;
  graph_name: string;
  description: string | null;
  created_at: string;
  last_modified_at: string;
  total_triples: number;
}

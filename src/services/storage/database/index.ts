/**
 * Database Module - Public API
 *
 * Re-exports all public types, classes, and functions from the database module.
 */

export { MigrationError } from '../migrations.js';

export type { DatabaseInfo, MetadataRow, ObjectKind, Triple, TripleRow } from './types.js';
export { DatabaseErrorCode, DatabaseError } from './types.js';
export { DEFAULT_STORAGE_PATH, getDatabasePath, validateName } from './helpers.js';

export { DatabaseService } from './service.js';

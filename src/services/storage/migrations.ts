/**
 * Database migrations - public API
 *
 * @module migrations
 */

export { MigrationError } from './migrations/types.js';
export {
  checkSchemaVersion,
  getCurrentSchemaVersion,
  initializeDatabase,
  migrateToLatest,
} from './migrations/operations.js';
export { verifySchema, type SchemaVerification } from './migrations/verification.js';
export { SCHEMA_VERSION, REQUIRED_TABLES, REQUIRED_INDEXES } from './migrations/schema-definitions.js';

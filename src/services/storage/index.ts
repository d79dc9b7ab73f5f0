/**
 * Storage Service Module
 *
 * Graph database lifecycle, migrations and triple storage.
 */

export {
  initializeDatabase,
  checkSchemaVersion,
  migrateToLatest,
  getCurrentSchemaVersion,
  verifySchema,
  MigrationError,
} from './migrations.js';
export * from './database/index.js';

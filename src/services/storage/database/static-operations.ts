/**
 * Static operations for DatabaseService - database lifecycle: create, open, list, delete, exists.
 */

import Database from 'better-sqlite3';
import { statSync, existsSync, mkdirSync, readdirSync, unlinkSync, writeFileSync, chmodSync } from 'fs';
import { join } from 'path';
import { initializeDatabase, migrateToLatest, verifySchema } from '../migrations.js';
import { DatabaseError, DatabaseErrorCode, type DatabaseInfo, type MetadataRow } from './types.js';
import { DEFAULT_STORAGE_PATH, validateName, getDatabasePath } from './helpers.js';

export interface OpenedDatabase {
  db: Database.Database;
  name: string;
  path: string;
}

function removeQuietly(path: string): void {
  try {
    unlinkSync(path);
  } catch (error) {
    console.error(`[Storage] Could not remove ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Create a new database
 * @throws DatabaseError if name is invalid or database already exists
 */
export function createDatabase(name: string, description?: string, storagePath?: string): OpenedDatabase {
  validateName(name);
  const basePath = storagePath ?? DEFAULT_STORAGE_PATH;
  const dbPath = getDatabasePath(name, storagePath);

  if (!existsSync(basePath)) {
    mkdirSync(basePath, { recursive: true, mode: 0o700 });
  }

  if (existsSync(dbPath)) {
    throw new DatabaseError(
      `Database "${name}" already exists at ${dbPath}`,
      DatabaseErrorCode.DATABASE_ALREADY_EXISTS
    );
  }

  writeFileSync(dbPath, '', { mode: 0o600 });
  chmodSync(dbPath, 0o600);

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    removeQuietly(dbPath);
    throw new DatabaseError(
      `Failed to create database "${name}": ${String(error)}`,
      DatabaseErrorCode.PERMISSION_DENIED,
      error
    );
  }

  try {
    initializeDatabase(db, name);
    if (description) {
      db.prepare(`UPDATE graph_metadata SET description = ? WHERE id = 1`).run(description);
    }
  } catch (error) {
    db.close();
    removeQuietly(dbPath);
    throw error;
  }

  return { db, name, path: dbPath };
}

/**
 * Open an existing database
 * @throws DatabaseError if database doesn't exist or schema is invalid
 */
export function openDatabase(name: string, storagePath?: string): OpenedDatabase {
  validateName(name);
  const dbPath = getDatabasePath(name, storagePath);

  if (!existsSync(dbPath)) {
    throw new DatabaseError(`Database "${name}" not found at ${dbPath}`, DatabaseErrorCode.DATABASE_NOT_FOUND);
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new DatabaseError(`Failed to open database "${name}": ${String(error)}`, DatabaseErrorCode.DATABASE_LOCKED, error);
  }

  try {
    migrateToLatest(db);
  } catch (error) {
    db.close();
    throw error;
  }

  const verification = verifySchema(db);
  if (!verification.valid) {
    db.close();
    throw new DatabaseError(
      `Database schema verification failed. Missing tables: ${verification.missingTables.join(', ')}. Missing indexes: ${verification.missingIndexes.join(', ')}`,
      DatabaseErrorCode.SCHEMA_MISMATCH
    );
  }

  return { db, name, path: dbPath };
}

/**
 * Open a throwaway in-memory database with the full schema
 */
export function openInMemoryDatabase(name: string = 'memory'): OpenedDatabase {
  const db = new Database(':memory:');
  initializeDatabase(db, name);
  return { db, name, path: ':memory:' };
}

/** List all available databases */
export function listDatabases(storagePath?: string): DatabaseInfo[] {
  const basePath = storagePath ?? DEFAULT_STORAGE_PATH;
  if (!existsSync(basePath)) return [];

  const files = readdirSync(basePath).filter((f) => f.endsWith('.db'));
  const databases: DatabaseInfo[] = [];

  for (const file of files) {
    const name = file.slice(0, -'.db'.length);
    const dbPath = join(basePath, file);
    try {
      const stats = statSync(dbPath);
      const db = new Database(dbPath, { readonly: true });
      try {
        const row = db
          .prepare<[], MetadataRow>(
            `SELECT graph_name, description, created_at, last_modified_at FROM graph_metadata WHERE id = 1`
          )
          .get();
        const count = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM triples`).get();
        if (row) {
          databases.push({
            name,
            path: dbPath,
            size_bytes: stats.size,
            graph_name: row.graph_name,
            description: row.description,
            created_at: row.created_at,
            last_modified_at: row.last_modified_at,
            total_triples: count?.count ?? 0,
          });
        }
      } finally {
        db.close();
      }
    } catch (error) {
      console.error(`[Storage] Skipping unreadable database ${dbPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return databases;
}

/** Delete a database - throws DatabaseError if database doesn't exist */
export function deleteDatabase(name: string, storagePath?: string): void {
  validateName(name);
  const dbPath = getDatabasePath(name, storagePath);

  if (!existsSync(dbPath)) {
    throw new DatabaseError(`Database "${name}" not found at ${dbPath}`, DatabaseErrorCode.DATABASE_NOT_FOUND);
  }

  unlinkSync(dbPath);
  for (const suffix of ['-wal', '-shm']) {
    const path = `${dbPath}${suffix}`;
    if (existsSync(path)) unlinkSync(path);
  }
}

/** Check if a database exists */
export function databaseExists(name: string, storagePath?: string): boolean {
  if (!/^[a-zA-Z0-9_-]+$/.test(name)) return false;
  return existsSync(getDatabasePath(name, storagePath));
}

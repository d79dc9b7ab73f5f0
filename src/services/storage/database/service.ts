/**
 * DatabaseService class for all database operations
 *
 * Owns one better-sqlite3 connection to a graph database and exposes the
 * triple operations over it. Uses prepared statements throughout.
 */

import type Database from 'better-sqlite3';
import type { DatabaseInfo, MetadataRow, ObjectKind, Triple } from './types.js';
import {
  createDatabase,
  openDatabase,
  openInMemoryDatabase,
  listDatabases,
  deleteDatabase,
  databaseExists,
  type OpenedDatabase,
} from './static-operations.js';
import * as tripleOps from './triple-operations.js';

/**
 * DatabaseService class for all database operations
 */
export class DatabaseService {
  private db: Database.Database;
  private readonly name: string;
  private readonly path: string;

  private constructor(opened: OpenedDatabase) {
    this.db = opened.db;
    this.name = opened.name;
    this.path = opened.path;
  }

  static create(name: string, description?: string, storagePath?: string): DatabaseService {
    return new DatabaseService(createDatabase(name, description, storagePath));
  }

  static open(name: string, storagePath?: string): DatabaseService {
    return new DatabaseService(openDatabase(name, storagePath));
  }

  /** Open the named database, creating it first when it does not exist */
  static openOrCreate(name: string, storagePath?: string): DatabaseService {
    return databaseExists(name, storagePath)
      ? DatabaseService.open(name, storagePath)
      : DatabaseService.create(name, undefined, storagePath);
  }

  static inMemory(name?: string): DatabaseService {
    return new DatabaseService(openInMemoryDatabase(name));
  }

  static list(storagePath?: string): DatabaseInfo[] {
    return listDatabases(storagePath);
  }

  static delete(name: string, storagePath?: string): void {
    deleteDatabase(name, storagePath);
  }

  static exists(name: string, storagePath?: string): boolean {
    return databaseExists(name, storagePath);
  }

  close(): void {
    this.db.close();
  }

  getName(): string {
    return this.name;
  }

  getPath(): string {
    return this.path;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getConnection(): Database.Database {
    return this.db;
  }

  getMetadata(): MetadataRow | null {
    const row = this.db
      .prepare<[], MetadataRow>(
        `SELECT graph_name, description, created_at, last_modified_at FROM graph_metadata WHERE id = 1`
      )
      .get();
    return row ?? null;
  }

  // ==================== TRIPLE OPERATIONS ====================

  insertTriple(triple: Triple): boolean {
    return tripleOps.insertTriple(this.db, triple);
  }

  hasTriple(triple: Triple): boolean {
    return tripleOps.hasTriple(this.db, triple);
  }

  hasProperty(subject: string, predicate: string): boolean {
    return tripleOps.hasProperty(this.db, subject, predicate);
  }

  getObjects(subject: string, predicate: string): string[] {
    return tripleOps.getObjects(this.db, subject, predicate);
  }

  getFirstObject(subject: string, predicate: string): string | null {
    return tripleOps.getFirstObject(this.db, subject, predicate);
  }

  getSubjects(predicate: string, object: string, objectKind?: ObjectKind): string[] {
    return tripleOps.getSubjects(this.db, predicate, object, objectKind);
  }

  getSubjectsWithPredicate(predicate: string): string[] {
    return tripleOps.getSubjectsWithPredicate(this.db, predicate);
  }

  listTriples(): Triple[] {
    return tripleOps.listTriples(this.db);
  }

  countTriples(): number {
    return tripleOps.countTriples(this.db);
  }

  countSubjectsOfType(typePredicate: string, typeIri: string): number {
    return tripleOps.countSubjectsOfType(this.db, typePredicate, typeIri);
  }

  countDistinctSubjects(predicate: string): number {
    return tripleOps.countDistinctSubjects(this.db, predicate);
  }

  touch(): void {
    tripleOps.updateMetadataModified(this.db);
  }
}

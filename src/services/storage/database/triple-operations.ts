/**
 * Triple operations for DatabaseService
 *
 * All reads return rows in insertion order.
 */

import type Database from 'better-sqlite3';
import { assertValidTriple, rowToTriple } from './helpers.js';
import type { ObjectKind, Triple, TripleRow } from './types.js';

/**
 * Insert a triple. Returns false when the same triple is already stored.
 */
export function insertTriple(db: Database.Database, triple: Triple): boolean {
  assertValidTriple(triple);
  const result = db
    .prepare(
      `INSERT OR IGNORE INTO triples (subject, predicate, object, object_kind) VALUES (?, ?, ?, ?)`
    )
    .run(triple.subject, triple.predicate, triple.object, triple.objectKind);
  return result.changes > 0;
}

export function hasTriple(db: Database.Database, triple: Triple): boolean {
  const row = db
    .prepare<[string, string, string, ObjectKind], { found: number }>(
      `SELECT 1 AS found FROM triples WHERE subject = ? AND predicate = ? AND object = ? AND object_kind = ?`
    )
    .get(triple.subject, triple.predicate, triple.object, triple.objectKind);
  return row !== undefined;
}

/** True when the subject has any value for the predicate */
export function hasProperty(db: Database.Database, subject: string, predicate: string): boolean {
  const row = db
    .prepare<[string, string], { found: number }>(
      `SELECT 1 AS found FROM triples WHERE subject = ? AND predicate = ? LIMIT 1`
    )
    .get(subject, predicate);
  return row !== undefined;
}

export function getObjects(db: Database.Database, subject: string, predicate: string): string[] {
  return db
    .prepare<[string, string], { object: string }>(
      `SELECT object FROM triples WHERE subject = ? AND predicate = ? ORDER BY rowid`
    )
    .all(subject, predicate)
    .map((row) => row.object);
}

/** First stored value of a property, or null */
export function getFirstObject(db: Database.Database, subject: string, predicate: string): string | null {
  const row = db
    .prepare<[string, string], { object: string }>(
      `SELECT object FROM triples WHERE subject = ? AND predicate = ? ORDER BY rowid LIMIT 1`
    )
    .get(subject, predicate);
  return row?.object ?? null;
}

export function getSubjects(
  db: Database.Database,
  predicate: string,
  object: string,
  objectKind: ObjectKind = 'iri'
): string[] {
  return db
    .prepare<[string, string, ObjectKind], { subject: string }>(
      `SELECT subject FROM triples WHERE predicate = ? AND object = ? AND object_kind = ? ORDER BY rowid`
    )
    .all(predicate, object, objectKind)
    .map((row) => row.subject);
}

/** Subjects that have at least one value for the predicate */
export function getSubjectsWithPredicate(db: Database.Database, predicate: string): string[] {
  return db
    .prepare<[string], { subject: string }>(
      `SELECT DISTINCT subject FROM triples WHERE predicate = ? ORDER BY subject`
    )
    .all(predicate)
    .map((row) => row.subject);
}

export function listTriples(db: Database.Database): Triple[] {
  return db
    .prepare<[], TripleRow>(`SELECT subject, predicate, object, object_kind FROM triples ORDER BY rowid`)
    .all()
    .map(rowToTriple);
}

export function countTriples(db: Database.Database): number {
  const row = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM triples`).get();
  return row?.count ?? 0;
}

/** Number of distinct subjects typed with the given class */
export function countSubjectsOfType(db: Database.Database, typePredicate: string, typeIri: string): number {
  const row = db
    .prepare<[string, string], { count: number }>(
      `SELECT COUNT(DISTINCT subject) AS count FROM triples
       WHERE predicate = ? AND object = ? AND object_kind = 'iri'`
    )
    .get(typePredicate, typeIri);
  return row?.count ?? 0;
}

export function countDistinctSubjects(db: Database.Database, predicate: string): number {
  const row = db
    .prepare<[string], { count: number }>(
      `SELECT COUNT(DISTINCT subject) AS count FROM triples WHERE predicate = ?`
    )
    .get(predicate);
  return row?.count ?? 0;
}

/**
 * Touch the last-modified timestamp in graph_metadata
 */
export function updateMetadataModified(db: Database.Database): void {
  db.prepare(`UPDATE graph_metadata SET last_modified_at = ? WHERE id = 1`).run(new Date().toISOString());
}

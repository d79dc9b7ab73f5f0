/**
 * Comparison Models
 *
 * Shapes shared by the alignment engine, the knowledge base client and
 * reconciliation.
 *
 * @module models/comparison
 */

import type { SourceType } from './twin-cities.js';

/**
 * One output row of a sorted merge. A matched row carries both sides.
 */
export interface AlignedEntry<L, R = L> {
  left?: L;
  right?: R;
}

/** Reference as exchanged with the knowledge base, and as rendered in diff rows */
export interface ReferenceRecord {
  url: string;
  name: string | null;
  website: string | null;
  publisher: string | null;
  language: string | null;
  accessDate: string | null;
  date: string | null;
}

/** Properties rendered per reference, in display order */
export const REFERENCE_PROPERTIES = [
  'url',
  'name',
  'website',
  'publisher',
  'language',
  'accessDate',
  'date',
] as const satisfies ReadonlyArray<keyof ReferenceRecord>;

export type ReferenceProperty = (typeof REFERENCE_PROPERTIES)[number];

/** Twin relationship as stored in the structured knowledge base */
export interface KnowledgeBaseTwin {
  id: string;
  url: string;
  name: string;
  sourceUrl: string;
  sourceId: string | null;
  startTime: string | null;
  endTime: string | null;
  references: ReferenceRecord[];
}

/** Twin relationship as scraped from the wiki, keyed by its knowledge base id */
export interface WikiTwin {
  id: string;
  url: string;
  name: string;
  country: string;
  sourcePage: string | null;
  sourceType: SourceType | null;
  wikiText: string | null;
}

export type TwinAlignment = AlignedEntry<KnowledgeBaseTwin, WikiTwin>;

/** One property of one aligned reference, side by side */
export interface ReferenceFieldRow {
  referenceIndex: number;
  property: ReferenceProperty;
  knowledgeBase: string | null;
  wiki: string | null;
}

/** A selected wiki-side field to publish */
export interface ReferenceFieldSelection {
  referenceIndex: number;
  property: ReferenceProperty;
}

/** Payload handed to the write client */
export interface ReconciliationPayload {
  sourceUrl: string;
  sourceId: string | null;
  twin: {
    url: string;
    name: string;
    references: Array<Partial<ReferenceRecord>>;
  };
}

/** Reference in the form written to the knowledge base */
export interface StatementReference {
  retrieved: string | null;
  url: string | null;
  title: { text: string; language: string } | null;
}

/** A single twin-town statement to add to one knowledge base item */
export interface TwinStatement {
  subjectId: string;
  targetId: string;
  twinName: string;
  references: StatementReference[];
  summary: string;
}

export interface ReconciliationResult {
  sourceId: string;
  targetId: string;
  statementsWritten: number;
}

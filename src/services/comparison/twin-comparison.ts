/**
 * Twin Comparison
 *
 * Lines up the twins and references scraped from the wiki against those
 * recorded in the knowledge base. The knowledge base is always the left side.
 *
 * @module services/comparison/twin-comparison
 */

import type {
  AlignedEntry,
  KnowledgeBaseTwin,
  ReferenceFieldRow,
  ReferenceRecord,
  TwinAlignment,
  WikiTwin,
} from '../../models/comparison.js';
import { REFERENCE_PROPERTIES } from '../../models/comparison.js';
import { referenceIdentity, type Reference, type TwinSummary } from '../../models/twin-cities.js';
import { align, compareStrings, sortByKey } from './alignment.js';

/** Resolves a wiki article URL to its knowledge base entity URL, or "" */
export type EntityIdResolver = (url: string) => Promise<string>;

export interface CompareTwinsOptions {
  /** Leave out rows the knowledge base already holds */
  hideKnown?: boolean;
}

export interface ReferenceComparison {
  references: Array<AlignedEntry<ReferenceRecord>>;
  rows: ReferenceFieldRow[];
}

// ============================================================
// Twins
// ============================================================

/**
 * Attach knowledge base ids to scraped twins and sort them by id.
 * Twins the knowledge base does not know get the id "" and sort first.
 */
export async function resolveWikiTwins(
  twins: readonly TwinSummary[],
  resolveId: EntityIdResolver
): Promise<WikiTwin[]> {
  const resolved: WikiTwin[] = [];
  for (const twin of twins) {
    resolved.push({ id: await resolveId(twin.url), ...twin });
  }
  return sortByKey(resolved, 'id');
}

export function twinDisplayName(entry: TwinAlignment): string {
  return entry.right?.name ?? entry.left?.name ?? '';
}

/**
 * Align twins by entity id and order the rows by display name,
 * preferring the wiki name.
 */
export function compareTwins(
  knowledgeBase: readonly KnowledgeBaseTwin[],
  wiki: readonly WikiTwin[],
  options: CompareTwinsOptions = {}
): TwinAlignment[] {
  const rows = align(sortByKey(knowledgeBase, 'id'), sortByKey(wiki, 'id'), 'id').sort((a, b) =>
    compareStrings(twinDisplayName(a), twinDisplayName(b))
  );
  return options.hideKnown === true ? rows.filter((row) => row.left === undefined) : rows;
}

// ============================================================
// References
// ============================================================

/** Wiki reference in knowledge base shape; a missing URL falls back to the identity */
export function toReferenceRecord(reference: Reference): ReferenceRecord {
  return {
    url: reference.url ?? referenceIdentity(reference),
    name: reference.title,
    website: reference.website,
    publisher: reference.publisher,
    language: reference.language,
    accessDate: reference.accessDate,
    date: reference.date,
  };
}

/**
 * Align the references of one twin by URL and expand every aligned pair
 * into one row per reference property.
 */
export function compareReferences(
  knowledgeBase: readonly ReferenceRecord[],
  wiki: readonly Reference[]
): ReferenceComparison {
  const references = align(sortByKey(knowledgeBase, 'url'), sortByKey(wiki.map(toReferenceRecord), 'url'), 'url');

  const rows: ReferenceFieldRow[] = [];
  references.forEach((entry, referenceIndex) => {
    for (const property of REFERENCE_PROPERTIES) {
      rows.push({
        referenceIndex,
        property,
        knowledgeBase: entry.left?.[property] ?? null,
        wiki: entry.right?.[property] ?? null,
      });
    }
  });
  return { references, rows };
}

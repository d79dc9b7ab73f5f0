/**
 * Alignment of wiki data against the knowledge base
 *
 * @module services/comparison
 */

export { align, compareStrings, sortByKey } from './alignment.js';
export {
  compareReferences,
  compareTwins,
  resolveWikiTwins,
  toReferenceRecord,
  twinDisplayName,
  type CompareTwinsOptions,
  type EntityIdResolver,
  type ReferenceComparison,
} from './twin-comparison.js';

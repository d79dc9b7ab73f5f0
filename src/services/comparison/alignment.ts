/**
 * Alignment Engine
 *
 * Sorted merge of two record lists sharing a string key. Every key yields
 * one entry: matched keys carry both sides, the rest carry one.
 *
 * @module services/comparison/alignment
 */

import type { AlignedEntry } from '../../models/comparison.js';

/** Code-unit string order, the order `align` expects its inputs in */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Copy of `records` sorted ascending by a string property
 */
export function sortByKey<K extends PropertyKey, T extends { [P in K]: string }>(
  records: readonly T[],
  key: K
): T[] {
  return [...records].sort((a, b) => compareStrings(a[key], b[key]));
}

/**
 * Merge two lists sorted ascending by `key` into a three-way diff.
 * Each side must be sorted and hold each key at most once.
 */
export function align<
  K extends PropertyKey,
  L extends { [P in K]: string },
  R extends { [P in K]: string },
>(left: readonly L[], right: readonly R[], key: K): Array<AlignedEntry<L, R>> {
  const entries: Array<AlignedEntry<L, R>> = [];
  let i = 0;
  let j = 0;

  while (i < left.length && j < right.length) {
    const order = compareStrings(left[i][key], right[j][key]);
    if (order === 0) {
      entries.push({ left: left[i], right: right[j] });
      i++;
      j++;
    } else if (order < 0) {
      entries.push({ left: left[i] });
      i++;
    } else {
      entries.push({ right: right[j] });
      j++;
    }
  }
  for (; i < left.length; i++) entries.push({ left: left[i] });
  for (; j < right.length; j++) entries.push({ right: right[j] });

  return entries;
}

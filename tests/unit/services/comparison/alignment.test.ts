/**
 * Unit tests for the sorted-merge alignment engine
 *
 * @module tests/unit/services/comparison/alignment
 */

import { describe, it, expect } from 'vitest';
import { align, compareStrings, sortByKey } from '../../../../src/services/comparison/alignment.js';

interface Row {
  id: string;
  side: string;
}

const a = { id: 'a', side: 'L' };
const b = { id: 'b', side: 'R' };
const cLeft = { id: 'c', side: 'L' };
const cRight = { id: 'c', side: 'R' };

describe('align', () => {
  it('should emit left-only, right-only and matched entries in key order', () => {
    expect(align<'id', Row, Row>([a, cLeft], [b, cRight], 'id')).toEqual([
      { left: a },
      { right: b },
      { left: cLeft, right: cRight },
    ]);
  });

  it('should append the remainder of the longer side', () => {
    const d = { id: 'd', side: 'R' };
    const e = { id: 'e', side: 'R' };
    expect(align<'id', Row, Row>([a], [a, d, e], 'id')).toEqual([{ left: a, right: a }, { right: d }, { right: e }]);
  });

  it('should handle empty sides', () => {
    expect(align<'id', Row, Row>([], [], 'id')).toEqual([]);
    expect(align<'id', Row, Row>([a], [], 'id')).toEqual([{ left: a }]);
    expect(align<'id', Row, Row>([], [b], 'id')).toEqual([{ right: b }]);
  });

  it('should align records of different shapes on a shared key', () => {
    const entries = align([{ url: 'http://x', name: 'X' }], [{ url: 'http://x', count: 2 }], 'url');
    expect(entries).toEqual([{ left: { url: 'http://x', name: 'X' }, right: { url: 'http://x', count: 2 } }]);
  });

  it('should produce one entry per distinct key', () => {
    const left = sortByKey([{ id: 'q3' }, { id: 'q1' }, { id: 'q5' }], 'id');
    const right = sortByKey([{ id: 'q4' }, { id: 'q1' }, { id: 'q3' }], 'id');
    expect(align(left, right, 'id')).toHaveLength(4);
  });
});

describe('sortByKey', () => {
  it('should sort by code units without touching the input', () => {
    const input = [{ id: 'b' }, { id: 'B' }, { id: 'a' }];
    expect(sortByKey(input, 'id').map((row) => row.id)).toEqual(['B', 'a', 'b']);
    expect(input.map((row) => row.id)).toEqual(['b', 'B', 'a']);
  });
});

describe('compareStrings', () => {
  it('should order by code unit', () => {
    expect(compareStrings('Q10', 'Q9')).toBe(-1);
    expect(compareStrings('b', 'a')).toBe(1);
    expect(compareStrings('', '')).toBe(0);
  });
});

/**
 * Unit tests for twin and reference comparison
 *
 * @module tests/unit/services/comparison/twin-comparison
 */

import { describe, it, expect } from 'vitest';
import type { KnowledgeBaseTwin, ReferenceRecord, WikiTwin } from '../../../../src/models/comparison.js';
import { createReference, type TwinSummary } from '../../../../src/models/twin-cities.js';
import {
  compareReferences,
  compareTwins,
  resolveWikiTwins,
  toReferenceRecord,
  twinDisplayName,
} from '../../../../src/services/comparison/twin-comparison.js';

const ENTITY = 'http://www.wikidata.org/entity/';

function kbTwin(id: string, name: string): KnowledgeBaseTwin {
  return {
    id,
    url: `https://en.wikipedia.org/wiki/${name}`,
    name,
    sourceUrl: 'https://en.wikipedia.org/wiki/Radom',
    sourceId: `${ENTITY}Q1`,
    startTime: null,
    endTime: null,
    references: [],
  };
}

function summary(name: string): TwinSummary {
  return {
    url: `https://en.wikipedia.org/wiki/${name}`,
    name,
    country: 'Poland',
    sourcePage: null,
    sourceType: 'country',
    wikiText: name,
  };
}

function wikiTwin(id: string, name: string): WikiTwin {
  return { id, ...summary(name) };
}

function record(url: string, fields: Partial<ReferenceRecord> = {}): ReferenceRecord {
  return {
    url,
    name: null,
    website: null,
    publisher: null,
    language: null,
    accessDate: null,
    date: null,
    ...fields,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TWINS
// ═══════════════════════════════════════════════════════════════════════════════

describe('resolveWikiTwins', () => {
  it('should attach ids and sort by id with unknown twins first', async () => {
    const ids: Record<string, string> = {
      'https://en.wikipedia.org/wiki/Kielce': `${ENTITY}Q9`,
      'https://en.wikipedia.org/wiki/Lublin': `${ENTITY}Q10`,
    };
    const twins = await resolveWikiTwins([summary('Kielce'), summary('Lublin'), summary('Nowhere')], async (url) =>
      ids[url] ?? ''
    );

    expect(twins.map((twin) => [twin.id, twin.name])).toEqual([
      ['', 'Nowhere'],
      [`${ENTITY}Q10`, 'Lublin'],
      [`${ENTITY}Q9`, 'Kielce'],
    ]);
  });
});

describe('compareTwins', () => {
  const knowledgeBase = [kbTwin(`${ENTITY}Q9`, 'Kielce'), kbTwin(`${ENTITY}Q7`, 'Gdansk')];
  const wiki = [wikiTwin(`${ENTITY}Q9`, 'Kielce'), wikiTwin(`${ENTITY}Q8`, 'Lviv'), wikiTwin('', 'Aachen')];

  it('should align by id and order rows by display name', () => {
    const rows = compareTwins(knowledgeBase, wiki);

    expect(rows.map((row) => [twinDisplayName(row), row.left !== undefined, row.right !== undefined])).toEqual([
      ['Aachen', false, true],
      ['Gdansk', true, false],
      ['Kielce', true, true],
      ['Lviv', false, true],
    ]);
  });

  it('should hide rows the knowledge base already holds', () => {
    const rows = compareTwins(knowledgeBase, wiki, { hideKnown: true });
    expect(rows.map(twinDisplayName)).toEqual(['Aachen', 'Lviv']);
  });

  it('should prefer the wiki name for display', () => {
    const rows = compareTwins([kbTwin(`${ENTITY}Q9`, 'Kielce City')], [wikiTwin(`${ENTITY}Q9`, 'Kielce')]);
    expect(twinDisplayName(rows[0])).toBe('Kielce');
    expect(twinDisplayName({})).toBe('');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// REFERENCES
// ═══════════════════════════════════════════════════════════════════════════════

describe('toReferenceRecord', () => {
  it('should map the title to name and fall back to the identity for the URL', () => {
    expect(toReferenceRecord(createReference({ website: 'radom.example', title: 'Partners' }))).toEqual(
      record('radom.example', { website: 'radom.example', name: 'Partners' })
    );
    expect(toReferenceRecord(createReference())).toEqual(record('unknown'));
  });
});

describe('compareReferences', () => {
  it('should align references by URL and expand one row per property', () => {
    const kb = [record('http://a.example/2', { name: 'KB title', accessDate: '2020-05-01' })];
    const wiki = [
      createReference({ url: 'http://a.example/1', title: 'Only on wiki' }),
      createReference({ url: 'http://a.example/2', title: 'Wiki title', language: 'pl' }),
    ];

    const { references, rows } = compareReferences(kb, wiki);

    expect(references.map((entry) => [entry.left?.url ?? null, entry.right?.url ?? null])).toEqual([
      [null, 'http://a.example/1'],
      ['http://a.example/2', 'http://a.example/2'],
    ]);
    expect(rows).toHaveLength(14);
    expect(rows.slice(7)).toEqual([
      { referenceIndex: 1, property: 'url', knowledgeBase: 'http://a.example/2', wiki: 'http://a.example/2' },
      { referenceIndex: 1, property: 'name', knowledgeBase: 'KB title', wiki: 'Wiki title' },
      { referenceIndex: 1, property: 'website', knowledgeBase: null, wiki: null },
      { referenceIndex: 1, property: 'publisher', knowledgeBase: null, wiki: null },
      { referenceIndex: 1, property: 'language', knowledgeBase: null, wiki: 'pl' },
      { referenceIndex: 1, property: 'accessDate', knowledgeBase: '2020-05-01', wiki: null },
      { referenceIndex: 1, property: 'date', knowledgeBase: null, wiki: null },
    ]);
    expect(rows[1]).toEqual({ referenceIndex: 0, property: 'name', knowledgeBase: null, wiki: 'Only on wiki' });
  });

  it('should return nothing when neither side has references', () => {
    expect(compareReferences([], [])).toEqual({ references: [], rows: [] });
  });
});

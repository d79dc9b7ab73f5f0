/**
 * Unit tests for wikitext markup helpers
 *
 * @module tests/unit/services/wikitext/markup
 */

import { describe, it, expect } from 'vitest';
import {
  findClosing,
  parseTagAttributes,
  sanitizeWikitext,
  splitTemplateParams,
  stripMarkup,
  trimListNoise,
} from '../../../../src/services/wikitext/markup.js';

describe('sanitizeWikitext', () => {
  it('should drop comments but keep their newlines', () => {
    expect(sanitizeWikitext('a<!--x\ny-->b')).toBe('a\nb');
  });

  it('should drop nowiki and pre blocks', () => {
    expect(sanitizeWikitext('a<nowiki>[[X]]</nowiki>b<pre>\n[[Y]]</pre>c')).toBe('ab\nc');
  });
});

describe('splitTemplateParams', () => {
  it('should split on top-level pipes only', () => {
    const segments = splitTemplateParams('cite|a=[[x|y]]|{{b|c}}');
    expect(segments).toEqual([
      { text: 'cite', offset: 0 },
      { text: 'a=[[x|y]]', offset: 5 },
      { text: '{{b|c}}', offset: 15 },
    ]);
  });

  it('should return a single segment when there is no pipe', () => {
    expect(splitTemplateParams('reflist')).toEqual([{ text: 'reflist', offset: 0 }]);
  });
});

describe('findClosing', () => {
  it('should skip nested pairs', () => {
    expect(findClosing('[[a[[b]]c]]', 0, '[[', ']]')).toBe(9);
  });

  it('should return -1 for an unclosed construct', () => {
    expect(findClosing('{{a', 0, '{{', '}}')).toBe(-1);
  });
});

describe('parseTagAttributes', () => {
  it('should read quoted and bare values with lowercase keys', () => {
    expect(parseTagAttributes(` Name="A b " group='g' x=y`)).toEqual({ name: 'A b', group: 'g', x: 'y' });
  });

  it('should return an empty record when there are no attributes', () => {
    expect(parseTagAttributes('')).toEqual({});
  });
});

describe('stripMarkup', () => {
  it('should keep link display text and flag countries and drop refs', () => {
    expect(stripMarkup('[[Paris|City of Paris]]<ref>x</ref> {{flag|France}}')).toBe('City of Paris France');
  });

  it('should reduce external links to their label and drop bold quotes', () => {
    expect(stripMarkup(`'''Bold''' [http://a.example Site]`)).toBe('Bold Site');
  });

  it('should remove nested templates', () => {
    expect(stripMarkup('{{a|{{b}}}}text')).toBe('text');
  });

  it('should use the link target when there is no display text', () => {
    expect(stripMarkup('[[Kielce]]')).toBe('Kielce');
  });

  it('should drop html tags and self-closing refs', () => {
    expect(stripMarkup('<small>Poland</small><ref name="a" />')).toBe('Poland');
  });
});

describe('trimListNoise', () => {
  it('should strip commas, quotes and spaces from both ends', () => {
    expect(trimListNoise(`, 'France', `)).toBe('France');
  });

  it('should leave inner punctuation alone', () => {
    expect(trimListNoise(' Saint-Denis, Réunion ')).toBe('Saint-Denis, Réunion');
  });
});

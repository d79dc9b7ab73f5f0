/**
 * Unit tests for the wikitext tokenizer
 *
 * @module tests/unit/services/wikitext/tokenizer
 */

import { describe, it, expect } from 'vitest';
import {
  getTemplateParam,
  isCitationTemplate,
  significantNodes,
  tokenizeWikitext,
  type TemplateNode,
  type WikiNode,
} from '../../../../src/services/wikitext/tokenizer.js';

function kinds(nodes: WikiNode[]): string[] {
  return nodes.map((node) => node.kind);
}

function firstTemplate(nodes: WikiNode[]): TemplateNode {
  const template = nodes.find((node): node is TemplateNode => node.kind === 'template');
  if (template === undefined) throw new Error('no template node');
  return template;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LINES, HEADINGS AND LISTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('tokenizeWikitext - structure', () => {
  it('should emit headings, list items, links and trailing text in order', () => {
    const nodes = tokenizeWikitext('== Europe ==\n*[[Paris]], France');

    expect(nodes).toEqual([
      { kind: 'heading', title: 'Europe', level: 2, line: 0, depth: 0 },
      { kind: 'list-item', marker: '*', line: 1, depth: 0 },
      { kind: 'link', title: 'Paris', text: null, line: 1, depth: 0 },
      { kind: 'text', value: ', France', line: 1, depth: 0 },
    ]);
  });

  it('should emit one list item per marker and skip definition markers', () => {
    const nodes = tokenizeWikitext('**:[[Lyon]]');
    expect(kinds(nodes)).toEqual(['list-item', 'list-item', 'link']);
  });

  it('should strip markup from heading titles', () => {
    const nodes = tokenizeWikitext('=== [[Poland]] ===');
    expect(nodes[0]).toEqual({ kind: 'heading', title: 'Poland', level: 3, line: 0, depth: 0 });
  });

  it('should keep line numbers across removed comments', () => {
    const nodes = tokenizeWikitext('<!-- a\nb -->\n[[X]]');
    const link = nodes.find((node) => node.kind === 'link');
    expect(link?.line).toBe(2);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// LINKS
// ═══════════════════════════════════════════════════════════════════════════════

describe('tokenizeWikitext - links', () => {
  it('should split link target and display text', () => {
    const nodes = tokenizeWikitext('[[Lviv|City of Lviv]]');
    expect(nodes).toEqual([{ kind: 'link', title: 'Lviv', text: 'City of Lviv', line: 0, depth: 0 }]);
  });

  it('should drop file and category links', () => {
    const nodes = tokenizeWikitext('[[File:a.png|thumb]] [[Oslo]][[Category:Lists]]');
    expect(kinds(nodes)).toEqual(['text', 'link']);
  });

  it('should treat a link spanning lines as text', () => {
    const nodes = tokenizeWikitext('[[A\nB]]');
    expect(kinds(nodes)).toEqual(['text', 'text']);
    expect(nodes[0]).toEqual({ kind: 'text', value: '[[A\n', line: 0, depth: 0 });
  });

  it('should read external links with and without labels', () => {
    const nodes = tokenizeWikitext('[http://a.example Label][https://b.example/x]');
    expect(nodes).toEqual([
      { kind: 'external-link', url: 'http://a.example', text: 'Label', line: 0, depth: 0 },
      { kind: 'external-link', url: 'https://b.example/x', text: null, line: 0, depth: 0 },
    ]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// TEMPLATES AND REFS
// ═══════════════════════════════════════════════════════════════════════════════

describe('tokenizeWikitext - templates', () => {
  it('should number positional parameters and tokenize them one level deeper', () => {
    const nodes = tokenizeWikitext('{{main|List of twin towns in France}}');

    expect(nodes).toEqual([
      {
        kind: 'template',
        name: 'main',
        params: [{ name: '1', value: 'List of twin towns in France' }],
        line: 0,
        depth: 0,
      },
      { kind: 'text', value: 'List of twin towns in France', line: 0, depth: 1 },
    ]);
  });

  it('should surface links nested in template parameters', () => {
    const nodes = tokenizeWikitext('{{nowrap|[[Lyon]]}}');
    expect(nodes[1]).toEqual({ kind: 'link', title: 'Lyon', text: null, line: 0, depth: 1 });
  });

  it('should not tokenize citation template parameters', () => {
    const nodes = tokenizeWikitext('{{cite web|url=http://a.example|title=[[X]]}}');

    expect(nodes).toEqual([
      {
        kind: 'template',
        name: 'cite web',
        params: [
          { name: 'url', value: 'http://a.example' },
          { name: 'title', value: '[[X]]' },
        ],
        line: 0,
        depth: 0,
      },
    ]);
  });

  it('should look up parameters case-insensitively', () => {
    const template = firstTemplate(tokenizeWikitext('{{cite news|URL=http://a.example}}'));
    expect(getTemplateParam(template, 'url')).toBe('http://a.example');
    expect(getTemplateParam(template, 'title')).toBeNull();
  });

  it('should recognise citation template names', () => {
    expect(isCitationTemplate(' Cite web')).toBe(true);
    expect(isCitationTemplate('citation')).toBe(true);
    expect(isCitationTemplate('main')).toBe(false);
  });
});

describe('tokenizeWikitext - refs', () => {
  it('should read refs with content and self-closing refs', () => {
    const nodes = tokenizeWikitext('A<ref name="n1">text</ref> B<ref name=n1 />');

    expect(nodes).toEqual([
      { kind: 'text', value: 'A', line: 0, depth: 0 },
      { kind: 'ref', attributes: { name: 'n1' }, content: 'text', line: 0, depth: 0 },
      { kind: 'text', value: ' B', line: 0, depth: 0 },
      { kind: 'ref', attributes: { name: 'n1' }, content: null, line: 0, depth: 0 },
    ]);
  });

  it('should treat an unclosed ref as text', () => {
    const nodes = tokenizeWikitext('<ref>never closed');
    expect(kinds(nodes)).toEqual(['text']);
  });
});

describe('significantNodes', () => {
  it('should drop blank text and nested nodes', () => {
    const nodes = significantNodes(tokenizeWikitext(' {{nowrap|[[Lyon]]}} \n'));
    expect(kinds(nodes)).toEqual(['template']);
  });
});

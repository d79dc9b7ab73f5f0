/**
 * Reference Parser
 *
 * Extracts citation records from <ref> tags. Named refs are shared across a
 * page: the defining tag goes into a table, every use resolves through it.
 *
 * @module services/scraper/reference-parser
 */

import { createReference, type Reference } from '../../models/twin-cities.js';
import { stripMarkup } from '../wikitext/markup.js';
import {
  getTemplateParam,
  significantNodes,
  tokenizeWikitext,
  type RefNode,
  type TemplateNode,
  type WikiNode,
} from '../wikitext/tokenizer.js';

export type NamedReferenceTable = Map<string, Reference>;

export type NamedReferenceLookup = { found: true; reference: Reference } | { found: false };

const BARE_URL = /https?:\/\/[^\s<>[\]{}|"]+/;
const URL_ASSIGNMENT = /^\s*url\s*=\s*(.*)$/is;

function fieldValue(template: TemplateNode, ...names: string[]): string | null {
  for (const name of names) {
    const raw = getTemplateParam(template, name);
    if (raw === null) continue;
    const value = stripMarkup(raw);
    if (value.length > 0) return value;
  }
  return null;
}

function fromTemplate(template: TemplateNode): Reference {
  return createReference({
    url: fieldValue(template, 'url'),
    title: fieldValue(template, 'title'),
    publisher: fieldValue(template, 'publisher'),
    language: fieldValue(template, 'language'),
    accessDate: fieldValue(template, 'access-date', 'accessdate'),
    date: fieldValue(template, 'date'),
    website: fieldValue(template, 'website'),
  });
}

/** The `url=value` form some editors write without a template around it */
function fromUrlAssignment(nodes: WikiNode[]): Reference | null {
  const [first, second] = nodes;
  if (first.kind !== 'text') return null;
  const match = URL_ASSIGNMENT.exec(first.value);
  if (!match) return null;

  const inline = match[1].trim();
  if (inline.length > 0) return createReference({ url: inline });
  if (second === undefined) return null;
  if (second.kind === 'external-link') return createReference({ url: second.url });
  if (second.kind === 'text' && second.value.trim().length > 0) {
    return createReference({ url: second.value.trim() });
  }
  return null;
}

/**
 * Parse the inner wikitext of a citation into a Reference.
 * Returns null when nothing recognisable is found.
 */
export function parseCitation(content: string): Reference | null {
  const nodes = significantNodes(tokenizeWikitext(content));
  if (nodes.length === 0) return null;

  const assigned = fromUrlAssignment(nodes);
  if (assigned) return assigned;

  for (const node of nodes) {
    if (node.kind === 'template') return fromTemplate(node);
    if (node.kind === 'external-link') return createReference({ url: node.url });
  }

  for (const node of nodes) {
    if (node.kind !== 'text') continue;
    const bare = BARE_URL.exec(node.value);
    if (bare) return createReference({ url: bare[0] });
  }
  return null;
}

/**
 * Collect every named ref definition on the page.
 * Tags without a name, grouped tags, and definitions whose content holds more
 * than one top-level node are left out.
 */
export function buildNamedReferenceTable(nodes: readonly WikiNode[]): NamedReferenceTable {
  const table: NamedReferenceTable = new Map();

  for (const node of nodes) {
    if (node.kind !== 'ref' || node.content === null) continue;
    if (Object.keys(node.attributes).length === 0) continue;
    if ('group' in node.attributes) continue;

    const name = node.attributes['name'];
    if (name === undefined || name.length === 0 || table.has(name)) continue;

    if (significantNodes(tokenizeWikitext(node.content)).length !== 1) continue;

    const reference = parseCitation(node.content);
    if (reference) table.set(name, reference);
  }
  return table;
}

export function lookupNamedReference(table: NamedReferenceTable, name: string): NamedReferenceLookup {
  const reference = table.get(name);
  return reference === undefined ? { found: false } : { found: true, reference };
}

/**
 * Resolve one ref tag to a Reference. Named tags go through the table only,
 * so a definition and its reuses resolve to the same record.
 */
export function parseReference(node: RefNode, table: NamedReferenceTable): Reference | null {
  const name = node.attributes['name'];
  if (name !== undefined) {
    const lookup = lookupNamedReference(table, name);
    return lookup.found ? lookup.reference : null;
  }
  if ('group' in node.attributes) return null;
  if (node.content === null) return null;
  return parseCitation(node.content);
}

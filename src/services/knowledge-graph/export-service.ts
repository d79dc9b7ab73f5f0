/**
 * Knowledge Graph Export Service
 *
 * Writes and reads the triple graph as N-Triples. Literals are written as
 * plain strings; language tags and datatypes are dropped on import.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module services/knowledge-graph/export-service
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { Triple } from '../storage/database/index.js';

// ============================================================
// Types
// ============================================================

export type GraphFileErrorCode = 'PATH_NOT_FOUND' | 'PARSE_ERROR';

export class GraphFileError extends Error {
  constructor(
    message: string,
    public readonly code: GraphFileErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GraphFileError';
  }
}

// ============================================================
// Escaping
// ============================================================

const LITERAL_ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

const ECHAR_VALUES: Record<string, string> = {
  t: '\t',
  b: '\b',
  n: '\n',
  r: '\r',
  f: '\f',
  '"': '"',
  "'": "'",
  '\\': '\\',
};

function escapeLiteral(value: string): string {
  return value.replace(/[\\"\n\r\t]/g, (ch) => LITERAL_ESCAPES[ch] ?? ch);
}

function escapeIri(iri: string): string {
  return iri.replace(/[\u0000- <>"{}|^`\\]/g, (ch) => {
    return `\\u${ch.charCodeAt(0).toString(16).toUpperCase().padStart(4, '0')}`;
  });
}

function unescape(text: string, line: number): string {
  return text.replace(/\\(?:u([0-9A-Fa-f]{4})|U([0-9A-Fa-f]{8})|(.))/g, (_match, u4?: string, u8?: string, ch?: string) => {
    const hex = u4 ?? u8;
    if (hex !== undefined) return String.fromCodePoint(parseInt(hex, 16));
    const value = ch === undefined ? undefined : ECHAR_VALUES[ch];
    if (value === undefined) {
      throw new GraphFileError(`Invalid escape "\\${ch ?? ''}" on line ${line}`, 'PARSE_ERROR', { line });
    }
    return value;
  });
}

// ============================================================
// Serialization
// ============================================================

function formatTerm(value: string): string {
  return value.startsWith('_:') ? value : `<${escapeIri(value)}>`;
}

export function formatTriple(triple: Triple): string {
  const object =
    triple.objectKind === 'literal' ? `"${escapeLiteral(triple.object)}"` : formatTerm(triple.object);
  return `${formatTerm(triple.subject)} ${formatTerm(triple.predicate)} ${object} .`;
}

/**
 * Serialize triples as N-Triples, one statement per line
 */
export function serializeNTriples(triples: readonly Triple[]): string {
  return triples.map((triple) => `${formatTriple(triple)}\n`).join('');
}

// ============================================================
// Parsing
// ============================================================

const IRI_TERM = /^<([^>]*)>\s*/;
const BLANK_TERM = /^(_:[A-Za-z0-9_.-]+)\s*/;
const LITERAL_TERM = /^"((?:[^"\\]|\\.)*)"(?:@[A-Za-z]+(?:-[A-Za-z0-9]+)*|\^\^<[^>]*>)?\s*/;

interface ParsedTerm {
  value: string;
  kind: 'iri' | 'literal';
  rest: string;
}

function readTerm(input: string, line: number, allowLiteral: boolean): ParsedTerm {
  const iri = IRI_TERM.exec(input);
  if (iri) return { value: unescape(iri[1], line), kind: 'iri', rest: input.slice(iri[0].length) };

  const blank = BLANK_TERM.exec(input);
  if (blank) return { value: blank[1], kind: 'iri', rest: input.slice(blank[0].length) };

  if (allowLiteral) {
    const literal = LITERAL_TERM.exec(input);
    if (literal) return { value: unescape(literal[1], line), kind: 'literal', rest: input.slice(literal[0].length) };
  }
  throw new GraphFileError(`Malformed term on line ${line}: ${input.slice(0, 40)}`, 'PARSE_ERROR', { line });
}

/**
 * Parse an N-Triples document. Blank lines and comments are skipped.
 * @throws GraphFileError on the first malformed line
 */
export function parseNTriples(text: string): Triple[] {
  const triples: Triple[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const line = index + 1;
    const content = raw.trim();
    if (content.length === 0 || content.startsWith('#')) return;

    const subject = readTerm(content, line, false);
    const predicate = readTerm(subject.rest, line, false);
    const object = readTerm(predicate.rest, line, true);
    if (!/^\.\s*(#.*)?$/.test(object.rest)) {
      throw new GraphFileError(`Expected "." at end of line ${line}`, 'PARSE_ERROR', { line });
    }

    triples.push({
      subject: subject.value,
      predicate: predicate.value,
      object: object.value,
      objectKind: object.kind,
    });
  });
  return triples;
}

// ============================================================
// Files
// ============================================================

export function writeNTriplesFile(path: string, triples: readonly Triple[]): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, serializeNTriples(triples), 'utf-8');
}

export function readNTriplesFile(path: string): Triple[] {
  if (!existsSync(path)) {
    throw new GraphFileError(`Path does not exist: ${path}`, 'PATH_NOT_FOUND', { path });
  }
  return parseNTriples(readFileSync(path, 'utf-8'));
}

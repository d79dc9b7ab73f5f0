/**
 * Unit tests for N-Triples serialization and parsing
 *
 * @module tests/unit/services/knowledge-graph/export-service
 */

import { describe, it, expect } from 'vitest';
import {
  GraphFileError,
  formatTriple,
  parseNTriples,
  readNTriplesFile,
  serializeNTriples,
} from '../../../../src/services/knowledge-graph/export-service.js';

const LABEL = 'http://www.w3.org/2000/01/rdf-schema#label';

function captureGraphFileError(fn: () => unknown): GraphFileError {
  try {
    fn();
  } catch (error) {
    if (error instanceof GraphFileError) return error;
    throw error;
  }
  throw new Error('expected a GraphFileError');
}

describe('formatTriple', () => {
  it('should write IRIs in angle brackets and escape literals', () => {
    expect(
      formatTriple({ subject: 'http://w.example/wiki/Radom', predicate: LABEL, object: 'Say "hi"\n', objectKind: 'literal' })
    ).toBe(`<http://w.example/wiki/Radom> <${LABEL}> "Say \\"hi\\"\\n" .`);
  });

  it('should escape characters not allowed in IRIs', () => {
    expect(
      formatTriple({ subject: 'http://w.example/a b', predicate: 'urn:p', object: 'urn:o', objectKind: 'iri' })
    ).toBe('<http://w.example/a\\u0020b> <urn:p> <urn:o> .');
  });
});

describe('parseNTriples', () => {
  it('should read IRIs, literals and blank nodes and skip comments', () => {
    const text = [
      '# header',
      '',
      `<http://w.example/wiki/Radom> <${LABEL}> "Radom"@pl .`,
      '_:b1 <urn:p> "2020-05-01"^^<http://www.w3.org/2001/XMLSchema#date> .',
      '<urn:s> <urn:p> <urn:o> . # trailing',
    ].join('\n');

    expect(parseNTriples(text)).toEqual([
      { subject: 'http://w.example/wiki/Radom', predicate: LABEL, object: 'Radom', objectKind: 'literal' },
      { subject: '_:b1', predicate: 'urn:p', object: '2020-05-01', objectKind: 'literal' },
      { subject: 'urn:s', predicate: 'urn:p', object: 'urn:o', objectKind: 'iri' },
    ]);
  });

  it('should undo the escapes written by serialization', () => {
    const triples = [
      { subject: 'http://w.example/a b', predicate: LABEL, object: 'Tab\there "q" \\ Łódź', objectKind: 'literal' as const },
    ];
    expect(parseNTriples(serializeNTriples(triples))).toEqual(triples);
  });

  it('should report the line of a malformed statement', () => {
    const error = captureGraphFileError(() => parseNTriples('<urn:s> <urn:p> <urn:o> .\n<urn:s> "x" <urn:o> .'));
    expect(error.code).toBe('PARSE_ERROR');
    expect(error.details).toEqual({ line: 2 });
  });

  it('should require the closing dot', () => {
    const error = captureGraphFileError(() => parseNTriples('<urn:s> <urn:p> <urn:o>'));
    expect(error.message).toBe('Expected "." at end of line 1');
  });
});

describe('readNTriplesFile', () => {
  it('should fail for a missing file', () => {
    const error = captureGraphFileError(() => readNTriplesFile('/nonexistent/twin-cities/graph.nt'));
    expect(error.code).toBe('PATH_NOT_FOUND');
  });
});

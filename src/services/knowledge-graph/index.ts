/**
 * Knowledge Graph Services
 *
 * Twin cities graph store, its vocabulary and N-Triples persistence.
 */

export { TwinCitiesGraph, type GraphStats, type IngestResult } from './graph-service.js';
export {
  GraphFileError,
  formatTriple,
  parseNTriples,
  readNTriplesFile,
  serializeNTriples,
  writeNTriplesFile,
  type GraphFileErrorCode,
} from './export-service.js';
export { RDF_TYPE, RDFS_LABEL, TC, TWIN_CITIES_NS, cityPairIri, referenceIri } from './vocabulary.js';

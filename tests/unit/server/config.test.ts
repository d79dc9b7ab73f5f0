/**
 * Unit tests for configuration loading
 *
 * @module tests/unit/server/config
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { loadConfig } from '../../../src/server/config.js';

const ENV_KEYS = [
  'TWIN_CITIES_STORAGE_PATH',
  'TWIN_CITIES_GRAPH_NAME',
  'TWIN_CITIES_WIKI_API',
  'TWIN_CITIES_WIKI_BASE',
  'TWIN_CITIES_ROOT_PAGE',
  'TWIN_CITIES_SKIP_COUNTRIES',
  'TWIN_CITIES_SPARQL_ENDPOINT',
  'TWIN_CITIES_USER_AGENT',
  'TWIN_CITIES_FETCH_TIMEOUT_MS',
  'TWIN_CITIES_FETCH_RETRIES',
];

describe('loadConfig', () => {
  beforeEach(() => {
    for (const key of ENV_KEYS) vi.stubEnv(key, '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should fall back to defaults when nothing is set', () => {
    const config = loadConfig();

    expect(config.graphName).toBe('twin_cities');
    expect(config.wikiApiUrl).toBe('https://en.wikipedia.org/w/api.php');
    expect(config.wikiBase).toBe('https://en.wikipedia.org/');
    expect(config.rootPage).toBe('Lists of twin towns and sister cities');
    expect(config.skipCountries).toEqual(['Metro Manila']);
    expect(config.sparqlEndpoint).toBe('https://query.wikidata.org/sparql');
    expect(config.fetchTimeoutMs).toBe(30_000);
    expect(config.fetchRetries).toBe(3);
  });

  it('should read values from the environment', () => {
    vi.stubEnv('TWIN_CITIES_GRAPH_NAME', 'europe');
    vi.stubEnv('TWIN_CITIES_SKIP_COUNTRIES', ' Metro Manila , Vatican City,, ');
    vi.stubEnv('TWIN_CITIES_FETCH_TIMEOUT_MS', '5000');
    vi.stubEnv('TWIN_CITIES_STORAGE_PATH', '/var/lib/twin-cities');

    const config = loadConfig();

    expect(config.graphName).toBe('europe');
    expect(config.skipCountries).toEqual(['Metro Manila', 'Vatican City']);
    expect(config.fetchTimeoutMs).toBe(5000);
    expect(config.storagePath).toBe('/var/lib/twin-cities');
  });

  it('should let overrides win over the environment', () => {
    vi.stubEnv('TWIN_CITIES_GRAPH_NAME', 'europe');
    expect(loadConfig({ graphName: 'asia' }).graphName).toBe('asia');
  });

  it('should reject malformed values', () => {
    vi.stubEnv('TWIN_CITIES_GRAPH_NAME', 'not a name');
    expect(() => loadConfig()).toThrow(z.ZodError);

    vi.stubEnv('TWIN_CITIES_GRAPH_NAME', '');
    vi.stubEnv('TWIN_CITIES_FETCH_RETRIES', '11');
    expect(() => loadConfig()).toThrow(z.ZodError);
  });
});

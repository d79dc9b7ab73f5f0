/**
 * Twin Cities configuration
 *
 * Read from TWIN_CITIES_* environment variables; entry points load .env
 * first. Overrides win over the environment.
 *
 * @module server/config
 */

import { z } from 'zod';
import { DEFAULT_ROOT_PAGE, DEFAULT_SKIP_COUNTRIES } from '../services/scraper/crawl-frontier.js';
import { DEFAULT_WIKI_BASE } from '../services/scraper/wiki-url.js';
import { DEFAULT_STORAGE_PATH } from '../services/storage/database/helpers.js';

export const TwinCitiesConfigSchema = z.object({
  storagePath: z.string().min(1).default(DEFAULT_STORAGE_PATH),
  graphName: z
    .string()
    .regex(/^[a-zA-Z0-9_-]+$/, 'Graph name may only contain letters, digits, "_" and "-"')
    .default('twin_cities'),

  // Wiki
  wikiApiUrl: z.string().url().default('https://en.wikipedia.org/w/api.php'),
  wikiBase: z.string().url().default(DEFAULT_WIKI_BASE),
  rootPage: z.string().min(1).default(DEFAULT_ROOT_PAGE),
  skipCountries: z.array(z.string()).default([...DEFAULT_SKIP_COUNTRIES]),

  // Knowledge base
  sparqlEndpoint: z.string().url().default('https://query.wikidata.org/sparql'),

  // HTTP
  userAgent: z.string().min(1).default('twin-cities-graph/1.0'),
  fetchTimeoutMs: z.coerce.number().int().positive().default(30_000),
  fetchRetries: z.coerce.number().int().min(0).max(10).default(3),
});

export type TwinCitiesConfig = z.infer<typeof TwinCitiesConfigSchema>;

function envValue(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function envList(name: string): string[] | undefined {
  return envValue(name)
    ?.split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Load configuration from environment variables
 * @throws ZodError when a value is malformed
 */
export function loadConfig(overrides?: Partial<TwinCitiesConfig>): TwinCitiesConfig {
  const envConfig = {
    storagePath: envValue('TWIN_CITIES_STORAGE_PATH'),
    graphName: envValue('TWIN_CITIES_GRAPH_NAME'),
    wikiApiUrl: envValue('TWIN_CITIES_WIKI_API'),
    wikiBase: envValue('TWIN_CITIES_WIKI_BASE'),
    rootPage: envValue('TWIN_CITIES_ROOT_PAGE'),
    skipCountries: envList('TWIN_CITIES_SKIP_COUNTRIES'),
    sparqlEndpoint: envValue('TWIN_CITIES_SPARQL_ENDPOINT'),
    userAgent: envValue('TWIN_CITIES_USER_AGENT'),
    fetchTimeoutMs: envValue('TWIN_CITIES_FETCH_TIMEOUT_MS'),
    fetchRetries: envValue('TWIN_CITIES_FETCH_RETRIES'),
  };

  return TwinCitiesConfigSchema.parse({ ...envConfig, ...overrides });
}

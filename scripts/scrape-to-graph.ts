/**
 * Scrape to Graph Script
 *
 * Crawls every twin-town listing page, writes the scraped cities as JSON
 * lines, ingests them into the configured graph database and writes an
 * N-Triples snapshot next to the JSON lines.
 *
 * Usage: npx tsx scripts/scrape-to-graph.ts [output-dir]
 */

import dotenv from 'dotenv';
dotenv.config();

import { mkdirSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { TwinCitiesGraph } from '../src/services/knowledge-graph/graph-service.js';
import { CrawlFrontier } from '../src/services/scraper/crawl-frontier.js';
import { MediaWikiPageSource } from '../src/services/scraper/page-source.js';
import { DatabaseService } from '../src/services/storage/database/index.js';
import { loadConfig } from '../src/server/config.js';

const OUTPUT_DIR = resolve(process.argv[2] ?? './data');

async function main(): Promise<void> {
  const config = loadConfig();
  const source = new MediaWikiPageSource({
    apiUrl: config.wikiApiUrl,
    userAgent: config.userAgent,
    timeoutMs: config.fetchTimeoutMs,
    retries: config.fetchRetries,
  });
  const frontier = new CrawlFrontier(source, {
    rootPage: config.rootPage,
    skipCountries: config.skipCountries,
    wikiBase: config.wikiBase,
  });

  const { cities, report } = await frontier.run();

  mkdirSync(OUTPUT_DIR, { recursive: true });
  const citiesPath = join(OUTPUT_DIR, 'cities.jsonl');
  writeFileSync(citiesPath, cities.map((city) => JSON.stringify(city)).join('\n') + '\n', 'utf-8');
  console.log(`Wrote ${cities.length} cities to ${citiesPath}`);

  const graph = new TwinCitiesGraph(DatabaseService.openOrCreate(config.graphName, config.storagePath));
  try {
    const ingest = graph.addCities(cities);
    console.log(
      `Ingested ${ingest.cities} cities, ${ingest.twinLinks} twin links, ${ingest.triplesAdded} new triples into "${config.graphName}"`
    );
    graph.save(join(OUTPUT_DIR, 'twin_cities.nt'));
    console.log('Graph stats:', graph.getStats());
  } finally {
    graph.close();
  }

  if (report.failures.length > 0) {
    console.error(`${report.failures.length} pages failed:`);
    for (const failure of report.failures) {
      console.error(`  ${failure.title} (${failure.sourceType}): ${failure.message}`);
    }
  }
}

main().catch((error) => {
  console.error('Scrape failed:', error);
  process.exit(1);
});

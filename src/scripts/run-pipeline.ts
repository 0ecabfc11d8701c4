/**
 * Run one ingestion pass over the configured news sources
 *
 * Usage: npm run pipeline
 */

import '../instrumentation';
import { loadConfig } from '../config';
import { createIndex } from '../app';
import { runPipeline } from '../ingestion/pipeline';
import { createScraper } from '../ingestion/scraper';
import { closePool } from '../db/pg-client';

async function main() {
  console.log('🚀 Starting ingestion pipeline...\n');
  const startTime = Date.now();

  const config = loadConfig();
  const { index } = createIndex(config);

  try {
    const report = await runPipeline(
      config.newsSources,
      config.chunking,
      index,
      createScraper(config.scraping)
    );

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log('\n--- Pipeline complete ---');
    console.log(`Articles scraped: ${report.articlesScraped}`);
    console.log(`Chunks created:   ${report.chunksCreated}`);
    console.log(`Time:             ${elapsed}s`);

    const stats = await index.stats();
    console.log(`Collection now holds ${stats.totalDocuments} documents from ${stats.sources.length} sources`);
  } finally {
    await closePool();
  }
}

main().catch((error) => {
  console.error('❌ Pipeline failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});

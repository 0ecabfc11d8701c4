import type { ChunkingConfig, DocumentChunk, IngestionReport, RawArticle, SourceConfig } from '../types';
import { ConfigSchema } from '../config';
import { createScraper } from './scraper';
import { processArticles } from './chunker';
import { debugLogger } from '../utils/debug-logger';

export interface ArticleSource {
  scrapeAll(sources: SourceConfig[]): Promise<RawArticle[]>;
}

export interface ChunkSink {
  ingest(chunks: DocumentChunk[]): Promise<number>;
}

/**
 * One ingestion run: scrape, validate, chunk, embed and upsert.
 * Per-article failures are skipped inside the scraper; an index failure
 * aborts the run.
 */
export async function runPipeline(
  sources: SourceConfig[],
  chunking: ChunkingConfig,
  index: ChunkSink,
  scraper: ArticleSource = createScraper(ConfigSchema.shape.scraping.parse(undefined))
): Promise<IngestionReport> {
  const stepId = debugLogger.stepStart('PIPELINE', 'Running ingestion pipeline', {
    sources: sources.filter(s => s.enabled).map(s => s.name),
  });

  try {
    console.log('📥 Scraping news sources...');
    const articles = await scraper.scrapeAll(sources);
    console.log(`📄 ${articles.length} articles passed validation`);

    if (articles.length === 0) {
      debugLogger.stepFinish(stepId, { articlesScraped: 0, chunksCreated: 0 });
      return { articlesScraped: 0, chunksCreated: 0 };
    }

    const chunks = processArticles(articles, chunking);
    console.log(`✂️  Split into ${chunks.length} chunks`);

    if (chunks.length > 0) {
      const written = await index.ingest(chunks);
      console.log(`💾 Upserted ${written} vectors`);
    }

    const report: IngestionReport = { articlesScraped: articles.length, chunksCreated: chunks.length };
    debugLogger.stepFinish(stepId, { ...report });
    return report;
  } catch (error) {
    debugLogger.stepError(stepId, 'PIPELINE', 'Ingestion pipeline failed', error);
    throw error;
  }
}

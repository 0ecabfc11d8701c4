import { describe, it, expect, vi } from 'vitest';
import { runPipeline, type ArticleSource } from '../src/ingestion/pipeline';
import { IngestionQueue } from '../src/ingestion/queue';
import { VectorIndexManager } from '../src/search/vector-index';
import { DEFAULT_CHUNKING } from '../src/ingestion/chunker';
import { IndexUnavailableError } from '../src/utils/errors';
import type { IngestionReport, RawArticle, SourceConfig } from '../src/types';
import { InMemoryVectorStore } from './helpers/in-memory-store';
import { FakeEmbeddings } from './helpers/fake-embeddings';
import { makeArticle } from './helpers/fixtures';

const SOURCES: SourceConfig[] = [
  {
    name: 'Example Times',
    baseUrl: 'https://news.example.com',
    sections: ['/markets'],
    requiresRendering: false,
    enabled: true,
  },
];

function staticSource(articles: RawArticle[]): ArticleSource {
  return { scrapeAll: async () => articles };
}

function setup() {
  const store = new InMemoryVectorStore();
  const index = new VectorIndexManager(store, new FakeEmbeddings(), 'test_news');
  return { store, index };
}

describe('runPipeline', () => {
  it('scrapes, chunks and indexes articles', async () => {
    const { index } = setup();

    const report = await runPipeline(SOURCES, DEFAULT_CHUNKING, index, staticSource([makeArticle()]));

    expect(report).toEqual({ articlesScraped: 1, chunksCreated: 1 });
    expect(await index.stats()).toEqual({ totalDocuments: 1, sources: ['Example Times'] });
  });

  it('does not duplicate vectors when the same articles are ingested again', async () => {
    const { index } = setup();
    const source = staticSource([
      makeArticle(),
      makeArticle({ url: 'https://other.example.com/news/banks-654321', sourceName: 'Other Daily' }),
    ]);

    await runPipeline(SOURCES, DEFAULT_CHUNKING, index, source);
    const second = await runPipeline(SOURCES, DEFAULT_CHUNKING, index, source);

    expect(second).toEqual({ articlesScraped: 2, chunksCreated: 2 });
    expect(await index.stats()).toEqual({ totalDocuments: 2, sources: ['Example Times', 'Other Daily'] });
  });

  it('reports zeros and leaves the index alone when nothing passes validation', async () => {
    const { index, store } = setup();

    const report = await runPipeline(SOURCES, DEFAULT_CHUNKING, index, staticSource([]));

    expect(report).toEqual({ articlesScraped: 0, chunksCreated: 0 });
    expect(store.upsertCalls).toBe(0);
  });

  it('fails the run when the index rejects the write', async () => {
    const { index, store } = setup();
    store.failWith = new Error('disk full');

    await expect(runPipeline(SOURCES, DEFAULT_CHUNKING, index, staticSource([makeArticle()]))).rejects.toBeInstanceOf(
      IndexUnavailableError
    );
  });
});

describe('IngestionQueue', () => {
  it('shares the in-flight run with concurrent callers', async () => {
    let finish: (report: IngestionReport) => void = () => undefined;
    const task = vi.fn(
      () =>
        new Promise<IngestionReport>(resolve => {
          finish = resolve;
        })
    );
    const queue = new IngestionQueue(task);

    const first = queue.run();
    const second = queue.run();
    expect(queue.isIngesting).toBe(true);

    finish({ articlesScraped: 3, chunksCreated: 9 });

    expect(await first).toEqual({ articlesScraped: 3, chunksCreated: 9 });
    expect(await second).toEqual({ articlesScraped: 3, chunksCreated: 9 });
    expect(task).toHaveBeenCalledTimes(1);
    expect(queue.isIngesting).toBe(false);
  });

  it('starts a new run once the previous one settled', async () => {
    const task = vi.fn(async () => ({ articlesScraped: 0, chunksCreated: 0 }));
    const queue = new IngestionQueue(task);

    await queue.run();
    await queue.run();

    expect(task).toHaveBeenCalledTimes(2);
  });

  it('clears the in-flight run after a failure', async () => {
    const task = vi
      .fn<() => Promise<IngestionReport>>()
      .mockRejectedValueOnce(new Error('scrape failed'))
      .mockResolvedValueOnce({ articlesScraped: 1, chunksCreated: 1 });
    const queue = new IngestionQueue(task);

    await expect(queue.run()).rejects.toThrow('scrape failed');
    expect(queue.isIngesting).toBe(false);
    expect(await queue.run()).toEqual({ articlesScraped: 1, chunksCreated: 1 });
  });
});

import { createHash } from 'crypto';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import type { CollectionState, DocumentChunk, IndexStats, QueryFilter, RetrievalStrategy, RetrievedChunk } from '../types';
import type { StoredVector, VectorStore } from '../db/vector-store';
import { MMR_FETCH_MULTIPLIER, distanceToSimilarity, selectByMmr } from './mmr';
import { KeyedMutex, chunkArray } from '../utils/concurrency';
import { IndexUnavailableError, errorMessage } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';

export const INGEST_BATCH_SIZE = 100;

export interface SearchOptions {
  k?: number;
  filter?: QueryFilter;
  strategy?: RetrievalStrategy;
}

/**
 * Content hash of a chunk. Re-ingesting the same chunk maps to the same row.
 */
export function chunkId(chunk: DocumentChunk): string {
  return createHash('sha256')
    .update(chunk.articleUrl)
    .update('\u0000')
    .update(chunk.metadata.chunkIndex)
    .update('\u0000')
    .update(chunk.content)
    .digest('hex');
}

/**
 * Owns one persistent collection: embeds and upserts chunks, answers
 * filtered similarity / MMR searches and reports collection stats.
 */
export class VectorIndexManager {
  constructor(
    private readonly store: VectorStore,
    private readonly embeddings: EmbeddingsInterface,
    readonly collection: string,
    private readonly locks: KeyedMutex = new KeyedMutex()
  ) {}

  /**
   * Embed and upsert chunks. Calls for the same collection run one at a time.
   * @returns number of distinct vectors written
   */
  async ingest(chunks: DocumentChunk[]): Promise<number> {
    if (chunks.length === 0) return 0;

    return this.locks.runExclusive(this.collection, async () => {
      const stepId = debugLogger.stepStart('INDEX', `Ingesting ${chunks.length} chunks`, {
        collection: this.collection,
      });

      const byId = new Map<string, DocumentChunk>();
      for (const chunk of chunks) {
        byId.set(chunkId(chunk), chunk);
      }
      const entries = Array.from(byId.entries());

      const vectors: StoredVector[] = [];
      for (const batch of chunkArray(entries, INGEST_BATCH_SIZE)) {
        const embedded = await this.embeddings.embedDocuments(batch.map(([, chunk]) => chunk.content));
        batch.forEach(([id, chunk], i) => {
          vectors.push({ id, content: chunk.content, metadata: chunk.metadata, embedding: embedded[i] });
        });
      }

      try {
        await this.store.upsert(this.collection, vectors);
      } catch (error) {
        debugLogger.stepError(stepId, 'INDEX', 'Upsert failed', error);
        throw new IndexUnavailableError(`Failed to write to collection ${this.collection}: ${errorMessage(error)}`, {
          cause: error,
        });
      }

      debugLogger.stepFinish(stepId, { written: vectors.length });
      return vectors.length;
    });
  }

  async similaritySearch(query: string, options: SearchOptions = {}): Promise<RetrievedChunk[]> {
    const k = options.k ?? 5;
    const strategy = options.strategy ?? 'similarity';
    const sourceNames = options.filter?.sourceNames;

    const stepId = debugLogger.stepStart('RETRIEVAL', `${strategy} search (k=${k})`, {
      collection: this.collection,
      sources: sourceNames,
    });

    try {
      const queryEmbedding = await this.embeddings.embedQuery(query);
      const fetchK = strategy === 'mmr' ? k * MMR_FETCH_MULTIPLIER : k;
      const candidates = await this.store.search(this.collection, queryEmbedding, { k: fetchK, sourceNames });
      const hits = strategy === 'mmr' ? selectByMmr(queryEmbedding, candidates, k) : candidates.slice(0, k);

      debugLogger.stepFinish(stepId, { candidates: candidates.length, returned: hits.length });

      return hits.map(hit => ({
        id: hit.id,
        content: hit.content,
        metadata: hit.metadata,
        similarity: distanceToSimilarity(hit.distance),
      }));
    } catch (error) {
      debugLogger.stepError(stepId, 'RETRIEVAL', 'Search failed', error);
      throw new IndexUnavailableError(`Vector index unavailable: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Document count and sorted distinct source names. Never throws.
   */
  async stats(): Promise<IndexStats> {
    try {
      const [totalDocuments, sources] = await Promise.all([
        this.store.count(this.collection),
        this.store.distinctSources(this.collection),
      ]);
      return { totalDocuments, sources: [...sources].sort() };
    } catch (error) {
      console.error('Error getting database stats:', errorMessage(error));
      return { totalDocuments: 0, sources: [] };
    }
  }

  /**
   * Existence, count and sources of the collection. Unlike stats(), a store
   * failure is raised as IndexUnavailableError.
   */
  async inspect(): Promise<CollectionState> {
    try {
      if (!(await this.store.exists(this.collection))) {
        return { exists: false, totalDocuments: 0, sources: [] };
      }
      const [totalDocuments, sources] = await Promise.all([
        this.store.count(this.collection),
        this.store.distinctSources(this.collection),
      ]);
      return { exists: true, totalDocuments, sources: [...sources].sort() };
    } catch (error) {
      throw new IndexUnavailableError(`Vector index unavailable: ${errorMessage(error)}`, { cause: error });
    }
  }

  async drop(): Promise<void> {
    await this.locks.runExclusive(this.collection, () => this.store.drop(this.collection));
    console.log(`🗑️  Dropped collection ${this.collection}`);
  }
}

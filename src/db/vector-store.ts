import type { ChunkMetadata } from '../types';

export interface StoredVector {
  id: string;
  content: string;
  metadata: ChunkMetadata;
  embedding: number[];
}

export interface VectorSearchHit {
  id: string;
  content: string;
  metadata: ChunkMetadata;
  embedding: number[];
  /** Cosine distance, 0 = identical */
  distance: number;
}

export interface VectorSearchOptions {
  k: number;
  sourceNames?: string[];
}

/**
 * Persistence seam of the vector index. Implementations must apply an
 * upsert batch atomically. Only `upsert` may create a collection; reads of a
 * missing collection are empty.
 */
export interface VectorStore {
  exists(collection: string): Promise<boolean>;
  upsert(collection: string, vectors: StoredVector[]): Promise<void>;
  search(collection: string, embedding: number[], options: VectorSearchOptions): Promise<VectorSearchHit[]>;
  count(collection: string): Promise<number>;
  distinctSources(collection: string): Promise<string[]>;
  drop(collection: string): Promise<void>;
}

export interface SourceConfig {
  name: string;
  baseUrl: string;
  sections: string[];
  requiresRendering: boolean;
  enabled: boolean;
}

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
}

export interface RawArticle {
  url: string;
  title: string;
  fullText: string;
  sourceName: string;
  section: string;
  publishedAt: Date;
  scrapedAt: Date;
}

/**
 * Metadata attached to every chunk. The index only accepts scalar values,
 * so every field is a string and absent values are stored as "N/A".
 */
export interface ChunkMetadata {
  title: string;
  sourceName: string;
  url: string;
  publishDate: string;
  section: string;
  chunkIndex: string;
}

export interface DocumentChunk {
  content: string;
  metadata: ChunkMetadata;
  articleUrl: string;
}

export interface RetrievedChunk {
  id: string;
  content: string;
  metadata: ChunkMetadata;
  similarity: number;
}

export interface QueryFilter {
  sourceNames?: string[];
}

export type RetrievalStrategy = 'similarity' | 'mmr';

export interface IngestionReport {
  articlesScraped: number;
  chunksCreated: number;
}

export interface IndexStats {
  totalDocuments: number;
  sources: string[];
}

export interface CollectionState extends IndexStats {
  exists: boolean;
}

export interface QueryRequest {
  query: string;
  sessionId: string;
  sources?: string[];
}

export interface Citation {
  number: number;
  title: string;
  url: string;
}

export interface ConversationTurn {
  question: string;
  answer: string;
  createdAt: Date;
}

export type StreamEvent =
  | { type: 'answer'; text: string }
  | { type: 'citations'; citations: Citation[]; text: string }
  | { type: 'error'; message: string; partialAnswer: string };

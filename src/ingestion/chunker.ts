import type { ChunkingConfig, ChunkMetadata, DocumentChunk, RawArticle } from '../types';
import { ConfigurationError } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';

export const DEFAULT_CHUNKING: ChunkingConfig = {
  chunkSize: 800,
  chunkOverlap: 100,
};

const NOT_AVAILABLE = 'N/A';

export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function assertChunking({ chunkSize, chunkOverlap }: ChunkingConfig): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError('Invalid chunking settings', [`chunkSize must be a positive integer, got ${chunkSize}`]);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ConfigurationError('Invalid chunking settings', [
      `chunkOverlap must be between 0 and chunkSize - 1, got ${chunkOverlap}`,
    ]);
  }
}

function isWordStart(text: string, index: number): boolean {
  return text[index] !== ' ' && (index === 0 || text[index - 1] === ' ');
}

/**
 * End (exclusive) of the chunk starting at `start`
 */
function findBreak(text: string, start: number, chunkSize: number, chunkOverlap: number): number {
  const limit = start + chunkSize;

  // Sentence end within the last `chunkOverlap` characters of the window
  for (let i = limit - 1; i >= Math.max(start + 1, limit - chunkOverlap); i--) {
    const ch = text[i];
    if ((ch === '.' || ch === '!' || ch === '?') && text[i + 1] === ' ') {
      return i + 1;
    }
  }

  const lastSpace = text.lastIndexOf(' ', limit);
  if (lastSpace > start) {
    return lastSpace;
  }

  // One token longer than the window: keep it whole
  const nextSpace = text.indexOf(' ', start);
  return nextSpace === -1 ? text.length : nextSpace;
}

function nextStart(text: string, start: number, end: number, chunkOverlap: number): number {
  for (let i = Math.max(start + 1, end - chunkOverlap); i < end; i++) {
    if (isWordStart(text, i)) return i;
  }
  let i = end;
  while (i < text.length && text[i] === ' ') i++;
  return i;
}

/**
 * Split cleaned text into overlapping windows. Every chunk is an exact slice
 * of the cleaned text beginning on a word; consecutive chunks share at most
 * `chunkOverlap` characters.
 */
export function splitText(text: string, config: ChunkingConfig = DEFAULT_CHUNKING): string[] {
  assertChunking(config);
  const { chunkSize, chunkOverlap } = config;

  const cleaned = cleanText(text);
  if (!cleaned) return [];

  const chunks: string[] = [];
  let start = 0;

  while (start < cleaned.length) {
    if (start + chunkSize >= cleaned.length) {
      chunks.push(cleaned.slice(start));
      break;
    }

    const end = findBreak(cleaned, start, chunkSize, chunkOverlap);
    chunks.push(cleaned.slice(start, end));
    if (end >= cleaned.length) break;

    start = nextStart(cleaned, start, end, chunkOverlap);
  }

  return chunks;
}

function orNotAvailable(value: string | undefined): string {
  return value && value.trim() ? value : NOT_AVAILABLE;
}

function formatDate(date: Date | undefined): string {
  return date && !Number.isNaN(date.getTime()) ? date.toISOString() : NOT_AVAILABLE;
}

export function chunkArticle(article: RawArticle, config: ChunkingConfig = DEFAULT_CHUNKING): DocumentChunk[] {
  return splitText(article.fullText, config).map((content, index) => {
    const metadata: ChunkMetadata = {
      title: orNotAvailable(article.title),
      sourceName: orNotAvailable(article.sourceName),
      url: orNotAvailable(article.url),
      publishDate: formatDate(article.publishedAt),
      section: orNotAvailable(article.section),
      chunkIndex: String(index),
    };
    return { content, metadata, articleUrl: article.url };
  });
}

/**
 * Chunk a batch of articles, in input order. Articles with no body are skipped.
 */
export function processArticles(articles: RawArticle[], config: ChunkingConfig = DEFAULT_CHUNKING): DocumentChunk[] {
  assertChunking(config);
  const stepId = debugLogger.stepStart('CHUNKER', `Chunking ${articles.length} articles`, { ...config });

  const chunks: DocumentChunk[] = [];
  let skipped = 0;

  for (const article of articles) {
    if (!cleanText(article.fullText)) {
      skipped++;
      debugLogger.warn('CHUNKER', 'Skipping article with empty body', { url: article.url });
      continue;
    }
    chunks.push(...chunkArticle(article, config));
  }

  debugLogger.stepFinish(stepId, { chunks: chunks.length, skipped });
  return chunks;
}

import type { Citation, RetrievedChunk } from '../types';

export const SOURCES_HEADER = '\n\n---\n**Sources:**\n';

/**
 * One citation per distinct article URL, numbered in retrieval order.
 * The first title seen for a URL wins.
 */
export function buildCitations(chunks: RetrievedChunk[]): Citation[] {
  const byUrl = new Map<string, string>();
  for (const chunk of chunks) {
    const { url, title } = chunk.metadata;
    if (!byUrl.has(url)) {
      byUrl.set(url, title);
    }
  }

  return Array.from(byUrl.entries()).map(([url, title], i) => ({ number: i + 1, title, url }));
}

export function formatCitations(citations: Citation[]): string {
  if (citations.length === 0) return '';
  return SOURCES_HEADER + citations.map(c => `${c.number}. [${c.title}](${c.url})\n`).join('');
}

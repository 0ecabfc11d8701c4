import type { DocumentChunk, RawArticle } from '../../src/types';

export const FINANCE_PARAGRAPH =
  'The Sensex and Nifty closed higher on Tuesday as banking shares rallied after the RBI kept rates unchanged. ' +
  'Analysts said quarterly earnings from large lenders beat estimates, lifting investor sentiment across the market. ' +
  'Foreign portfolio investors were net buyers of equity worth several hundred crore during the session.';

export function makeArticle(overrides: Partial<RawArticle> = {}): RawArticle {
  return {
    url: 'https://news.example.com/markets/news/sensex-rallies-123456',
    title: 'Sensex rallies as banks gain',
    fullText: FINANCE_PARAGRAPH,
    sourceName: 'Example Times',
    section: '/markets',
    publishedAt: new Date('2024-05-14T10:00:00.000Z'),
    scrapedAt: new Date('2024-05-14T12:00:00.000Z'),
    ...overrides,
  };
}

export function articlePage(options: { title?: string; body?: string[]; date?: string; wrapInArticle?: boolean }): string {
  const paragraphs = (options.body ?? [FINANCE_PARAGRAPH]).map(p => `<p>${p}</p>`).join('\n');
  const date = options.date ? `<meta property="article:published_time" content="${options.date}">` : '';
  const title = options.title ? `<meta property="og:title" content="${options.title}">` : '';
  const body = options.wrapInArticle === false ? paragraphs : `<article>${paragraphs}</article>`;
  return `<!doctype html><html><head>${title}${date}<title>Example</title></head><body>${body}</body></html>`;
}

export function makeChunk(
  content: string,
  overrides: { sourceName?: string; url?: string; title?: string; chunkIndex?: number } = {}
): DocumentChunk {
  const url = overrides.url ?? 'https://news.example.com/news/story-123456';
  return {
    content,
    articleUrl: url,
    metadata: {
      title: overrides.title ?? 'Story',
      sourceName: overrides.sourceName ?? 'Example Times',
      url,
      publishDate: '2024-05-14T10:00:00.000Z',
      section: '/markets',
      chunkIndex: String(overrides.chunkIndex ?? 0),
    },
  };
}

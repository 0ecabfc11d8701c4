import { JSDOM } from 'jsdom';
import { ExtractionError } from '../utils/errors';

// Matched against the path only, so query-string digits do not count
const ARTICLE_LINK_PATTERN = /\/\d{6,}|\/news\/|\/article\/|\/opinion\/|\/story\//;
const EXCLUDED_LINK_PATTERN = /\/category\/|\/author\/|\/topic\//;

const DATE_SELECTORS = [
  'meta[property="article:published_time"]',
  'meta[property="og:published_time"]',
  'meta[itemprop="datePublished"]',
  '[itemprop="datePublished"][datetime]',
  'time[datetime]',
];

export interface ExtractedArticle {
  title: string;
  fullText: string;
  publishedAt: Date | null;
}

function parseDocument(html: string): Document {
  return new JSDOM(html).window.document;
}

function collapse(value: string | null | undefined): string {
  return value ? value.replace(/\s+/g, ' ').trim() : '';
}

/**
 * Candidate article URLs on a section page, resolved against `baseUrl`,
 * fragment-free, deduplicated in first-seen order and capped at `limit`.
 */
export function extractArticleLinks(html: string, baseUrl: string, limit: number): string[] {
  const document = parseDocument(html);
  const seen = new Set<string>();

  for (const anchor of Array.from(document.querySelectorAll('a[href]'))) {
    if (seen.size >= limit) break;

    const href = anchor.getAttribute('href');
    if (!href) continue;

    let resolved: URL;
    try {
      resolved = new URL(href, baseUrl);
    } catch {
      continue;
    }

    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') continue;
    if (!ARTICLE_LINK_PATTERN.test(resolved.pathname)) continue;

    resolved.hash = '';
    const absolute = resolved.toString();
    if (EXCLUDED_LINK_PATTERN.test(absolute)) continue;

    seen.add(absolute);
  }

  return Array.from(seen);
}

function extractTitle(document: Document): string {
  const ogTitle = collapse(document.querySelector('meta[property="og:title"]')?.getAttribute('content'));
  if (ogTitle) return ogTitle;

  const h1 = collapse(document.querySelector('h1')?.textContent);
  if (h1) return h1;

  return collapse(document.querySelector('title')?.textContent);
}

function extractPublishDate(document: Document): Date | null {
  for (const selector of DATE_SELECTORS) {
    const element = document.querySelector(selector);
    const value = element?.getAttribute('content') ?? element?.getAttribute('datetime');
    if (!value) continue;

    const date = new Date(value.trim());
    if (!Number.isNaN(date.getTime())) {
      return date;
    }
  }
  return null;
}

function extractBody(document: Document): string {
  const container = document.querySelector('article') ?? document;
  return Array.from(container.querySelectorAll('p'))
    .map(p => collapse(p.textContent))
    .filter(text => text.length > 0)
    .join('\n\n');
}

/**
 * Pull title, body text and publish date out of an article page
 */
export function extractArticle(html: string, url: string): ExtractedArticle {
  const document = parseDocument(html);

  const title = extractTitle(document);
  if (!title) {
    throw new ExtractionError(url, 'No title found');
  }

  const fullText = extractBody(document);
  if (!fullText) {
    throw new ExtractionError(url, 'No article body found');
  }

  return { title, fullText, publishedAt: extractPublishDate(document) };
}

import vocabulary from './financial-keywords.json';

export const MIN_ARTICLE_LENGTH = 300;
export const MIN_DISTINCT_KEYWORDS = 2;

export const FINANCIAL_KEYWORDS: readonly string[] = vocabulary.keywords;
export const PAYWALL_PHRASES: readonly string[] = vocabulary.paywallPhrases;

export function isPaywalled(text: string): boolean {
  const lower = text.toLowerCase();
  return PAYWALL_PHRASES.some(phrase => lower.includes(phrase));
}

/**
 * Distinct vocabulary terms found (as substrings) in the lower-cased input
 */
export function findFinancialKeywords(text: string): string[] {
  const lower = text.toLowerCase();
  return FINANCIAL_KEYWORDS.filter(keyword => lower.includes(keyword));
}

/**
 * Decide whether scraped text is worth indexing: long enough, not behind a
 * paywall, and mentioning at least two distinct financial terms.
 */
export function isRelevant(text: string, title: string): boolean {
  if (!text || text.length < MIN_ARTICLE_LENGTH) {
    return false;
  }

  if (isPaywalled(text)) {
    return false;
  }

  return findFinancialKeywords(`${title} ${text}`).length >= MIN_DISTINCT_KEYWORDS;
}

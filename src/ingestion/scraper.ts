import type { RawArticle, SourceConfig } from '../types';
import type { ScrapingConfig } from '../config';
import { HttpPageFetcher, PageFetcher } from './fetcher';
import { JsdomRenderer, PageRenderer, RendererFactory } from './renderer';
import { extractArticle, extractArticleLinks } from './extractor';
import { isRelevant } from './validator';
import { processConcurrently } from '../utils/concurrency';
import { sleep } from '../utils/html';
import { errorMessage } from '../utils/errors';
import { debugLogger } from '../utils/debug-logger';

type ScraperSettings = Pick<
  ScrapingConfig,
  'sectionTimeoutMs' | 'articleDelayMs' | 'maxArticlesPerSection' | 'sourceConcurrency'
>;

const DEFAULT_SETTINGS: ScraperSettings = {
  sectionTimeoutMs: 120_000,
  articleDelayMs: 1_000,
  maxArticlesPerSection: 7,
  sourceConcurrency: 1,
};

export interface NewsScraperOptions {
  fetcher: PageFetcher;
  rendererFactory?: RendererFactory;
  settings?: Partial<ScraperSettings>;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
}

interface SourceState {
  articles: RawArticle[];
  seen: Set<string>;
  fetchedArticles: number;
}

export class NewsScraper {
  private readonly fetcher: PageFetcher;
  private readonly rendererFactory: RendererFactory | null;
  private readonly settings: ScraperSettings;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => number;

  constructor(options: NewsScraperOptions) {
    this.fetcher = options.fetcher;
    this.rendererFactory = options.rendererFactory ?? null;
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    this.sleep = options.sleep ?? sleep;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Scrape every enabled source. Results keep the configured source order,
   * then discovery order within a source.
   */
  async scrapeAll(sources: SourceConfig[]): Promise<RawArticle[]> {
    const enabled = sources.filter(source => source.enabled);
    const stepId = debugLogger.stepStart('SCRAPER', `Scraping ${enabled.length} sources`, {
      sources: enabled.map(s => s.name),
      concurrency: this.settings.sourceConcurrency,
    });

    const { successful, failed } = await processConcurrently(
      enabled,
      source => this.scrapeSource(source),
      { concurrency: this.settings.sourceConcurrency, label: 'Source Scraping' }
    );

    for (const { error, index } of failed) {
      console.error(`❌ Source ${enabled[index].name} failed:`, error.message);
    }

    const articles = successful.flatMap(result => result.value);
    debugLogger.stepFinish(stepId, { articles: articles.length, failedSources: failed.length });
    return articles;
  }

  async scrapeSource(source: SourceConfig): Promise<RawArticle[]> {
    const state: SourceState = { articles: [], seen: new Set(), fetchedArticles: 0 };

    let renderer: PageRenderer | null = null;
    if (source.requiresRendering) {
      if (!this.rendererFactory) {
        debugLogger.warn('SCRAPER', `No renderer available, fetching ${source.name} over plain HTTP`);
      } else {
        renderer = this.rendererFactory();
      }
    }

    try {
      for (const section of source.sections) {
        await this.scrapeSection(source, section, renderer, state);
      }
    } finally {
      if (renderer) {
        await renderer.close();
      }
    }

    console.log(`📰 ${source.name}: ${state.articles.length} articles`);
    return state.articles;
  }

  private async scrapeSection(
    source: SourceConfig,
    section: string,
    renderer: PageRenderer | null,
    state: SourceState
  ): Promise<void> {
    const deadline = this.clock() + this.settings.sectionTimeoutMs;
    const sectionUrl = new URL(section, source.baseUrl).toString();
    const stepId = debugLogger.stepStart('SECTION', `${source.name} ${section}`, { url: sectionUrl });

    let links: string[];
    try {
      const html = renderer ? await renderer.render(sectionUrl) : await this.fetcher.fetch(sectionUrl);
      links = extractArticleLinks(html, source.baseUrl, this.settings.maxArticlesPerSection);
    } catch (error) {
      debugLogger.stepError(stepId, 'SECTION', `${source.name} ${section}`, error);
      console.error(`⚠️  Skipping section ${sectionUrl}:`, errorMessage(error));
      return;
    }

    let added = 0;
    for (const url of links) {
      if (this.clock() >= deadline) {
        debugLogger.warn('SECTION', `Time budget spent for ${sectionUrl}, skipping remaining links`, {
          remaining: links.length - links.indexOf(url),
        });
        break;
      }

      if (state.seen.has(url)) continue;
      state.seen.add(url);

      if (state.fetchedArticles > 0 && this.settings.articleDelayMs > 0) {
        await this.sleep(this.settings.articleDelayMs);
      }
      state.fetchedArticles++;

      const article = await this.scrapeArticle(source, section, url);
      if (article) {
        state.articles.push(article);
        added++;
      }
    }

    debugLogger.stepFinish(stepId, { links: links.length, articles: added });
  }

  private async scrapeArticle(source: SourceConfig, section: string, url: string): Promise<RawArticle | null> {
    try {
      const html = await this.fetcher.fetch(url);
      const extracted = extractArticle(html, url);

      if (!isRelevant(extracted.fullText, extracted.title)) {
        debugLogger.warn('ARTICLE', 'Rejected by content validator', { url, title: extracted.title });
        return null;
      }

      const scrapedAt = new Date(this.clock());
      return {
        url,
        title: extracted.title,
        fullText: extracted.fullText,
        sourceName: source.name,
        section,
        publishedAt: extracted.publishedAt ?? scrapedAt,
        scrapedAt,
      };
    } catch (error) {
      debugLogger.warn('ARTICLE', 'Skipping article', { url, error: errorMessage(error) });
      return null;
    }
  }
}

/**
 * Scraper wired to the real HTTP fetcher and the jsdom renderer
 */
export function createScraper(scraping: ScrapingConfig): NewsScraper {
  return new NewsScraper({
    fetcher: new HttpPageFetcher({
      timeoutMs: scraping.requestTimeoutMs,
      maxRetries: scraping.maxRetries,
      userAgent: scraping.userAgent,
    }),
    rendererFactory: () =>
      new JsdomRenderer({
        timeoutMs: scraping.requestTimeoutMs,
        settleMs: scraping.renderSettleMs,
        userAgent: scraping.userAgent,
      }),
    settings: scraping,
  });
}

import { FetchError } from '../utils/errors';
import { sleep } from '../utils/html';
import { debugLogger } from '../utils/debug-logger';

/**
 * Capability: fetch(url) -> raw HTML
 */
export interface PageFetcher {
  fetch(url: string): Promise<string>;
}

export interface HttpPageFetcherOptions {
  timeoutMs?: number;
  maxRetries?: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
  /** Backoff hook, replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Plain HTTP GET with a per-attempt timeout and exponential backoff.
 * 4xx responses are not retried.
 */
export class HttpPageFetcher implements PageFetcher {
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: HttpPageFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 2;
    this.userAgent = options.userAgent ?? 'Mozilla/5.0';
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? sleep;
  }

  async fetch(url: string): Promise<string> {
    let lastError: FetchError | null = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await this.fetchOnce(url);
      } catch (error) {
        lastError = error instanceof FetchError
          ? error
          : new FetchError(url, error instanceof Error ? error.message : String(error), { cause: error });

        if (lastError.status !== null && lastError.status >= 400 && lastError.status < 500) {
          break;
        }

        if (attempt < this.maxRetries) {
          const delay = Math.pow(2, attempt - 1) * 1000;
          debugLogger.warn('SCRAPER', `Fetch attempt ${attempt}/${this.maxRetries} failed, retrying in ${delay}ms`, {
            url,
            error: lastError.message,
          });
          await this.sleep(delay);
        }
      }
    }

    throw lastError ?? new FetchError(url, 'Fetch failed');
  }

  private async fetchOnce(url: string): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        headers: { 'User-Agent': this.userAgent, Accept: 'text/html,application/xhtml+xml' },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new FetchError(url, `HTTP ${response.status} ${response.statusText}`, { status: response.status });
      }

      return await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new FetchError(url, `Request timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}

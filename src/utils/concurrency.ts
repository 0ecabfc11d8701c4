import { debugLogger } from './debug-logger';

export interface ConcurrencyOptions {
  /** Maximum number of concurrent operations. Default: 4 */
  concurrency?: number;
  /** Label for logging purposes */
  label?: string;
}

export interface ConcurrencyResult<R> {
  /** Successful results, in input order */
  successful: Array<{ value: R; index: number }>;
  failed: Array<{ error: Error; index: number }>;
}

/**
 * Process items with a bounded number of in-flight operations.
 * A failing item never aborts the others; it is reported in `failed`.
 *
 * @example
 * const { successful } = await processConcurrently(
 *   sources,
 *   (source) => scraper.scrapeSource(source),
 *   { concurrency: 2, label: 'Source Scraping' }
 * );
 */
export async function processConcurrently<T, R>(
  items: T[],
  fn: (item: T, index: number) => Promise<R>,
  options: ConcurrencyOptions = {}
): Promise<ConcurrencyResult<R>> {
  const { concurrency = 4, label = 'Operation' } = options;

  if (items.length === 0) {
    return { successful: [], failed: [] };
  }

  const stepId = debugLogger.stepStart('CONCURRENCY', `${label} (${items.length} items, concurrency: ${concurrency})`, {
    itemCount: items.length,
    concurrency
  });

  const successful: Array<{ value: R; index: number }> = [];
  const failed: Array<{ error: Error; index: number }> = [];
  const executing = new Set<Promise<void>>();

  for (let i = 0; i < items.length; i++) {
    const promise: Promise<void> = fn(items[i], i)
      .then((value) => {
        successful.push({ value, index: i });
      })
      .catch((error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        debugLogger.warn('CONCURRENCY', `${label}: Item ${i + 1}/${items.length} failed`, {
          error: err.message
        });
        failed.push({ error: err, index: i });
      })
      .finally(() => {
        executing.delete(promise);
      });

    executing.add(promise);

    if (executing.size >= concurrency) {
      await Promise.race(executing);
    }
  }

  await Promise.all(executing);

  successful.sort((a, b) => a.index - b.index);
  failed.sort((a, b) => a.index - b.index);

  debugLogger.stepFinish(stepId, {
    successful: successful.length,
    failed: failed.length,
  });

  return { successful, failed };
}

/**
 * Split an array into chunks of a specified size.
 *
 * @example
 * chunkArray([1,2,3,4,5], 2) // [[1,2], [3,4], [5]]
 */
export function chunkArray<T>(array: T[], chunkSize: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += chunkSize) {
    chunks.push(array.slice(i, i + chunkSize));
  }
  return chunks;
}

/**
 * Exclusive sections keyed by an arbitrary string (session id, collection name).
 * Waiters for the same key run strictly in arrival order; different keys never
 * block each other.
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();
  private holders = new Map<string, number>();

  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let releaseCurrent: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      releaseCurrent = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    this.holders.set(key, (this.holders.get(key) ?? 0) + 1);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const remaining = (this.holders.get(key) ?? 1) - 1;
      if (remaining === 0) {
        this.holders.delete(key);
        this.tails.delete(key);
      } else {
        this.holders.set(key, remaining);
      }
      releaseCurrent();
    };
  }

  async runExclusive<R>(key: string, fn: () => Promise<R>): Promise<R> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** True while the key is held or awaited */
  isLocked(key: string): boolean {
    return this.holders.has(key);
  }
}

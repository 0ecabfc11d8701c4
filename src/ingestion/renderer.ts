import { JSDOM, ResourceLoader, VirtualConsole } from 'jsdom';
import { FetchError, errorMessage } from '../utils/errors';
import { sleep, withTimeout } from '../utils/html';
import { debugLogger } from '../utils/debug-logger';

/**
 * Capability: load a page, let its scripts run, return the resulting HTML.
 * A renderer holds resources until close() is called.
 */
export interface PageRenderer {
  render(url: string): Promise<string>;
  close(): Promise<void>;
}

export type RendererFactory = () => PageRenderer;

export interface JsdomRendererOptions {
  timeoutMs?: number;
  /** Time given to page scripts after load before the DOM is serialized */
  settleMs?: number;
  userAgent?: string;
}

/**
 * Script-executing renderer for section pages that build their article lists
 * client-side.
 */
export class JsdomRenderer implements PageRenderer {
  private readonly timeoutMs: number;
  private readonly settleMs: number;
  private readonly resources: ResourceLoader;
  private readonly open = new Set<JSDOM>();
  private closed = false;

  constructor(options: JsdomRendererOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.settleMs = options.settleMs ?? 3_000;
    this.resources = new ResourceLoader({ userAgent: options.userAgent ?? 'Mozilla/5.0' });
  }

  async render(url: string): Promise<string> {
    if (this.closed) {
      throw new FetchError(url, 'Renderer is closed');
    }

    const virtualConsole = new VirtualConsole();
    virtualConsole.on('jsdomError', (error: Error) => {
      debugLogger.warn('SCRAPER', 'Page script error', { url, error: error.message });
    });

    const loading = JSDOM.fromURL(url, {
      runScripts: 'dangerously',
      resources: this.resources,
      pretendToBeVisual: true,
      virtualConsole,
    });

    let dom: JSDOM;
    try {
      dom = await withTimeout(loading, this.timeoutMs, () => new FetchError(url, `Render timed out after ${this.timeoutMs}ms`));
    } catch (error) {
      // An abandoned page can still arrive; close it so its scripts stop
      void loading.then(
        late => late.window.close(),
        (lateError: unknown) => {
          debugLogger.warn('SCRAPER', 'Abandoned page failed to load', { url, error: errorMessage(lateError) });
        }
      );
      if (error instanceof FetchError) throw error;
      throw new FetchError(url, `Render failed: ${errorMessage(error)}`, { cause: error });
    }

    if (this.closed) {
      dom.window.close();
      throw new FetchError(url, 'Renderer is closed');
    }

    this.open.add(dom);
    try {
      if (this.settleMs > 0) {
        await sleep(this.settleMs);
      }
      return dom.serialize();
    } finally {
      dom.window.close();
      this.open.delete(dom);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const dom of this.open) {
      dom.window.close();
    }
    this.open.clear();
  }
}

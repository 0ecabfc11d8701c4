import { afterEach, describe, it, expect, vi } from 'vitest';
import { JSDOM } from 'jsdom';
import { JsdomRenderer } from '../src/ingestion/renderer';
import { FetchError } from '../src/utils/errors';

const URL = 'https://news.example.com/markets';

function pendingPage() {
  let resolve: (dom: JSDOM) => void = () => undefined;
  const promise = new Promise<JSDOM>(done => {
    resolve = done;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>(resolve => setTimeout(resolve, 0));

afterEach(() => {
  vi.restoreAllMocks();
});

describe('JsdomRenderer', () => {
  it('returns the serialized page and closes its window', async () => {
    const dom = new JSDOM('<html><body><a href="/news/x-123456">x</a></body></html>');
    const close = vi.spyOn(dom.window, 'close');
    vi.spyOn(JSDOM, 'fromURL').mockResolvedValue(dom);

    const html = await new JsdomRenderer({ settleMs: 0 }).render(URL);

    expect(html).toBe('<html><head></head><body><a href="/news/x-123456">x</a></body></html>');
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('closes a page that arrives after the render timed out', async () => {
    const page = pendingPage();
    vi.spyOn(JSDOM, 'fromURL').mockReturnValue(page.promise);
    const renderer = new JsdomRenderer({ timeoutMs: 10, settleMs: 0 });

    const failure = renderer.render(URL);
    await expect(failure).rejects.toBeInstanceOf(FetchError);
    await expect(failure).rejects.toThrow('Render timed out after 10ms');

    const late = new JSDOM('<p>late</p>');
    const close = vi.spyOn(late.window, 'close');
    page.resolve(late);
    await tick();

    expect(close).toHaveBeenCalledTimes(1);
  });

  it('closes a page that arrives after the renderer was closed', async () => {
    const page = pendingPage();
    vi.spyOn(JSDOM, 'fromURL').mockReturnValue(page.promise);
    const renderer = new JsdomRenderer({ settleMs: 0 });

    const pending = renderer.render(URL);
    await renderer.close();

    const late = new JSDOM('<p>late</p>');
    const close = vi.spyOn(late.window, 'close');
    page.resolve(late);

    await expect(pending).rejects.toThrow('Renderer is closed');
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('refuses to render once closed', async () => {
    const renderer = new JsdomRenderer();
    await renderer.close();

    await expect(renderer.render(URL)).rejects.toThrow('Renderer is closed');
  });
});

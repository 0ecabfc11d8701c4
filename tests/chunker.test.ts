import { describe, it, expect } from 'vitest';
import { chunkArticle, cleanText, processArticles, splitText } from '../src/ingestion/chunker';
import { ConfigurationError } from '../src/utils/errors';
import { makeArticle } from './helpers/fixtures';

function wordText(): string {
  // 200 nine-character words and 199 spaces, plus one trailing character
  const words = Array.from({ length: 200 }, (_, i) => `w${String(i).padStart(3, '0')}abcde`);
  return words.join(' ') + 'x';
}

const VOCAB = ['banks', 'rallied', 'after', 'the', 'central', 'bank', 'held', 'rates', 'while', 'foreign', 'investors', 'bought'];
const SENTENCE_LENGTHS = [310, 180, 420, 260, 150, 390, 286, 350, 200];

function sentence(seed: number, length: number): string {
  let current = '';
  for (let k = 0; ; k++) {
    const word = VOCAB[(seed * 7 + k) % VOCAB.length];
    const next = current ? `${current} ${word}` : word;
    if (next.length + 1 > length) return `${current}.`;
    current = next;
  }
}

/** 2000 characters of prose with sentences between 150 and 420 characters */
function proseText(): string {
  const parts: string[] = [];
  for (let i = 0; parts.join(' ').length < 2000; i++) {
    parts.push(sentence(i, SENTENCE_LENGTHS[i % SENTENCE_LENGTHS.length]));
  }
  return parts.join(' ').slice(0, 2000);
}

/** Positions of each chunk inside the source text, in order */
function locate(text: string, chunks: string[]): number[] {
  const positions: number[] = [];
  let from = 0;
  for (const chunk of chunks) {
    const at = text.indexOf(chunk, from);
    positions.push(at);
    from = at + 1;
  }
  return positions;
}

describe('cleanText', () => {
  it('collapses whitespace runs and trims', () => {
    expect(cleanText('  Short   text\n\nhere\t')).toBe('Short text here');
  });
});

describe('splitText', () => {
  it('splits a 2000-character text into three overlapping chunks', () => {
    const text = wordText();
    expect(text).toHaveLength(2000);

    const chunks = splitText(text, { chunkSize: 800, chunkOverlap: 100 });

    expect(chunks.map(c => c.length)).toEqual([799, 799, 600]);
    expect(chunks[0]).toBe(text.slice(0, 799));
    expect(chunks[1]).toBe(text.slice(700, 1499));
    expect(chunks[2]).toBe(text.slice(1400));
    expect(chunks[1].startsWith(chunks[0].slice(-99))).toBe(true);
    expect(chunks[2].startsWith(chunks[1].slice(-99))).toBe(true);
  });

  it('keeps prose chunks near full size instead of breaking at an early sentence end', () => {
    const text = proseText();
    expect(text).toHaveLength(2000);
    expect(text.indexOf('. ')).toBe(308);

    const chunks = splitText(text, { chunkSize: 800, chunkOverlap: 100 });

    expect(chunks.map(c => c.length)).toEqual([796, 796, 595]);
    expect(locate(text, chunks)).toEqual([0, 705, 1405]);
    expect(chunks[1]).toBe(text.slice(705, 1501));
    expect(chunks[2]).toBe(text.slice(1405));
  });

  it('produces exact slices that cover the whole text', () => {
    const text = wordText();
    const chunks = splitText(text, { chunkSize: 300, chunkOverlap: 40 });
    const positions = locate(text, chunks);

    expect(positions[0]).toBe(0);
    positions.forEach((pos, i) => {
      expect(pos).toBeGreaterThanOrEqual(0);
      expect(chunks[i].length).toBeLessThanOrEqual(300);
      if (i > 0) {
        const prevEnd = positions[i - 1] + chunks[i - 1].length;
        expect(prevEnd - pos).toBeLessThanOrEqual(40);
        expect(pos).toBeLessThanOrEqual(prevEnd + 1);
      }
    });
    const last = chunks.length - 1;
    expect(positions[last] + chunks[last].length).toBe(text.length);
  });

  it('prefers a sentence end within the last overlap of the window', () => {
    const text = 'Alpha beta gamma delta epsilon zeta eta theta. Iota kappa lambda mu nu xi omicron pi rho sigma.';
    expect(splitText(text, { chunkSize: 50, chunkOverlap: 10 })).toEqual([
      'Alpha beta gamma delta epsilon zeta eta theta.',
      'eta theta. Iota kappa lambda mu nu xi omicron pi',
      'omicron pi rho sigma.',
    ]);
  });

  it('ignores a sentence end before the last overlap of the window', () => {
    const text = 'Alpha beta gamma delta epsilon zeta eta. Theta iota kappa lambda mu nu xi omicron pi rho.';
    expect(splitText(text, { chunkSize: 50, chunkOverlap: 10 })).toEqual([
      'Alpha beta gamma delta epsilon zeta eta. Theta',
      'eta. Theta iota kappa lambda mu nu xi omicron pi',
      'omicron pi rho.',
    ]);
  });

  it('keeps a token longer than the chunk size whole', () => {
    const long = 'x'.repeat(30);
    expect(splitText(`a ${long} b c`, { chunkSize: 10, chunkOverlap: 3 })).toEqual(['a', long, 'b c']);
  });

  it('returns one chunk for short text and none for blank text', () => {
    expect(splitText('Short   text\n\nhere')).toEqual(['Short text here']);
    expect(splitText('  \n ')).toEqual([]);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => splitText('text', { chunkSize: 100, chunkOverlap: 100 })).toThrow(ConfigurationError);
  });
});

describe('chunkArticle', () => {
  it('attaches string-only metadata with a sequential chunk index', () => {
    const article = makeArticle({ fullText: wordText() });
    const chunks = chunkArticle(article, { chunkSize: 800, chunkOverlap: 100 });

    expect(chunks.map(c => c.metadata.chunkIndex)).toEqual(['0', '1', '2']);
    for (const chunk of chunks) {
      expect(chunk.articleUrl).toBe(article.url);
      for (const value of Object.values(chunk.metadata)) {
        expect(typeof value).toBe('string');
      }
    }
    expect(chunks[0].metadata).toEqual({
      title: 'Sensex rallies as banks gain',
      sourceName: 'Example Times',
      url: article.url,
      publishDate: '2024-05-14T10:00:00.000Z',
      section: '/markets',
      chunkIndex: '0',
    });
  });

  it('stores N/A for missing values', () => {
    const [chunk] = chunkArticle(makeArticle({ title: '', section: '   ', publishedAt: new Date('invalid') }));
    expect(chunk.metadata.title).toBe('N/A');
    expect(chunk.metadata.section).toBe('N/A');
    expect(chunk.metadata.publishDate).toBe('N/A');
  });
});

describe('processArticles', () => {
  it('skips empty articles and keeps input order', () => {
    const first = makeArticle({ url: 'https://a.example.com/news/1', fullText: 'First article body.' });
    const empty = makeArticle({ url: 'https://a.example.com/news/2', fullText: '   ' });
    const second = makeArticle({ url: 'https://a.example.com/news/3', fullText: 'Second article body.' });

    const chunks = processArticles([first, empty, second]);

    expect(chunks.map(c => c.articleUrl)).toEqual([first.url, second.url]);
    expect(chunks.map(c => c.content)).toEqual(['First article body.', 'Second article body.']);
  });
});

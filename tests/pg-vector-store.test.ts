import { describe, it, expect, beforeEach, vi } from 'vitest';

const { mockQuery, mockClientQuery, mockRelease } = vi.hoisted(() => ({
  mockQuery: vi.fn(),
  mockClientQuery: vi.fn(),
  mockRelease: vi.fn(),
}));

vi.mock('pg', () => ({
  // Regular function so the mock can be called with `new`
  Pool: vi.fn(function () {
    return {
      query: mockQuery,
      connect: vi.fn(async () => ({ query: mockClientQuery, release: mockRelease })),
      on: vi.fn(),
      end: vi.fn(),
    };
  }),
}));

import { Pool } from 'pg';
import { PgVectorStore } from '../src/db/pg-vector-store';
import { parseVectorLiteral, toVectorLiteral } from '../src/db/pg-client';
import { makeChunk } from './helpers/fixtures';

const metadata = makeChunk('RBI holds rates').metadata;

function sqlCalls(mock: typeof mockQuery): string[] {
  return mock.mock.calls.map(call => String(call[0]).replace(/\s+/g, ' ').trim());
}

describe('PgVectorStore', () => {
  let store: PgVectorStore;

  beforeEach(() => {
    vi.clearAllMocks();
    mockQuery.mockResolvedValue({ rows: [], rowCount: 0 });
    mockClientQuery.mockResolvedValue({ rows: [], rowCount: 0 });
    store = new PgVectorStore(new Pool(), 3);
  });

  it('creates the extension and table on first write only', async () => {
    const vector = { id: 'abc', content: 'RBI holds rates', metadata, embedding: [0.1, 0.2, 0.3] };
    await store.upsert('news', [vector]);
    await store.upsert('news', [vector]);

    const sql = sqlCalls(mockQuery);
    expect(sql.filter(s => s === 'CREATE EXTENSION IF NOT EXISTS vector')).toHaveLength(1);
    expect(sql.filter(s => s.startsWith('CREATE TABLE IF NOT EXISTS "news"'))).toHaveLength(1);
    expect(sql.find(s => s.startsWith('CREATE TABLE'))).toContain('embedding vector(3) NOT NULL');
  });

  it('upserts inside a transaction', async () => {
    await store.upsert('news', [{ id: 'abc', content: 'RBI holds rates', metadata, embedding: [0.1, 0.2, 0.3] }]);

    const sql = sqlCalls(mockClientQuery);
    expect(sql[0]).toBe('BEGIN');
    expect(sql[1]).toContain('INSERT INTO "news" (id, content, metadata, embedding)');
    expect(sql[1]).toContain('ON CONFLICT (id) DO UPDATE SET');
    expect(sql[2]).toBe('COMMIT');
    expect(mockClientQuery.mock.calls[1][1]).toEqual(['abc', 'RBI holds rates', JSON.stringify(metadata), '[0.1,0.2,0.3]']);
    expect(mockRelease).toHaveBeenCalledOnce();
  });

  it('rolls back and rethrows when the insert fails', async () => {
    mockClientQuery.mockImplementation(async (sql: string) => {
      if (sql.includes('INSERT')) throw new Error('disk full');
      return { rows: [] };
    });

    await expect(
      store.upsert('news', [{ id: 'abc', content: 'x', metadata, embedding: [1, 0, 0] }])
    ).rejects.toThrow('disk full');

    expect(sqlCalls(mockClientQuery)).toContain('ROLLBACK');
    expect(mockRelease).toHaveBeenCalledOnce();
  });

  it('skips the database for an empty upsert', async () => {
    await store.upsert('news', []);
    expect(mockQuery).not.toHaveBeenCalled();
  });

  it('reads a missing collection as empty without creating it', async () => {
    mockQuery.mockImplementation(async (sql: string) =>
      sql.includes('to_regclass') ? { rows: [{ exists: false }] } : { rows: [] }
    );

    expect(await store.exists('news')).toBe(false);
    expect(await store.count('news')).toBe(0);
    expect(await store.distinctSources('news')).toEqual([]);
    expect(await store.search('news', [1, 0, 0], { k: 4 })).toEqual([]);

    const sql = sqlCalls(mockQuery);
    expect(sql).toHaveLength(4);
    expect(sql.every(s => s === 'SELECT to_regclass($1) IS NOT NULL AS exists')).toBe(true);
    expect(mockQuery.mock.calls[0][1]).toEqual(['"news"']);
  });

  it('searches by cosine distance and parses rows', async () => {
    mockQuery.mockImplementation(async (sql: string) =>
      sql.includes('embedding <=>')
        ? { rows: [{ id: 'abc', content: 'RBI holds rates', metadata, embedding: '[1,0,0]', distance: 0.25 }] }
        : { rows: [{ exists: true }] }
    );

    const hits = await store.search('news', [1, 0, 0], { k: 4 });

    expect(hits).toEqual([{ id: 'abc', content: 'RBI holds rates', metadata, embedding: [1, 0, 0], distance: 0.25 }]);
    const searchCall = mockQuery.mock.calls.find(call => String(call[0]).includes('embedding <=>'));
    expect(searchCall?.[1]).toEqual(['[1,0,0]', null, 4]);
  });

  it('passes the source filter as a text array', async () => {
    mockQuery.mockResolvedValue({ rows: [{ exists: true }] });

    await store.search('news', [1, 0, 0], { k: 2, sourceNames: ['Moneycontrol'] });

    const searchCall = mockQuery.mock.calls.find(call => String(call[0]).includes('embedding <=>'));
    expect(searchCall?.[1]).toEqual(['[1,0,0]', ['Moneycontrol'], 2]);
  });

  it('converts the count to a number', async () => {
    mockQuery.mockImplementation(async (sql: string) =>
      sql.includes('COUNT(*)') ? { rows: [{ count: '42' }] } : { rows: [{ exists: true }] }
    );

    expect(await store.count('news')).toBe(42);
  });

  it('drops the table and recreates it on the next write', async () => {
    const vector = { id: 'abc', content: 'x', metadata, embedding: [1, 0, 0] };
    await store.upsert('news', [vector]);
    await store.drop('news');
    await store.upsert('news', [vector]);

    const sql = sqlCalls(mockQuery);
    expect(sql).toContain('DROP TABLE IF EXISTS "news"');
    expect(sql.filter(s => s.startsWith('CREATE TABLE'))).toHaveLength(2);
  });

  it('rejects collection names that are not plain identifiers', async () => {
    await expect(store.count('news; DROP TABLE x')).rejects.toThrow('Invalid collection name');
  });
});

describe('vector literals', () => {
  it('formats and parses pgvector text', () => {
    expect(toVectorLiteral([0.5, -1, 2])).toBe('[0.5,-1,2]');
    expect(parseVectorLiteral('[0.5,-1,2]')).toEqual([0.5, -1, 2]);
    expect(parseVectorLiteral('[]')).toEqual([]);
  });
});

import type { Pool } from 'pg';
import { z } from 'zod';
import type { VectorSearchHit, VectorSearchOptions, VectorStore, StoredVector } from './vector-store';
import { parseVectorLiteral, toVectorLiteral } from './pg-client';
import { chunkArray } from '../utils/concurrency';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]{0,62}$/;
const UPSERT_BATCH_SIZE = 100;

const MetadataSchema = z.object({
  title: z.string(),
  sourceName: z.string(),
  url: z.string(),
  publishDate: z.string(),
  section: z.string(),
  chunkIndex: z.string(),
});

interface SearchRow {
  id: string;
  content: string;
  metadata: unknown;
  embedding: string;
  distance: number;
}

function table(collection: string): string {
  if (!IDENTIFIER.test(collection)) {
    throw new Error(`Invalid collection name: ${collection}`);
  }
  return `"${collection}"`;
}

/**
 * pgvector-backed collections: one table per collection with a cosine index
 */
export class PgVectorStore implements VectorStore {
  private readonly ready = new Set<string>();

  constructor(
    private readonly pool: Pool,
    private readonly dimensions: number
  ) {}

  private async ensureCollection(collection: string): Promise<void> {
    if (this.ready.has(collection)) return;
    const name = table(collection);

    await this.pool.query('CREATE EXTENSION IF NOT EXISTS vector');
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${name} (
        id TEXT PRIMARY KEY,
        content TEXT NOT NULL,
        metadata JSONB NOT NULL,
        embedding vector(${this.dimensions}) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS "${collection}_source_idx" ON ${name} ((metadata->>'sourceName'))`
    );

    this.ready.add(collection);
  }

  async exists(collection: string): Promise<boolean> {
    const name = table(collection);
    if (this.ready.has(collection)) return true;

    const { rows } = await this.pool.query<{ exists: boolean }>('SELECT to_regclass($1) IS NOT NULL AS exists', [name]);
    return rows[0]?.exists === true;
  }

  async upsert(collection: string, vectors: StoredVector[]): Promise<void> {
    if (vectors.length === 0) return;
    await this.ensureCollection(collection);
    const name = table(collection);

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      for (const batch of chunkArray(vectors, UPSERT_BATCH_SIZE)) {
        const params: unknown[] = [];
        const rows = batch.map((vector, i) => {
          params.push(vector.id, vector.content, JSON.stringify(vector.metadata), toVectorLiteral(vector.embedding));
          const p = i * 4;
          return `($${p + 1}, $${p + 2}, $${p + 3}::jsonb, $${p + 4}::vector)`;
        });

        await client.query(
          `INSERT INTO ${name} (id, content, metadata, embedding)
           VALUES ${rows.join(', ')}
           ON CONFLICT (id) DO UPDATE SET
             content = EXCLUDED.content,
             metadata = EXCLUDED.metadata,
             embedding = EXCLUDED.embedding`,
          params
        );
      }
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async search(collection: string, embedding: number[], options: VectorSearchOptions): Promise<VectorSearchHit[]> {
    if (!(await this.exists(collection))) return [];
    const sourceNames = options.sourceNames && options.sourceNames.length > 0 ? options.sourceNames : null;

    const { rows } = await this.pool.query<SearchRow>(
      `SELECT id, content, metadata, embedding::text AS embedding,
              embedding <=> $1::vector AS distance
       FROM ${table(collection)}
       WHERE $2::text[] IS NULL OR metadata->>'sourceName' = ANY($2::text[])
       ORDER BY embedding <=> $1::vector
       LIMIT $3`,
      [toVectorLiteral(embedding), sourceNames, options.k]
    );

    return rows.map(row => ({
      id: row.id,
      content: row.content,
      metadata: MetadataSchema.parse(row.metadata),
      embedding: parseVectorLiteral(row.embedding),
      distance: Number(row.distance),
    }));
  }

  async count(collection: string): Promise<number> {
    if (!(await this.exists(collection))) return 0;
    const { rows } = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM ${table(collection)}`
    );
    return Number(rows[0]?.count ?? 0);
  }

  async distinctSources(collection: string): Promise<string[]> {
    if (!(await this.exists(collection))) return [];
    const { rows } = await this.pool.query<{ source: string | null }>(
      `SELECT DISTINCT metadata->>'sourceName' AS source FROM ${table(collection)}`
    );
    return rows.flatMap(row => (row.source ? [row.source] : []));
  }

  async drop(collection: string): Promise<void> {
    await this.pool.query(`DROP TABLE IF EXISTS ${table(collection)}`);
    this.ready.delete(collection);
  }
}

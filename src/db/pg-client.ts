// PG client: connection pool singleton for the pgvector collection store

import { Pool, type PoolConfig } from 'pg';

let _pool: Pool | null = null;

export interface PgConfig {
  connectionString: string;
  poolMax?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

/**
 * Returns the shared pg.Pool singleton, creating it on first call.
 */
export function getPool(config: PgConfig): Pool {
  if (_pool) return _pool;

  const options: PoolConfig = {
    connectionString: config.connectionString,
    max: config.poolMax ?? 10,
    idleTimeoutMillis: config.idleTimeoutMs ?? 30_000,
    connectionTimeoutMillis: config.connectionTimeoutMs ?? 5_000,
    statement_timeout: 30_000,
    application_name: 'financial-news-rag',
  };
  const pool = new Pool(options);

  // Idle-client errors must not crash the process
  pool.on('error', (err) => {
    console.warn('[pg-client] pool background error:', err.message);
  });

  _pool = pool;
  return pool;
}

/**
 * Verify database connectivity
 */
export async function healthCheck(pool: Pool): Promise<boolean> {
  try {
    const result = await pool.query<{ ok: number }>('SELECT 1 AS ok');
    return result.rows[0]?.ok === 1;
  } catch (err) {
    console.warn('[pg-client] health check failed:', err instanceof Error ? err.message : String(err));
    return false;
  }
}

/**
 * Close the pool and release all connections.
 */
export async function closePool(): Promise<void> {
  if (_pool) {
    const pool = _pool;
    _pool = null;
    await pool.end();
  }
}

/**
 * Convert an embedding to a pgvector literal string: `[0.1,0.2,...]`
 */
export function toVectorLiteral(vec: number[]): string {
  return `[${vec.join(',')}]`;
}

/**
 * Parse the text form of a pgvector value back into numbers
 */
export function parseVectorLiteral(text: string): number[] {
  const body = text.trim().replace(/^\[/, '').replace(/\]$/, '');
  if (!body) return [];
  return body.split(',').map(Number);
}

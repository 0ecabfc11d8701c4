import type { Request, Response } from 'express';
import type { Pool } from 'pg';
import { healthCheck as pingDatabase } from '../db/pg-client';
import type { VectorIndexManager } from '../search/vector-index';

export function createHealthHandler(pool: Pool, index: VectorIndexManager) {
  return async function healthCheck(_req: Request, res: Response): Promise<void> {
    const connected = await pingDatabase(pool);

    if (!connected) {
      res.status(503).json({
        status: 'unhealthy',
        database: 'disconnected',
        timestamp: new Date().toISOString(),
      });
      return;
    }

    const stats = await index.stats();
    res.json({
      status: 'healthy',
      database: 'connected',
      totalDocuments: stats.totalDocuments,
      timestamp: new Date().toISOString(),
    });
  };
}

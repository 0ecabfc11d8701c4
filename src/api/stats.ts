import type { Request, Response } from 'express';
import type { VectorIndexManager } from '../search/vector-index';

/**
 * GET /api/v1/db/stats
 */
export function createStatsHandler(index: VectorIndexManager) {
  return async function handleStats(_req: Request, res: Response): Promise<void> {
    const stats = await index.stats();
    res.json({ total_documents: stats.totalDocuments, sources: stats.sources });
  };
}

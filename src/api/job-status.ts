/**
 * API endpoint for background job status and metrics
 */

import { Router } from 'express';
import type { IngestionJob } from '../jobs/ingestion-job';
import type { JobScheduler } from '../jobs/scheduler';

export function createJobStatusRouter(job: IngestionJob, scheduler: JobScheduler | null): Router {
  const router = Router();

  /**
   * GET /api/v1/job-status
   */
  router.get('/', (_req, res) => {
    const schedulerStatus = scheduler?.getStatus() ?? null;
    const stats = job.metrics.getStats();

    res.json({
      healthy: stats.consecutiveFailures < 3,
      scheduler: schedulerStatus
        ? {
            running: schedulerStatus.isRunning,
            cronExpression: schedulerStatus.cronExpression,
            currentlyExecuting: schedulerStatus.isJobCurrentlyExecuting,
          }
        : { running: false, cronExpression: null, currentlyExecuting: job.isRunning() },
      stats: {
        totalRuns: stats.totalRuns,
        successfulRuns: stats.successfulRuns,
        failedRuns: stats.failedRuns,
        consecutiveFailures: stats.consecutiveFailures,
        averageDurationMs: Math.round(stats.averageDurationMs),
      },
      lastRun: stats.lastRun
        ? {
            startedAt: stats.lastRunAt,
            articlesScraped: stats.lastRun.articlesScraped,
            chunksCreated: stats.lastRun.chunksCreated,
            durationMs: stats.lastRun.durationMs,
          }
        : null,
      memory: {
        totalArticlesScraped: stats.totalArticlesScraped,
        totalChunksCreated: stats.totalChunksCreated,
        lastSuccessAt: stats.lastSuccessAt,
        lastError: stats.lastError,
      },
    });
  });

  return router;
}
